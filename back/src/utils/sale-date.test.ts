import { describe, it, expect } from "vitest";
import { parseSaleDate, yearOf } from "./sale-date.js";

describe("parseSaleDate", () => {
  it("reads ISO dates and ignores a time of day", () => {
    expect(parseSaleDate("2021-05-01")).toBe("2021-05-01");
    expect(parseSaleDate("2021/5/1")).toBe("2021-05-01");
    expect(parseSaleDate("2021-05-01T23:59:00Z")).toBe("2021-05-01");
    expect(parseSaleDate(" 2021-05-01 08:15 ")).toBe("2021-05-01");
    expect(parseSaleDate("2021-05-01T23:59:00.000+02:00")).toBe("2021-05-01");
  });

  it("reads US dates month first", () => {
    expect(parseSaleDate("7/30/2022")).toBe("2022-07-30");
    expect(parseSaleDate("01/02/21")).toBe("2021-01-02");
  });

  it("reads day-month-name-year dates", () => {
    expect(parseSaleDate("04-Jan-22")).toBe("2022-01-04");
    expect(parseSaleDate("4-jan-2022")).toBe("2022-01-04");
    expect(parseSaleDate("1 September 2021")).toBe("2021-09-01");
    expect(parseSaleDate("15 Sept 2021")).toBe("2021-09-15");
  });

  it("reads month-name-first dates", () => {
    expect(parseSaleDate("May 1, 2021")).toBe("2021-05-01");
    expect(parseSaleDate("december 31 1999")).toBe("1999-12-31");
  });

  it("pivots two-digit years at 69", () => {
    expect(parseSaleDate("1/1/68")).toBe("2068-01-01");
    expect(parseSaleDate("1/1/69")).toBe("1969-01-01");
  });

  it("rejects impossible calendar dates", () => {
    expect(parseSaleDate("2021-04-31")).toBeNull();
    expect(parseSaleDate("2021-02-29")).toBeNull();
    expect(parseSaleDate("2020-02-29")).toBe("2020-02-29");
    expect(parseSaleDate("1900-02-29")).toBeNull();
    expect(parseSaleDate("13/01/2021")).toBeNull();
  });

  it("rejects text that is not a date", () => {
    expect(parseSaleDate("")).toBeNull();
    expect(parseSaleDate("someday")).toBeNull();
    expect(parseSaleDate("32-Foo-21")).toBeNull();
    expect(parseSaleDate("2021")).toBeNull();
  });

  it("rejects trailing text that is not a time of day", () => {
    expect(parseSaleDate("2021-05-01 garbage")).toBeNull();
    expect(parseSaleDate("2021-05-01tomorrow")).toBeNull();
    expect(parseSaleDate("2021-05-01 8")).toBeNull();
  });
});

describe("yearOf", () => {
  it("returns the year of an ISO date", () => {
    expect(yearOf("2019-12-31")).toBe(2019);
  });
});
