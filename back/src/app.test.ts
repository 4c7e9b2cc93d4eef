import { afterAll, beforeAll, describe, it, expect } from "vitest";
import type { Server } from "http";
import { createApp } from "./app.js";
import { parseTable } from "./database/csv.js";
import { SaleRepository } from "./repositories/sale.repository.js";
import { SaleService } from "./services/sale.service.js";

const csv = [
  "Country,Product,Amount,Boxes Shipped,Date",
  "USA,Serum,15.50,4,2020-01-10",
  "usa,serum,4.50,1,2020-06-01",
].join("\n");

describe("sales API", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const ledger = new SaleRepository().fromTable(parseTable(csv), "memory");
    const app = createApp(new SaleService(ledger));
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Test server has no TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });

  it("returns totals for a matching query", async () => {
    const res = await fetch(
      `${baseUrl}/api/sales/summary?country=USA&product=Serum&year=2020`,
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      country: "USA",
      product: "Serum",
      amount: "20.00",
      boxes_shipped: "5",
      matched_rows: 2,
    });
  });

  it("prefers the exact date over the year", async () => {
    const res = await fetch(
      `${baseUrl}/api/sales/summary` +
        "?country=usa&product=serum&date=2020-01-10&year=2019",
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      amount: "15.50",
      boxes_shipped: "4",
    });
  });

  it("answers 404 when nothing matches", async () => {
    const res = await fetch(
      `${baseUrl}/api/sales/summary?country=France&product=Serum&year=all`,
    );

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "No sales found for France / Serum",
    });
  });

  it("answers 400 for an invalid year", async () => {
    const res = await fetch(
      `${baseUrl}/api/sales/summary?country=USA&product=Serum&year=20x`,
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid sales query",
      details: [
        { field: "year", message: "year must be a four-digit year or 'all'" },
      ],
    });
  });

  it("answers 400 when product is missing", async () => {
    const res = await fetch(`${baseUrl}/api/sales/summary?country=USA`);

    expect(res.status).toBe(400);
  });

  it("lists the ledger years", async () => {
    const res = await fetch(`${baseUrl}/api/sales/years`);

    expect(await res.json()).toEqual({ years: ["All Years", 2020] });
  });

  it("reports ledger stats", async () => {
    const res = await fetch(`${baseUrl}/api/sales/stats`);

    expect(await res.json()).toEqual({
      source: "memory",
      total_rows: 2,
      retained_rows: 2,
      dropped_rows: 0,
    });
  });

  it("answers the health check", async () => {
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "OK" });
  });
});
