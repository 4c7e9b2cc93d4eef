import { InvalidQueryError } from "../models/ledger.errors.js";
import {
  ALL_YEARS,
  NO_YEARS_FOUND,
  type Ledger,
  type LedgerStats,
  type SalesQuery,
  type SalesQueryResult,
  type TimeFilter,
  type YearOption,
} from "../models/sale.model.js";
import { toMatchingKey } from "../repositories/sale.repository.js";
import { parseSaleDate } from "../utils/sale-date.js";

// An exact date wins over a year; a year wins over no filter.
export function resolveTimeFilter(query: SalesQuery): TimeFilter {
  if (query.date !== undefined && query.date.trim() !== "") {
    const date = parseSaleDate(query.date);
    if (date === null) {
      throw new InvalidQueryError(`Invalid sale date: ${query.date}`);
    }
    return { kind: "date", date };
  }
  if (
    query.year !== undefined &&
    query.year !== ALL_YEARS &&
    query.year !== NO_YEARS_FOUND
  ) {
    return { kind: "year", year: query.year };
  }
  return { kind: "all" };
}

export function querySales(
  ledger: Ledger,
  query: SalesQuery,
): SalesQueryResult {
  const filter = resolveTimeFilter(query);
  const country = toMatchingKey(query.country);
  const product = toMatchingKey(query.product);

  const matches = ledger.records
    .filter((record) => {
      switch (filter.kind) {
        case "date":
          return record.sale_date === filter.date;
        case "year":
          return record.year === filter.year;
        case "all":
          return true;
      }
    })
    .filter(
      (record) =>
        record.country_key === country && record.product_key === product,
    );

  if (matches.length === 0) {
    return { found: false };
  }

  const totalAmount = matches.reduce((sum, record) => sum + record.amount, 0);
  const totalBoxes = matches.reduce(
    (sum, record) => sum + record.boxes_shipped,
    0,
  );

  return {
    found: true,
    amount: totalAmount.toFixed(2),
    // fractional shipments are truncated, not rounded
    boxes_shipped: String(Math.trunc(totalBoxes)),
    matched_rows: matches.length,
  };
}

export class SaleService {
  constructor(private readonly ledger: Ledger) {}

  summarize(query: SalesQuery): SalesQueryResult {
    return querySales(this.ledger, query);
  }

  getYears(): readonly YearOption[] {
    return this.ledger.years;
  }

  getStats(): LedgerStats & { source: string } {
    return { source: this.ledger.source, ...this.ledger.stats };
  }
}
