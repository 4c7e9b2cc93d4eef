import { readTable } from "../database/source.js";
import type { Table } from "../database/csv.js";
import {
  LoadError,
  ParseError,
  SchemaError,
} from "../models/ledger.errors.js";
import {
  ALL_YEARS,
  NO_YEARS_FOUND,
  type Ledger,
  type SaleRecord,
  type YearOption,
} from "../models/sale.model.js";
import { parseSaleDate, yearOf } from "../utils/sale-date.js";

export const REQUIRED_FIELDS = [
  "country",
  "product",
  "amount",
  "boxes-shipped",
  "date",
] as const;

export function toMatchingKey(value: string): string {
  return value.trim().toLowerCase();
}

// "$5,320.50" -> 5320.5; blank or unreadable -> 0
export function parseQuantity(raw: string): number {
  const cleaned = raw.replace(/[\s$€£,]/g, "");
  if (cleaned === "") return 0;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : 0;
}

function buildYears(records: SaleRecord[]): YearOption[] {
  const years = [...new Set(records.map((r) => r.year))].sort((a, b) => b - a);
  if (years.length === 0) {
    return [ALL_YEARS, NO_YEARS_FOUND];
  }
  return [ALL_YEARS, ...years];
}

export class SaleRepository {
  async load(source: string): Promise<Ledger> {
    try {
      const table = await readTable(source);
      return this.fromTable(table, source);
    } catch (error) {
      if (error instanceof LoadError) {
        throw error;
      }
      throw new LoadError(`Failed to load sales ledger from ${source}`, {
        cause: error,
      });
    }
  }

  fromTable(table: Table, source: string): Ledger {
    const ambiguous = REQUIRED_FIELDS.filter((f) =>
      table.duplicate_columns.includes(f),
    );
    if (ambiguous.length > 0) {
      throw new ParseError(`duplicate column "${ambiguous[0]}"`);
    }

    const missing = REQUIRED_FIELDS.filter((f) => !table.columns.includes(f));
    if (missing.length > 0) {
      throw new SchemaError(missing);
    }

    const records: SaleRecord[] = [];
    for (const row of table.rows) {
      const saleDate = parseSaleDate(row["date"]);
      if (saleDate === null) {
        continue;
      }
      records.push(
        Object.freeze({
          country: row["country"],
          product: row["product"],
          amount: parseQuantity(row["amount"]),
          boxes_shipped: parseQuantity(row["boxes-shipped"]),
          sale_date: saleDate,
          year: yearOf(saleDate),
          country_key: toMatchingKey(row["country"]),
          product_key: toMatchingKey(row["product"]),
        }),
      );
    }

    const dropped = table.rows.length - records.length;
    if (dropped > 0) {
      console.warn(
        `⚠️  Dropped ${dropped} row(s) with unreadable dates ` +
          `from ${source}`,
      );
    }

    return Object.freeze({
      source,
      records: Object.freeze(records),
      years: Object.freeze(buildYears(records)),
      stats: Object.freeze({
        total_rows: table.rows.length,
        retained_rows: records.length,
        dropped_rows: dropped,
      }),
    });
  }
}
