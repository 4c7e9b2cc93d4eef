export const ALL_YEARS = "All Years";
export const NO_YEARS_FOUND = "No years found";

export type YearOption = typeof ALL_YEARS | typeof NO_YEARS_FOUND | number;

export interface SaleRecord {
  country: string;
  product: string;
  amount: number;
  boxes_shipped: number;
  // ISO calendar date, YYYY-MM-DD
  sale_date: string;
  year: number;
  country_key: string;
  product_key: string;
}

export interface LedgerStats {
  total_rows: number;
  retained_rows: number;
  dropped_rows: number;
}

export interface Ledger {
  source: string;
  records: readonly Readonly<SaleRecord>[];
  years: readonly YearOption[];
  stats: Readonly<LedgerStats>;
}

// A year picked from Ledger.years; the sentinels mean no restriction.
export type YearSelection = YearOption;

export interface SalesQuery {
  country: string;
  product: string;
  date?: string;
  year?: YearSelection;
}

export type TimeFilter =
  | { kind: "date"; date: string }
  | { kind: "year"; year: number }
  | { kind: "all" };

export type SalesQueryResult =
  | {
      found: true;
      amount: string;
      boxes_shipped: string;
      matched_rows: number;
    }
  | { found: false };
