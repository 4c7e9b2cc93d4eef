import { ParseError } from "../models/ledger.errors.js";

export interface Table {
  columns: string[];
  rows: Record<string, string>[];
  // normalized names that appeared more than once in the header
  duplicate_columns: string[];
}

// Splits delimited text into cells. A quote opens a quoted cell only as the
// cell's first character; elsewhere it is kept as text. Handles "" escapes
// and delimiters or line breaks inside quotes. Blank lines are skipped.
export function parseDelimited(text: string, delimiter = ","): string[][] {
  const rows: string[][] = [];
  let cur: string[] = [];
  let cell = "";
  let inQuotes = false;
  let cellStart = true;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cell += ch;
      }
    } else if (ch === '"' && cellStart) {
      inQuotes = true;
      cellStart = false;
    } else if (ch === delimiter) {
      cur.push(cell);
      cell = "";
      cellStart = true;
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      cur.push(cell);
      cell = "";
      cellStart = true;
      if (cur.length > 1 || cur[0] !== "") {
        rows.push(cur);
      }
      cur = [];
    } else {
      cell += ch;
      cellStart = false;
    }
    i++;
  }

  if (inQuotes) {
    throw new ParseError("unterminated quoted cell");
  }
  if (cell.length || cur.length) {
    cur.push(cell);
    if (cur.length > 1 || cur[0] !== "") {
      rows.push(cur);
    }
  }
  return rows;
}

export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, "-");
}

// Blank names become "column-<position>"; repeats get a "-2", "-3"... suffix.
function uniqueColumns(names: string[]): {
  columns: string[];
  duplicates: string[];
} {
  const taken = new Set<string>();
  const duplicates = new Set<string>();
  const columns = names.map((name, index) => {
    let column = name === "" ? `column-${index + 1}` : name;
    if (taken.has(column)) {
      duplicates.add(column);
      let suffix = 2;
      while (taken.has(`${column}-${suffix}`)) suffix++;
      column = `${column}-${suffix}`;
    }
    taken.add(column);
    return column;
  });
  return { columns, duplicates: [...duplicates] };
}

/**
 * Parse delimited text into a table keyed by normalized column names.
 * Short rows are padded with blank cells; long rows are rejected.
 */
export function parseTable(text: string, delimiter = ","): Table {
  if (text.includes("\u0000")) {
    throw new ParseError("binary content");
  }

  const lines = parseDelimited(text.replace(/^\uFEFF/, ""), delimiter);
  if (lines.length === 0) {
    throw new ParseError("no header row");
  }

  const [header, ...body] = lines;
  const { columns, duplicates } = uniqueColumns(
    header.map(normalizeColumnName),
  );

  const rows = body.map((cells, index) => {
    if (cells.length > columns.length) {
      // +2: one for the header, one for 1-based numbering
      throw new ParseError(
        `row ${index + 2} has ${cells.length} cells, ` +
          `expected ${columns.length}`,
      );
    }
    const row: Record<string, string> = {};
    columns.forEach((column, c) => {
      row[column] = cells[c] ?? "";
    });
    return row;
  });

  return { columns, rows, duplicate_columns: duplicates };
}
