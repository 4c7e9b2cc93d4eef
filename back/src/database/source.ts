import fs from "fs/promises";
import path from "path";
import { LoadError, SourceNotFoundError } from "../models/ledger.errors.js";
import { parseTable, type Table } from "./csv.js";

const TAB_EXTENSIONS = new Set([".tsv", ".tab"]);

function delimiterFor(source: string): string {
  return TAB_EXTENSIONS.has(path.extname(source).toLowerCase()) ? "\t" : ",";
}

function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}

export async function readTable(source: string): Promise<Table> {
  let text: string;
  try {
    text = await fs.readFile(source, "utf-8");
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "EISDIR" || code === "ENOTDIR") {
      throw new SourceNotFoundError(source);
    }
    throw new LoadError(`Failed to read sales source: ${source}`, {
      cause: error,
    });
  }

  return parseTable(text, delimiterFor(source));
}
