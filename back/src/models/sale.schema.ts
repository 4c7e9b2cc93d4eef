import { z } from "zod";
import { parseSaleDate } from "../utils/sale-date.js";
import { ALL_YEARS, type YearSelection } from "./sale.model.js";

const yearSchema = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx): YearSelection | undefined => {
    if (value === undefined || value === "") return undefined;
    if (value.toLowerCase() === "all" || value === ALL_YEARS) return ALL_YEARS;
    if (!/^\d{4}$/.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "year must be a four-digit year or 'all'",
      });
      return z.NEVER;
    }
    return Number(value);
  });

const dateSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === "" ? undefined : value))
  .refine((value) => value === undefined || parseSaleDate(value) !== null, {
    message: "date must be a valid calendar date",
  });

export const salesSummaryQuerySchema = z.object({
  country: z.string(),
  product: z.string(),
  date: dateSchema,
  year: yearSchema,
});

export type SalesSummaryQueryInput = z.input<typeof salesSummaryQuerySchema>;
