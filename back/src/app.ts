import express, { type Express, type Request, type Response } from "express";
import cors from "cors";
import { salesSummaryQuerySchema } from "./models/sale.schema.js";
import type { SaleService } from "./services/sale.service.js";

export function createApp(saleService: SaleService): Express {
  const app = express();

  app.use(cors());

  // Sales Routes
  app.get("/api/sales/years", (req: Request, res: Response) => {
    res.json({ years: saleService.getYears() });
  });

  app.get("/api/sales/stats", (req: Request, res: Response) => {
    res.json(saleService.getStats());
  });

  app.get("/api/sales/summary", (req: Request, res: Response) => {
    const parsed = salesSummaryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid sales query",
        details: parsed.error.issues.map((issue) => ({
          field: issue.path.join("."),
          message: issue.message,
        })),
      });
      return;
    }

    try {
      const { country, product, date, year } = parsed.data;
      const result = saleService.summarize({ country, product, date, year });
      if (!result.found) {
        res.status(404).json({
          error: `No sales found for ${country} / ${product}`,
        });
        return;
      }
      res.json({
        country,
        product,
        amount: result.amount,
        boxes_shipped: result.boxes_shipped,
        matched_rows: result.matched_rows,
      });
    } catch (error) {
      console.error("❌ Sales summary failed:", error);
      res.status(500).json({ error: "Failed to summarize sales" });
    }
  });

  // Health check
  app.get("/api/health", (req: Request, res: Response) => {
    res.json({ status: "OK", timestamp: new Date().toISOString() });
  });

  return app;
}
