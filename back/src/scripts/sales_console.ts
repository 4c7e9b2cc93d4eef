import { createInterface, type Interface } from "readline/promises";
import { salesSummaryQuerySchema } from "../models/sale.schema.js";
import type { SaleService } from "../services/sale.service.js";

export class SalesConsole {
  private rl: Interface;
  private closed = false;
  private whenClosed: Promise<null>;

  constructor(
    private readonly saleService: SaleService,
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream,
  ) {
    this.rl = createInterface({ input, output });
    this.whenClosed = new Promise((resolve) => {
      this.rl.once("close", () => {
        this.closed = true;
        resolve(null);
      });
    });
  }

  async run(): Promise<void> {
    const years = this.saleService.getYears().join(", ");
    console.log(`📅 Years available: ${years}`);
    console.log("Leave the country empty to quit.\n");

    try {
      for (;;) {
        const country = await this.ask("Country: ");
        if (country === null || country.trim() === "") break;
        const product = await this.ask("Product: ");
        const date = await this.ask("Exact date (optional): ");
        const year = await this.ask("Year or 'all' (optional): ");
        if (product === null || date === null || year === null) break;
        this.answer({ country, product, date, year });
      }
    } finally {
      if (!this.closed) this.rl.close();
    }
  }

  // Resolves null once input has ended (Ctrl-D or end of piped input).
  private ask(prompt: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    const question = this.rl.question(prompt).catch((error: unknown) => {
      const aborted = error instanceof Error && error.name === "AbortError";
      if (this.closed || aborted) {
        return null;
      }
      throw error;
    });
    return Promise.race([question, this.whenClosed]);
  }

  private answer(raw: Record<string, string>): void {
    const parsed = salesSummaryQuerySchema.safeParse(raw);
    if (!parsed.success) {
      parsed.error.issues.forEach((issue) => {
        console.log(`⚠️  ${issue.path.join(".")}: ${issue.message}`);
      });
      return;
    }

    const result = this.saleService.summarize(parsed.data);
    if (!result.found) {
      console.log("ℹ️ No sales found for that country and product.\n");
      return;
    }
    console.log(`💰 Amount: $${result.amount}`);
    console.log(`📦 Boxes shipped: ${result.boxes_shipped}\n`);
  }
}
