import { stdin, stdout } from "process";
import { loadEnvConfig } from "../config.js";
import { SaleRepository } from "../repositories/sale.repository.js";
import { SaleService } from "../services/sale.service.js";
import { SalesConsole } from "./sales_console.js";
//  npx tsx back/src/scripts/query_sales.ts

// Main execution
async function main() {
  const config = loadEnvConfig();
  console.log(`📊 Loading sales ledger from ${config.LEDGER_PATH}...`);
  const ledger = await new SaleRepository().load(config.LEDGER_PATH);
  const saleService = new SaleService(ledger);
  await new SalesConsole(saleService, stdin, stdout).run();
}

main().catch((err) => {
  console.error("❌ Fatal Error during execution:", err);
  process.exit(1);
});
