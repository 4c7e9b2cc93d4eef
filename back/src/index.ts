import { createApp } from "./app.js";
import { loadEnvConfig } from "./config.js";
import { SaleRepository } from "./repositories/sale.repository.js";
import { SaleService } from "./services/sale.service.js";

async function main() {
  const config = loadEnvConfig();

  console.log(`📊 Loading sales ledger from ${config.LEDGER_PATH}...`);
  const ledger = await new SaleRepository().load(config.LEDGER_PATH);
  const years = ledger.years.join(", ");
  console.log(
    `✅ Loaded ${ledger.stats.retained_rows} sales record(s), years: ${years}`,
  );

  const app = createApp(new SaleService(ledger));
  app.listen(config.PORT, () => {
    console.log(`Server running on port ${config.PORT}`);
  });
}

// Load failures halt startup; the server never runs on a partial ledger.
main().catch((err) => {
  console.error("❌ Fatal Error during startup:", err);
  process.exit(1);
});
