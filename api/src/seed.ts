// api/src/seed.ts
import { settings } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { ScheduleService } from "./service.js";
import { openStore } from "./lifecycle.js";

async function main() {
  const store = await openStore(settings);
  try {
    logger.info("Seeding schedules...");
    const { created, from, to } = await new ScheduleService(store).generate();
    logger.info(`Seeding complete: ${created} weeks (${from ?? "-"} .. ${to ?? "-"})`);
  } finally {
    await store.close();
  }
}

main().catch((err: unknown) => {
  logger.error("Seeding failed", errorMessage(err));
  process.exitCode = 1;
});
