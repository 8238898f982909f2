import { createApp } from "./app.js";
import { settings } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { openStore, stop } from "./lifecycle.js";
import { ScheduleService } from "./service.js";

async function main() {
  const store = await openStore(settings);
  const app = createApp({
    service: new ScheduleService(store),
    corsOrigins: settings.corsOrigins,
    icsStartTime: settings.icsStartTime,
  });

  const server = app.listen(settings.port, () =>
    logger.info(`API listening on :${settings.port} (store=${settings.store})`),
  );

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    stop(server, store).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", errorMessage(err));
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.error("Start-up failed", errorMessage(err));
  process.exitCode = 1;
});
