import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { createRuntime } from "./runtime/container.js";
import { logger } from "./utils/logger.js";

const runtime = createRuntime(appConfig);
const app = createApp(runtime);

const server = app.listen(appConfig.PORT, () => {
  logger.info(`Graph memory backend is running on http://localhost:${appConfig.PORT}`);
});

runtime.start().catch((error: unknown) => {
  logger.error({ err: error }, "Runtime start failed");
});

let shuttingDown = false;
const shutdown = (signal: NodeJS.Signals): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  server.close();
  runtime
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
