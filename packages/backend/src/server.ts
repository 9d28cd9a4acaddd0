import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { closeChatStoreSingleton } from "./runtime/chatRuntime.js";
import { getDocumentStoreSingleton } from "./runtime/coreRuntime.js";
import { logger } from "./utils/logger.js";

const app = createApp();

const server = app.listen(appConfig.PORT, () => {
  logger.info(`FinScope backend is running on http://localhost:${appConfig.PORT} (store: ${appConfig.VECTOR_STORE})`);
});

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    closeChatStoreSingleton();
    getDocumentStoreSingleton()
      .disconnect()
      .catch((error: unknown) => {
        logger.error({ err: error }, "Failed to disconnect document store");
      })
      .finally(() => {
        process.exit(0);
      });
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
