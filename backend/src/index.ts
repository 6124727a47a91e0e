import { TokenStore } from "@capped-token/sdk";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createApp } from "./app";

const config = loadConfig();
const logger = createLogger(config);

const store = new TokenStore(config.dbPath);
logger.info({ db: config.dbPath, initialized: store.exists() }, "Token store opened");

const app = createApp({ store, logger, apiKey: config.apiKey, dbPath: config.dbPath });

const server = app.listen(config.port, () => {
  logger.info(`Token explorer running on port ${config.port}`);
});

// Graceful shutdown
process.on("SIGTERM", () => {
  server.close(() => {
    store.close();
    process.exit(0);
  });
});
