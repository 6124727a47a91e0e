import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import type { Logger } from "pino";
import type { TokenStore } from "@capped-token/sdk";
import { apiKeyAuth } from "./middleware/auth";
import { errorHandler } from "./middleware/errors";
import { statusRouter } from "./routes/status";
import { eventsRouter } from "./routes/events";

export interface AppOptions {
  store: TokenStore;
  logger: Logger;
  apiKey: string;
  dbPath?: string;
}

export function createApp({ store, logger, apiKey, dbPath }: AppOptions): Express {
  const app = express();
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(apiKeyAuth(apiKey));

  // Health endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", db: dbPath ?? null, initialized: store.exists(), uptime: process.uptime() });
  });

  // Routes
  app.use("/api", statusRouter(store));
  app.use("/api", eventsRouter(store));

  app.use(errorHandler(logger));
  return app;
}
