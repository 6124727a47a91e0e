import path from "path";

export interface BackendConfig {
  port: number;
  dbPath: string;
  apiKey: string;
  logLevel: string;
  prettyLogs: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  return {
    port: Number(env.PORT) || 3001,
    dbPath: env.DB_PATH || path.join(process.cwd(), "data", "token.sqlite"),
    apiKey: env.API_KEY || "dev-api-key",
    logLevel: env.LOG_LEVEL || "info",
    prettyLogs: env.NODE_ENV !== "production",
  };
}
