import { getEnv } from "./env";
import type { LogLevel } from "./logger/schema";

export interface Config {
  server: {
    nodeEnv: string;
  };
  logging: {
    level: LogLevel;
  };
}

/**
 * Reads settings from the environment on each call, so importing a module
 * never parses `process.env`.
 */
export const getConfig = (): Config => {
  const env = getEnv();
  return {
    server: {
      nodeEnv: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
  };
};
