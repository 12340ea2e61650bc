import dotenv from "dotenv";
import pino from "pino";
dotenv.config();

function get(key: string, fallback = ""): string {
  return process.env[key] ?? fallback;
}

const nodeEnv = get("NODE_ENV", "development");

export function defaultLogLevel(env: string): string {
  if (env === "test") return "silent";
  return env === "production" ? "info" : "debug";
}

/**
 * LOG_LEVEL if pino knows it, otherwise the environment's default.
 */
export function resolveLogLevel(raw: string | undefined, env: string): string {
  if (raw === undefined || raw === "") return defaultLogLevel(env);
  const known = raw === "silent" || raw in pino.levels.values;
  return known ? raw : defaultLogLevel(env);
}

export const config = Object.freeze({
  nodeEnv,
  logLevel: resolveLogLevel(process.env.LOG_LEVEL, nodeEnv),
});
