import pino from "pino";
import { z } from "zod";

const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

// LOG_LEVEL wins; tests stay quiet unless asked otherwise.
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fallback: LogLevel = env.NODE_ENV === "test" ? "silent" : "info";
  if (env.LOG_LEVEL === undefined || env.LOG_LEVEL === "") return fallback;
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL.toLowerCase());
  if (!parsed.success)
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  return parsed.data;
}

export const logger = pino({
  name: "byte-qrcode-svg",
  level: resolveLogLevel(),
});
