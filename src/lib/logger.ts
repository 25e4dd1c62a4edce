import { pino, stdTimeFunctions, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent | undefined;
  name?: string | undefined;
}

export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? "authbridge",
    level: options?.level ?? "info",
    base: { service: options?.name ?? "authbridge" },
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      paths: ["authorization", "headers.authorization", "*.authorization"],
      censor: "[redacted]"
    }
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
