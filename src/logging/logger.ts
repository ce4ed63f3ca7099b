import pino, { type Logger } from "pino";

export type { Logger };

const isDev = process.env.NODE_ENV !== "production";

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === "test") return "silent";
  return isDev ? "debug" : "info";
}

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: defaultLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
