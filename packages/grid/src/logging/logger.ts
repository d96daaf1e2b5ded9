import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export const DEFAULT_LOG_LEVEL = "warn";

export interface CreateLoggerOptions {
  level?: string;
  stream?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      level: options.level ?? DEFAULT_LOG_LEVEL,
      base: {
        component: "activity-heatmap"
      },
      browser: {
        asObject: true
      }
    },
    options.stream
  );
}
