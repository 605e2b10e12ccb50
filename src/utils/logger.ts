import { destination, pino } from "pino";
import { loadConfig, type LogLevel } from "../config.js";

// stdout carries the transcript; diagnostics go to stderr
export const logger = pino(
  {
    name: "clipscribe",
    level: loadConfig().logLevel,
    base: undefined,
  },
  destination(2)
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
