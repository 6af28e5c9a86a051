import { log } from "@clack/prompts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.HEARTH_LOG;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel) =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export const logger = {
  debug(message: string) {
    if (enabled("debug")) log.message(message);
  },
  info(message: string) {
    if (enabled("info")) log.info(message);
  },
  step(message: string) {
    if (enabled("info")) log.step(message);
  },
  success(message: string) {
    if (enabled("info")) log.success(message);
  },
  warn(message: string) {
    if (enabled("warn")) log.warn(message);
  },
  error(message: string) {
    if (enabled("error")) log.error(message);
  },
};
