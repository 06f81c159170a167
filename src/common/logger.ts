// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function threshold(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function emit(level: LogLevel, component: string | undefined, message: string, meta: unknown): void {
  if (LEVEL_RANK[level] < threshold()) return;
  const line = JSON.stringify({ level, component, message, meta, ts: Date.now() });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

/** Logger that tags every line with the emitting component. */
export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => emit("debug", component, message, meta),
    info: (message, meta) => emit("info", component, message, meta),
    warn: (message, meta) => emit("warn", component, message, meta),
    error: (message, meta) => emit("error", component, message, meta)
  };
}

export const log: Logger = {
  debug(message: string, meta?: unknown): void {
    emit("debug", undefined, message, meta);
  },
  info(message: string, meta?: unknown): void {
    emit("info", undefined, message, meta);
  },
  warn(message: string, meta?: unknown): void {
    emit("warn", undefined, message, meta);
  },
  error(message: string, meta?: unknown): void {
    emit("error", undefined, message, meta);
  }
};
