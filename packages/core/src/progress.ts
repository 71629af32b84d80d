import chalk, { type ChalkInstance } from 'chalk';
import { ResultCode } from './engine/result.js';
import type { ProgressCallback } from './engine/types.js';
import { LOG_LEVEL_NAMES, LogLevel, type Output } from './types.js';

export function formatProgress(message: string, level: LogLevel, colors: ChalkInstance = chalk): string {
  switch (level) {
    case LogLevel.ERR:
      return `[AMVP]${colors.red('[ERROR]')}: ${message}`;
    case LogLevel.WARN:
      return `[AMVP]${colors.yellow('[WARNING]')}: ${message}`;
    default:
      return `[AMVP]: ${message}`;
  }
}

/** Sink the engine reports through. Purely observational. */
export function createProgressSink(output: Output, colors: ChalkInstance = chalk): ProgressCallback {
  return (message, level) => {
    output.log(formatProgress(message, level, colors));
    return ResultCode.SUCCESS;
  };
}

/** Accepts a level name (`warn`) or its number (`2`). */
export function parseLogLevel(value: string | number | undefined): LogLevel | null {
  if (value === undefined) return LogLevel.STATUS;
  const key = String(value).trim().toLowerCase();
  if (Object.hasOwn(LOG_LEVEL_NAMES, key)) return LOG_LEVEL_NAMES[key];
  if (!/^\d+$/.test(key)) return null;
  const n = Number(key);
  return Object.values(LogLevel).find((l) => l === n) ?? null;
}
