// 日志设置：只读环境变量，配置文件加载之前即可使用

import type { LogLevel } from "./types.js";


const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];


/** 一次日志输出所依据的阈值 */
export interface LogSettings {
  consoleLevel: LogLevel;
  toDb: boolean;
  dbLevel: LogLevel;
}


function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}


function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  const v = (s ?? "").trim().toLowerCase();
  return isLogLevel(v) ? v : fallback;
}


function parseFlag(s: string | undefined, fallback: boolean): boolean {
  const v = (s ?? "").trim().toLowerCase();
  if (["0", "false", "off", "no"].includes(v)) return false;
  if (["1", "true", "on", "yes"].includes(v)) return true;
  return fallback;
}


/** LOG_LEVEL 控制台级别（默认 info）；LOG_TO_DB 是否落库（默认开）；LOG_DB_LEVEL 落库级别（默认 warn） */
export function logSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  return {
    consoleLevel: parseLevel(env.LOG_LEVEL, "info"),
    toDb: parseFlag(env.LOG_TO_DB, true),
    dbLevel: parseLevel(env.LOG_DB_LEVEL, "warn"),
  };
}


/** level 是否不低于 threshold */
export function atLeast(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
}
