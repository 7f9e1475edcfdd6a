// 统一日志：按级别输出到控制台，error/warn 可落库，不把一切打满控制台

import { atLeast, logSettings } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogSink } from "./types.js";

export type { LogCategory, LogEntry, LogLevel, LogSink } from "./types.js";
export { logSettings } from "./config.js";
export type { LogSettings } from "./config.js";

type LogMeta = { source_path?: string; [k: string]: unknown };

let _sink: LogSink | null = null;
let _sinkFailed = false;

/** 注册落库目标；传 null 解除（关闭数据库前调用） */
export function setLogSink(sink: LogSink | null): void {
  _sink = sink;
  _sinkFailed = false;
}

function now(): string {
  return new Date().toISOString();
}

function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const file = entry.source_path ? ` (${entry.source_path})` : "";
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${file}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function writeDb(sink: LogSink, entry: LogEntry): void {
  try {
    sink(entry);
  } catch (err) {
    // 落库失败只打一次 stderr，避免循环
    if (_sinkFailed) return;
    _sinkFailed = true;
    process.stderr.write(`[logger] 写入日志表失败: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  const m: LogMeta = meta ?? {};
  const { source_path, ...rest } = m;
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: Object.keys(rest).length > 0 ? rest : undefined,
    source_path,
    created_at: now(),
  };

  const settings = logSettings();
  if (atLeast(level, settings.consoleLevel)) {
    writeConsole(entry);
  }
  if (_sink && settings.toDb && atLeast(level, settings.dbLevel)) {
    writeDb(_sink, entry);
  }
}

/** 统一 logger：error/warn 可落库，控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};
