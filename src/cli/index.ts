#!/usr/bin/env node
// CLI 入口：sync / regenerate / prune / upgrade / stats / status / backup

import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { CONTENT_TYPES } from "../model/types.js";
import { ContentPipeline, formatSummary } from "../pipeline/index.js";
import { parseArgs } from "./args.js";
import type { CliArgs } from "./args.js";


const USAGE = `用法: newsdesk <command> [options]

  sync [type...]              同步内容文件到数据库并生成页面（默认全部类型）
  regenerate [type...]        仅按数据库重建页面
  prune <type> [--dry-run]    清理源文件已删除的记录
  upgrade <type> [--write]    把旧字段名改写为当前格式（默认只报告）
  stats                       各表行数
  status                      数据库状态与最近的警告
  backup                      备份数据库

  type: ${CONTENT_TYPES.join(" | ")}`;


async function run(args: CliArgs, pipeline: ContentPipeline): Promise<number> {
  const types = args.types.length > 0 ? args.types : CONTENT_TYPES;
  switch (args.command) {
    case "sync": {
      const summary = await pipeline.sync(types);
      console.log(formatSummary(summary));
      return summary.failedRequired ? 1 : 0;
    }
    case "regenerate": {
      const reports = await pipeline.regenerate(types);
      let errors = 0;
      for (const type of types) {
        const r = reports[type];
        if (!r) continue;
        console.log(`${type}: ${r.written} written, ${r.unchanged} unchanged, ${r.errors.length} errors`);
        errors += r.errors.length;
      }
      return errors > 0 ? 1 : 0;
    }
    case "prune": {
      const [type] = args.types;
      if (type === undefined) {
        console.error("prune 需要指定类型");
        return 2;
      }
      const report = await pipeline.prune(type, { dryRun: args.flags.has("--dry-run") });
      const verb = report.dryRun ? "将删除" : "已删除";
      console.log(`${type}: ${verb} ${report.deleted.length} 条${report.deleted.length > 0 ? `（${report.deleted.join(", ")}）` : ""}`);
      for (const b of report.blocked) {
        console.log(`  保留 ${b.slug}: 仍被 ${b.references} 条记录引用`);
      }
      return 0;
    }
    case "upgrade": {
      const [type] = args.types;
      if (type === undefined) {
        console.error("upgrade 需要指定类型");
        return 2;
      }
      const report = await pipeline.upgrade(type, { write: args.flags.has("--write") });
      for (const u of report.upgraded) {
        console.log(`${report.write ? "已升级" : "待升级"} ${u.sourcePath}: ${u.legacyKeys.join(", ")}`);
      }
      for (const f of report.failures) {
        console.error(`  [${f.kind}] ${f.sourcePath}: ${f.message}`);
      }
      return report.failures.length > 0 ? 1 : 0;
    }
    case "stats": {
      for (const [table, n] of Object.entries(pipeline.store.stats())) {
        console.log(`${table.padEnd(12)} ${n}`);
      }
      return 0;
    }
    case "status": {
      const status = pipeline.store.status();
      console.log(`数据库: ${status.path}`);
      console.log(`journal_mode: ${status.journalMode}  foreign_keys: ${status.foreignKeys ? "on" : "off"}  integrity: ${status.integrity}`);
      for (const [table, ok] of Object.entries(status.tables)) {
        console.log(`  ${ok ? "✓" : "✗"} ${table}`);
      }
      const logs = pipeline.store.recentLogs(10);
      if (logs.length > 0) {
        console.log("最近的警告:");
        for (const l of logs) {
          console.log(`  ${l.created_at} [${l.level}] [${l.category}] ${l.message}${l.source_path ? ` (${l.source_path})` : ""}`);
        }
      }
      const healthy = Object.values(status.tables).every(Boolean) && status.foreignKeys && status.integrity === "ok";
      return healthy ? 0 : 1;
    }
    case "backup": {
      console.log(await pipeline.backup());
      return 0;
    }
    default:
      console.error(USAGE);
      return 2;
  }
}


async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.flags.has("--help") || args.command === "help") {
    console.log(USAGE);
    return;
  }
  if (args.unknown.length > 0) {
    console.error(`未知的类型: ${args.unknown.join(", ")}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }
  const config = await loadConfig();
  const pipeline = await ContentPipeline.open(config);
  try {
    process.exitCode = await run(args, pipeline);
  } finally {
    pipeline.close();
  }
}


main().catch((err) => {
  logger.error("cli", "运行失败", { err: errorMessage(err) });
  process.exitCode = 1;
});
