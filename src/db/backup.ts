// 数据库备份：SQLite 在线备份到带时间戳的文件，只保留最近 N 份

import { mkdir, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../logger/index.js";
import type { ContentStore } from "./index.js";


const BACKUP_PREFIX = "newsdesk-";
const BACKUP_SUFFIX = ".db";


function timestamp(d: Date): string {
  return d.toISOString().replace(/[:.]/g, "-");
}


/** 备份并清理旧备份，返回新备份路径 */
export async function backupDatabase(store: ContentStore, backupDir: string, maxBackups: number, now = new Date()): Promise<string> {
  await mkdir(backupDir, { recursive: true });
  const destination = join(backupDir, `${BACKUP_PREFIX}${timestamp(now)}${BACKUP_SUFFIX}`);
  await store.backup(destination);
  logger.info("db", "数据库已备份", { destination });

  const backups = (await readdir(backupDir))
    .filter((f) => f.startsWith(BACKUP_PREFIX) && f.endsWith(BACKUP_SUFFIX))
    .sort();
  for (const old of backups.slice(0, Math.max(0, backups.length - maxBackups))) {
    await rm(join(backupDir, old), { force: true });
    logger.debug("db", "已删除旧备份", { file: old });
  }
  return destination;
}
