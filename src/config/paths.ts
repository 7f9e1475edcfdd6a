// 路径配置：集中管理运行时默认路径，区分仓库自带文件与站点数据

import { join } from "node:path";
import { fileURLToPath } from "node:url";


/** 配置文件名：位于工作目录下，可选 */
export const CONFIG_FILE_NAME = "newsdesk.config.json";


/** 仓库自带模板目录：templates/（源码与 dist 下均为上两级） */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL("../../templates", import.meta.url));


/** 以 rootDir 为基准的默认路径 */
export function defaultPaths(rootDir: string) {
  return {
    /** 内容源文件根目录，下分 articles/authors/categories/trending */
    contentDir: join(rootDir, "content"),
    /** 生成的静态页面目录 */
    outputDir: join(rootDir, "integrated"),
    /** SQLite 数据库文件 */
    dbPath: join(rootDir, "data", "newsdesk.db"),
    /** 数据库备份目录 */
    backupDir: join(rootDir, "data", "backups"),
  };
}
