// 测试辅助：临时工作目录、示例内容与默认安全上限

import { cp, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { NewsdeskConfig, SecurityLimits } from "../src/config/types.js";
import { BUILTIN_TEMPLATES_DIR } from "../src/config/paths.js";
import { CONTENT_TYPES } from "../src/model/types.js";


export const FIXTURE_CONTENT_DIR = fileURLToPath(new URL("./fixtures/content", import.meta.url));


export const LIMITS: SecurityLimits = {
  maxContentLength: 50_000,
  maxTitleLength: 200,
  maxExcerptLength: 500,
  maxTags: 10,
  maxTagLength: 50,
};


export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "newsdesk-"));
}


export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}


/** 在临时目录下复制示例内容，返回指向该目录的配置 */
export async function makeWorkspace(withFixtures = true): Promise<NewsdeskConfig> {
  const rootDir = await makeTempDir();
  const contentDir = join(rootDir, "content");
  if (withFixtures) await cp(FIXTURE_CONTENT_DIR, contentDir, { recursive: true });
  return {
    rootDir,
    database: { path: join(rootDir, "data", "newsdesk.db"), backupDir: join(rootDir, "data", "backups"), maxBackups: 10 },
    paths: { contentDir, outputDir: join(rootDir, "integrated"), templatesDir: BUILTIN_TEMPLATES_DIR },
    security: { ...LIMITS },
    sync: { requiredTypes: [...CONTENT_TYPES], extensions: [".txt", ".md"] },
  };
}
