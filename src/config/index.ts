// 配置加载：读取 newsdesk.config.json（zod 校验），环境变量覆盖，缺失字段用默认值补全

import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import { logger } from "../logger/index.js";
import { CONTENT_TYPES } from "../model/types.js";
import { BUILTIN_TEMPLATES_DIR, CONFIG_FILE_NAME, defaultPaths } from "./paths.js";
import type { NewsdeskConfig } from "./types.js";

export type { NewsdeskConfig, SecurityLimits, DatabaseConfig, PathsConfig, SyncConfig } from "./types.js";


const ContentTypeSchema = z.enum(["categories", "authors", "articles", "trending"]);


const ConfigFileSchema = z.object({
  database: z.object({
    path: z.string().min(1).optional(),
    backupDir: z.string().min(1).optional(),
    maxBackups: z.number().int().min(1).default(10),
  }).default({}),
  paths: z.object({
    contentDir: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    templatesDir: z.string().min(1).optional(),
  }).default({}),
  security: z.object({
    maxContentLength: z.number().int().positive().default(50_000),
    maxTitleLength: z.number().int().positive().default(200),
    maxExcerptLength: z.number().int().positive().default(500),
    maxTags: z.number().int().positive().default(10),
    maxTagLength: z.number().int().positive().default(50),
  }).default({}),
  sync: z.object({
    requiredTypes: z.array(ContentTypeSchema).default([...CONTENT_TYPES]),
    extensions: z.array(z.string().startsWith(".")).min(1).default([".txt", ".md"]),
  }).default({}),
});


type ConfigFile = z.infer<typeof ConfigFileSchema>;


export interface LoadConfigOptions {
  /** 工作根目录，默认 process.cwd() */
  rootDir?: string;
  /** 显式指定配置文件路径，默认 <rootDir>/newsdesk.config.json */
  configPath?: string;
  /** 环境变量来源，默认 process.env（dotenv 已加载） */
  env?: NodeJS.ProcessEnv;
}


async function readConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    // 文件不存在时使用默认值
    return ConfigFileSchema.parse({});
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn("config", "配置文件不是合法 JSON，使用默认值", { path, err: err instanceof Error ? err.message : String(err) });
    return ConfigFileSchema.parse({});
  }
  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) {
    logger.warn("config", "配置文件校验失败，使用默认值", {
      path,
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
    return ConfigFileSchema.parse({});
  }
  return result.data;
}


function positiveInt(s: string | undefined): number | undefined {
  if (!s) return undefined;
  const n = Number(s);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}


/** 加载配置：优先级 环境变量 > 配置文件 > 默认值；相对路径以 rootDir 为基准 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<NewsdeskConfig> {
  const rootDir = resolve(options.rootDir ?? process.cwd());
  const env = options.env ?? process.env;
  const file = await readConfigFile(options.configPath ?? join(rootDir, CONFIG_FILE_NAME));
  const defaults = defaultPaths(rootDir);
  const abs = (p: string): string => (isAbsolute(p) ? p : join(rootDir, p));

  const maxContentLength = positiveInt(env.NEWSDESK_MAX_CONTENT_LENGTH) ?? file.security.maxContentLength;
  return {
    rootDir,
    database: {
      path: abs(env.NEWSDESK_DB_PATH || file.database.path || defaults.dbPath),
      backupDir: abs(file.database.backupDir ?? defaults.backupDir),
      maxBackups: file.database.maxBackups,
    },
    paths: {
      contentDir: abs(env.NEWSDESK_CONTENT_DIR || file.paths.contentDir || defaults.contentDir),
      outputDir: abs(env.NEWSDESK_OUTPUT_DIR || file.paths.outputDir || defaults.outputDir),
      templatesDir: abs(env.NEWSDESK_TEMPLATES_DIR || file.paths.templatesDir || BUILTIN_TEMPLATES_DIR),
    },
    security: { ...file.security, maxContentLength },
    sync: {
      requiredTypes: file.sync.requiredTypes,
      extensions: file.sync.extensions.map((e) => e.toLowerCase()),
    },
  };
}
