// 配置类型

import type { ContentType } from "../model/types.js";


/** 安全上限：超出的内容会被截断而非拒绝 */
export interface SecurityLimits {
  maxContentLength: number;
  maxTitleLength: number;
  maxExcerptLength: number;
  maxTags: number;
  maxTagLength: number;
}


export interface DatabaseConfig {
  path: string;
  backupDir: string;
  /** 保留最近的备份个数 */
  maxBackups: number;
}


export interface PathsConfig {
  contentDir: string;
  outputDir: string;
  templatesDir: string;
}


export interface SyncConfig {
  /** 这些类型出现失败时 CLI 以非零码退出 */
  requiredTypes: ContentType[];
  /** 识别为内容文件的扩展名 */
  extensions: string[];
}


/** 解析完成后的完整配置，路径均为绝对路径 */
export interface NewsdeskConfig {
  rootDir: string;
  database: DatabaseConfig;
  paths: PathsConfig;
  security: SecurityLimits;
  sync: SyncConfig;
}
