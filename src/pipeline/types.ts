// 流水线运行报告

import type { ContentErrorKind } from "../errors/index.js";
import type { ContentType } from "../model/types.js";


/** 单类内容的计数 */
export interface TypeReport {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  /** 非致命：页面生成失败数 */
  renderErrors: number;
  /** 非致命：净化与夹取警告数 */
  warnings: number;
}


/** 单个文件的失败记录 */
export interface FileFailure {
  type: ContentType;
  sourcePath: string;
  kind: ContentErrorKind | "io" | "internal";
  message: string;
}


export interface SyncSummary {
  types: Partial<Record<ContentType, TypeReport>>;
  failures: FileFailure[];
  /** 因依赖变更而重建的页面 */
  pages: { written: number; unchanged: number; errors: number };
  /** 必需类型出现失败时为 true，CLI 据此以非零码退出 */
  failedRequired: boolean;
}


export interface PruneReport {
  type: ContentType;
  dryRun: boolean;
  /** 已删除（dryRun 时为将删除）的 slug */
  deleted: string[];
  /** 仍被其他行引用、未删除的 slug */
  blocked: { slug: string; references: number }[];
}


export interface UpgradeReport {
  type: ContentType;
  write: boolean;
  /** 含旧字段名、已（或将）重写的源文件 */
  upgraded: { sourcePath: string; legacyKeys: string[] }[];
  failures: FileFailure[];
}
