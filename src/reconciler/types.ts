// 入库结果类型

import type { SanitizationWarning } from "../errors/index.js";


export type ReconcileOutcome = "created" | "updated" | "unchanged";


/** 源文件身份：相对内容根目录的路径 + 原始字节校验和 */
export interface ReconcileSource {
  sourcePath: string;
  checksum: string;
}


export interface ReconcileResult {
  outcome: ReconcileOutcome;
  id: number;
  slug: string;
  /** 同一源文件改了 slug 时的旧值，旧详情页需删除 */
  previousSlug?: string;
  warnings: SanitizationWarning[];
}
