// 入库协调：按 slug 幂等写入，外键先解析，校验和未变则不写，单文件一个事务

import type { ContentStore } from "../db/index.js";
import { SlugConflictError } from "../errors/index.js";
import type { SanitizationWarning } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { ContentRecordMap, ContentType } from "../model/types.js";
import { COLUMN_BUILDERS } from "./columns.js";
import type { ReconcileResult, ReconcileSource } from "./types.js";

export type { ReconcileOutcome, ReconcileResult, ReconcileSource } from "./types.js";


export interface ReconcilerOptions {
  /** 判断占用 slug 的源文件是否仍在；不在时由新文件接管该行 */
  sourceExists?: (sourcePath: string) => boolean;
}


export class Reconciler {
  private readonly sourceExists: (sourcePath: string) => boolean;

  constructor(
    private readonly store: ContentStore,
    options: ReconcilerOptions = {},
  ) {
    this.sourceExists = options.sourceExists ?? (() => true);
  }

  /**
   * 写入一条记录。slug 已被另一个仍存在的源文件占用时抛 SlugConflictError；
   * 原文件已移走则接管该行，保留 id 与计数。
   * 外键无法解析时抛 MissingReferenceError，事务回滚，库中不留半条数据。
   */
  reconcile<T extends ContentType>(type: T, record: ContentRecordMap[T], source: ReconcileSource): ReconcileResult {
    const warnings: SanitizationWarning[] = [];
    return this.store.transaction((): ReconcileResult => {
      const bySlug = this.store.findBySlug(type, record.slug);
      const previousPath = bySlug?.source_path ?? null;
      const moved = previousPath !== null && previousPath !== source.sourcePath;
      if (previousPath !== null && moved && this.sourceExists(previousPath)) {
        throw new SlugConflictError(type, record.slug, previousPath);
      }
      // 同一源文件改了 slug：沿用旧行，保留 id 与计数
      const renamed = bySlug ? undefined : this.store.findBySource(type, source.sourcePath);
      const existing = bySlug ?? renamed;

      const columns = COLUMN_BUILDERS[type](record, { store: this.store, warnings, existingId: existing?.id });

      if (existing && existing.checksum === source.checksum && !renamed) {
        if (moved) {
          this.store.update(type, existing.id, { ...columns, source_path: source.sourcePath, checksum: source.checksum });
          logger.info("reconcile", "源文件已移动", { type, slug: record.slug, from: previousPath, source_path: source.sourcePath });
        }
        return { outcome: "unchanged", id: existing.id, slug: record.slug, warnings };
      }

      const row = { ...columns, source_path: source.sourcePath, checksum: source.checksum };
      let id: number;
      if (existing) {
        this.store.update(type, existing.id, row);
        id = existing.id;
      } else {
        id = this.store.insert(type, row);
      }
      this.store.refreshCounters();

      if (renamed) {
        logger.info("reconcile", "slug 已变更", { type, from: renamed.slug, to: record.slug, source_path: source.sourcePath });
        return { outcome: "updated", id, slug: record.slug, previousSlug: renamed.slug, warnings };
      }
      return { outcome: existing ? "updated" : "created", id, slug: record.slug, warnings };
    });
  }
}
