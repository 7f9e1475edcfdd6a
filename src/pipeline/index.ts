// 同步流水线：每条流水线构造一次各服务，逐文件解析 → 校验 → 入库 → 生成页面，单文件失败不影响批次

import { existsSync } from "node:fs";
import { access, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { NewsdeskConfig } from "../config/types.js";
import { backupDatabase } from "../db/backup.js";
import { ContentStore, openStore } from "../db/index.js";
import { ContentError, errorMessage } from "../errors/index.js";
import { PageIntegrator } from "../integrator/index.js";
import type { RenderReport } from "../integrator/index.js";
import { logger, setLogSink } from "../logger/index.js";
import { CONTENT_TYPES, serializeRecord, toRecord } from "../model/index.js";
import type { ContentType } from "../model/types.js";
import { readContentFile } from "../parser/index.js";
import type { ContentFile } from "../parser/types.js";
import { Reconciler } from "../reconciler/index.js";
import type { ReconcileResult } from "../reconciler/index.js";
import { Sanitizer } from "../sanitizer/index.js";
import { TemplateRenderer } from "../template/index.js";
import { FieldValidator } from "../validator/index.js";
import { listContentFiles, orderCategories } from "./files.js";
import type { FileFailure, PruneReport, SyncSummary, TypeReport, UpgradeReport } from "./types.js";

export type { FileFailure, PruneReport, SyncSummary, TypeReport, UpgradeReport } from "./types.js";
export { formatSummary } from "./summary.js";


/** 某类内容变更后需要重建的页面类型 */
const DEPENDENTS: { readonly [K in ContentType]: readonly ContentType[] } = {
  categories: ["categories", "articles", "trending"],
  authors: ["articles"],
  articles: ["articles", "authors", "categories", "trending"],
  trending: ["categories"],
};


interface LoadedFile {
  sourcePath: string;
  content: ContentFile;
}


function emptyReport(): TypeReport {
  return { created: 0, updated: 0, unchanged: 0, failed: 0, renderErrors: 0, warnings: 0 };
}


function toFailure(type: ContentType, sourcePath: string, err: unknown): FileFailure {
  let kind: FileFailure["kind"] = "internal";
  if (err instanceof ContentError) kind = err.kind;
  else if (err instanceof Error && "code" in err && typeof err.code === "string" && err.code.startsWith("E")) kind = "io";
  return { type, sourcePath, kind, message: errorMessage(err) };
}


async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}


export class ContentPipeline {
  readonly sanitizer: Sanitizer;
  readonly validator: FieldValidator;
  readonly reconciler: Reconciler;
  readonly renderer: TemplateRenderer;
  readonly integrator: PageIntegrator;

  constructor(
    readonly config: NewsdeskConfig,
    readonly store: ContentStore,
  ) {
    this.sanitizer = new Sanitizer(config.security);
    this.validator = new FieldValidator(this.sanitizer, config.security);
    this.reconciler = new Reconciler(store, {
      sourceExists: (sourcePath) => existsSync(join(config.paths.contentDir, sourcePath)),
    });
    this.renderer = new TemplateRenderer(config.paths.templatesDir);
    this.integrator = new PageIntegrator(store, this.renderer, config.paths.outputDir);
  }

  /** 打开数据库并注册日志落库 */
  static async open(config: NewsdeskConfig): Promise<ContentPipeline> {
    const store = await openStore(config.database.path);
    setLogSink((entry) => store.insertLog(entry));
    return new ContentPipeline(config, store);
  }

  close(): void {
    setLogSink(null);
    this.store.close();
  }

  private typeDir(type: ContentType): string {
    return join(this.config.paths.contentDir, type);
  }

  /** 同步指定类型（按 分类 → 作者 → 文章 → 话题 的顺序） */
  async sync(types: readonly ContentType[] = CONTENT_TYPES): Promise<SyncSummary> {
    const summary: SyncSummary = {
      types: {},
      failures: [],
      pages: { written: 0, unchanged: 0, errors: 0 },
      failedRequired: false,
    };
    const changed = new Set<ContentType>();
    for (const type of CONTENT_TYPES.filter((t) => types.includes(t))) {
      const report = await this.syncType(type, summary.failures);
      summary.types[type] = report;
      if (report.created + report.updated > 0) changed.add(type);
    }

    const dependents = new Set([...changed].flatMap((t) => DEPENDENTS[t]));
    for (const type of CONTENT_TYPES.filter((t) => dependents.has(t))) {
      const pages = await this.integrator.renderAll(type);
      summary.pages.written += pages.written;
      summary.pages.unchanged += pages.unchanged;
      summary.pages.errors += pages.errors.length;
    }

    summary.failedRequired = this.config.sync.requiredTypes.some((t) => (summary.types[t]?.failed ?? 0) > 0);
    logger.info("pipeline", "同步完成", {
      failures: summary.failures.length,
      pagesWritten: summary.pages.written,
      failedRequired: summary.failedRequired,
    });
    return summary;
  }

  private async loadFiles(type: ContentType, report: TypeReport, failures: FileFailure[]): Promise<LoadedFile[]> {
    const loaded: LoadedFile[] = [];
    for (const path of await listContentFiles(this.typeDir(type), this.config.sync.extensions)) {
      const sourcePath = `${type}/${basename(path)}`;
      try {
        loaded.push({ sourcePath, content: await readContentFile(path) });
      } catch (err) {
        this.recordFailure(report, failures, toFailure(type, sourcePath, err));
      }
    }
    return type === "categories" ? orderCategories(loaded) : loaded;
  }

  private recordFailure(report: TypeReport, failures: FileFailure[], failure: FileFailure): void {
    report.failed++;
    failures.push(failure);
    logger.error("pipeline", "文件处理失败", {
      type: failure.type,
      kind: failure.kind,
      err: failure.message,
      source_path: failure.sourcePath,
    });
  }

  private async syncType(type: ContentType, failures: FileFailure[]): Promise<TypeReport> {
    const report = emptyReport();
    for (const file of await this.loadFiles(type, report, failures)) {
      await this.syncFile(type, file, report, failures);
    }
    try {
      await this.integrator.renderListing(type);
    } catch (err) {
      report.renderErrors++;
      logger.error("render", "列表页生成失败", { type, err: errorMessage(err) });
    }
    logger.info("pipeline", "类型同步完成", { type, ...report });
    return report;
  }

  private async syncFile(type: ContentType, file: LoadedFile, report: TypeReport, failures: FileFailure[]): Promise<void> {
    const { sourcePath, content } = file;
    let outcome: ReconcileResult;
    try {
      const built = toRecord(type, content, this.validator, sourcePath);
      outcome = this.reconciler.reconcile(type, built.record, { sourcePath, checksum: content.checksum });
      const warnings = [...built.warnings, ...outcome.warnings];
      for (const w of warnings) {
        logger.warn("validator", w.message, { field: w.field, source_path: sourcePath });
      }
      report.warnings += warnings.length;
    } catch (err) {
      this.recordFailure(report, failures, toFailure(type, sourcePath, err));
      return;
    }

    report[outcome.outcome]++;
    if (outcome.outcome === "unchanged") return;
    try {
      if (outcome.previousSlug) await this.integrator.removeItem(type, outcome.previousSlug);
      await this.integrator.renderItem(type, outcome.slug);
    } catch (err) {
      report.renderErrors++;
      logger.error("render", "详情页生成失败", { type, slug: outcome.slug, err: errorMessage(err), source_path: sourcePath });
    }
  }

  /** 不读源文件，按数据库重建指定类型的全部页面（模板变更后使用） */
  async regenerate(types: readonly ContentType[] = CONTENT_TYPES): Promise<Partial<Record<ContentType, RenderReport>>> {
    const reports: Partial<Record<ContentType, RenderReport>> = {};
    for (const type of CONTENT_TYPES.filter((t) => types.includes(t))) {
      reports[type] = await this.integrator.renderAll(type);
    }
    return reports;
  }

  /**
   * 显式清理：删除源文件已不存在的行及其详情页。
   * 仍被引用的行（有文章的作者、有文章/子分类/话题的分类）只报告不删除。
   */
  async prune(type: ContentType, options: { dryRun?: boolean } = {}): Promise<PruneReport> {
    const dryRun = options.dryRun ?? false;
    const report: PruneReport = { type, dryRun, deleted: [], blocked: [] };
    for (const row of this.store.listSources(type)) {
      if (row.source_path === null) continue;
      if (await exists(join(this.config.paths.contentDir, row.source_path))) continue;
      const references = this.store.countReferences(type, row.id);
      if (references > 0) {
        report.blocked.push({ slug: row.slug, references });
        logger.warn("pipeline", "源文件已删除但仍被引用，保留", { type, slug: row.slug, references });
        continue;
      }
      report.deleted.push(row.slug);
      if (dryRun) continue;
      this.store.transaction(() => {
        this.store.deleteRow(type, row.id);
        this.store.refreshCounters();
      });
      await this.integrator.removeItem(type, row.slug);
      logger.info("pipeline", "已清理", { type, slug: row.slug, source_path: row.source_path });
    }
    if (!dryRun && report.deleted.length > 0) {
      await this.integrator.renderListing(type);
      for (const dep of DEPENDENTS[type].filter((t) => t !== type)) {
        await this.integrator.renderAll(dep);
      }
    }
    return report;
  }

  /** 把含旧字段名的源文件改写为当前规范形态；write 为 false 时只报告 */
  async upgrade(type: ContentType, options: { write?: boolean } = {}): Promise<UpgradeReport> {
    const write = options.write ?? false;
    const report: UpgradeReport = { type, write, upgraded: [], failures: [] };
    for (const path of await listContentFiles(this.typeDir(type), this.config.sync.extensions)) {
      const sourcePath = `${type}/${basename(path)}`;
      try {
        const content = await readContentFile(path);
        const built = toRecord(type, content, this.validator, sourcePath);
        if (built.legacyKeys.length === 0) continue;
        report.upgraded.push({ sourcePath, legacyKeys: built.legacyKeys });
        if (write) {
          await writeFile(path, serializeRecord(type, built.record, content.body), "utf-8");
          logger.info("pipeline", "已升级为当前字段格式", { legacyKeys: built.legacyKeys, source_path: sourcePath });
        }
      } catch (err) {
        report.failures.push(toFailure(type, sourcePath, err));
        logger.error("pipeline", "升级失败", { err: errorMessage(err), source_path: sourcePath });
      }
    }
    return report;
  }

  /** 在线备份数据库，返回备份文件路径 */
  backup(): Promise<string> {
    const { backupDir, maxBackups } = this.config.database;
    return backupDatabase(this.store, backupDir, maxBackups);
  }
}
