// 库入口：内容流水线各模块的公开 API

export { loadConfig } from "./config/index.js";
export type { NewsdeskConfig, SecurityLimits, LoadConfigOptions } from "./config/index.js";
export { logger, setLogSink } from "./logger/index.js";
export type { LogCategory, LogEntry, LogLevel } from "./logger/index.js";
export {
  ContentError,
  FormatError,
  ValidationError,
  SlugConflictError,
  MissingReferenceError,
  RenderError,
} from "./errors/index.js";
export type { ContentErrorKind, SanitizationWarning } from "./errors/index.js";
export { parseContent, readContentFile } from "./parser/index.js";
export type { ParsedContent, ContentFile } from "./parser/index.js";
export { Sanitizer } from "./sanitizer/index.js";
export { FieldValidator, slugify, resolveColor } from "./validator/index.js";
export type { ValidationResult } from "./validator/index.js";
export { toRecord, applyAliases, serializeRecord, CONTENT_TYPES } from "./model/index.js";
export type { Article, Author, Category, TrendingTopic, ContentType, ContentRecordMap } from "./model/index.js";
export { ContentStore, openStore } from "./db/index.js";
export { Reconciler } from "./reconciler/index.js";
export type { ReconcileResult, ReconcileOutcome } from "./reconciler/index.js";
export { TemplateRenderer } from "./template/index.js";
export { PageIntegrator } from "./integrator/index.js";
export { ContentPipeline, formatSummary } from "./pipeline/index.js";
export type { SyncSummary, TypeReport, PruneReport, UpgradeReport } from "./pipeline/index.js";
