// 内容错误分类：单文件边界捕获后按 kind 汇总进运行报告

import type { ContentType } from "../model/types.js";


/** 错误种类：format/validation/reference 对单文件致命，render 不致命 */
export type ContentErrorKind = "format" | "validation" | "reference" | "render";


/** 所有内容流水线错误的基类 */
export class ContentError extends Error {
  readonly kind: ContentErrorKind;

  constructor(kind: ContentErrorKind, message: string) {
    super(message);
    this.name = "ContentError";
    this.kind = kind;
  }
}


/** 文件缺少 `---` 分隔行等结构错误 */
export class FormatError extends ContentError {
  constructor(message = "缺少 '---' 分隔行") {
    super("format", message);
    this.name = "FormatError";
  }
}


/** 必填字段缺失、日期无法解析、slug 冲突等 */
export class ValidationError extends ContentError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super("validation", errors.join("; "));
    this.name = "ValidationError";
    this.errors = errors;
  }
}


/** 同一 slug 已由另一个源文件占用 */
export class SlugConflictError extends ValidationError {
  readonly slug: string;
  readonly existingPath: string | null;

  constructor(type: ContentType, slug: string, existingPath: string | null) {
    super([`${type} slug "${slug}" 已被 ${existingPath ?? "未知来源"} 占用`]);
    this.name = "SlugConflictError";
    this.slug = slug;
    this.existingPath = existingPath;
  }
}


/**
 * 外键引用无法解析（作者、分类、父分类）。
 * 命名避开全局 ReferenceError，kind 仍为 "reference"。
 */
export class MissingReferenceError extends ContentError {
  readonly field: string;
  readonly target: ContentType;
  readonly ref: string;

  constructor(field: string, target: ContentType, ref: string) {
    super("reference", `${field} 引用的 ${target} "${ref}" 不存在`);
    this.name = "MissingReferenceError";
    this.field = field;
    this.target = target;
    this.ref = ref;
  }
}


/** 单页渲染失败，不中断批次 */
export class RenderError extends ContentError {
  readonly slug: string;

  constructor(slug: string, message: string) {
    super("render", message);
    this.name = "RenderError";
    this.slug = slug;
  }
}


/** 净化过程中的非致命记录：内容被截断、URL 被清空、危险标记被移除 */
export interface SanitizationWarning {
  field: string;
  message: string;
}


/** 统一取错误信息，避免序列化整个 Error */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
