// 内容模型：解析结果 → 别名归一 → 字段校验 → 类型化记录

import { ValidationError } from "../errors/index.js";
import type { SanitizationWarning } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { ParsedContent } from "../parser/types.js";
import type { FieldValidator } from "../validator/index.js";
import { applyAliases } from "./aliases.js";
import type { ContentRecordMap, ContentType } from "./types.js";

export { applyAliases, FIELD_ALIASES, SERVER_OWNED_FIELDS } from "./aliases.js";
export type { AliasResult } from "./aliases.js";
export { serializeRecord } from "./serialize.js";
export { CONTENT_TYPES, isContentType } from "./types.js";
export type { Article, Author, Category, TrendingTopic, ContentType, ContentRecord, ContentRecordMap } from "./types.js";


export interface BuiltRecord<T extends ContentType> {
  record: ContentRecordMap[T];
  warnings: SanitizationWarning[];
  /** 文件中使用的旧字段名，upgrade 据此判断是否需要重写 */
  legacyKeys: string[];
}


/** 构造类型化记录；必填缺失、日期非法等抛 ValidationError */
export function toRecord<T extends ContentType>(
  type: T,
  content: ParsedContent,
  validator: FieldValidator,
  sourcePath?: string,
): BuiltRecord<T> {
  const aliased = applyAliases(type, content.fields);
  if (aliased.ignored.length > 0) {
    logger.debug("validator", "忽略服务端维护的字段", { type, fields: aliased.ignored, source_path: sourcePath });
  }
  const result = validator.validate(type, aliased.fields, content.body);
  if (!result.isValid || result.cleaned === null) {
    throw new ValidationError(result.errors);
  }
  return { record: result.cleaned, warnings: result.warnings, legacyKeys: aliased.legacyKeys };
}
