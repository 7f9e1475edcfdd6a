// 字段校验器：按类型规则表强制转换字段，汇总错误与净化警告

import type { SecurityLimits } from "../config/types.js";
import type { SanitizationWarning } from "../errors/index.js";
import type { ContentRecordMap, ContentType } from "../model/types.js";
import type { Sanitizer } from "../sanitizer/index.js";
import { SCHEMAS } from "./schemas.js";
import type { ValidationResult } from "./types.js";

export { slugify } from "./slug.js";
export { resolveColor, DEFAULT_COLOR } from "./palette.js";
export { estimateReadTime } from "./schemas.js";
export type { ValidationResult } from "./types.js";
export type { RuleContext } from "./rules.js";


export class FieldValidator {
  constructor(
    private readonly sanitizer: Sanitizer,
    private readonly limits: SecurityLimits,
  ) {}

  /**
   * 校验已做过别名归一的字段与正文；不抛错，由调用方依据 isValid 决定。
   * 有错误时 cleaned 仍是逐字段净化后的记录，出错字段取空值。
   */
  validate<T extends ContentType>(type: T, fields: ReadonlyMap<string, string>, body: string): ValidationResult<ContentRecordMap[T]> {
    const warnings: SanitizationWarning[] = [];
    const errors: string[] = [];
    const schema = SCHEMAS[type]({ sanitizer: this.sanitizer, limits: this.limits, warnings, errors }, body);
    const result = schema.safeParse(Object.fromEntries(fields));
    if (!result.success) {
      errors.push(...result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)));
      return { isValid: false, cleaned: null, errors, warnings };
    }
    return { isValid: errors.length === 0, cleaned: result.data, errors, warnings };
  }
}
