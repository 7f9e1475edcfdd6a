// 校验结果

import type { SanitizationWarning } from "../errors/index.js";


/** 由调用方决定如何处理：isValid 为 false 时 cleaned 仍可用，仅输入无法按规则表解析时为 null */
export interface ValidationResult<T> {
  isValid: boolean;
  cleaned: T | null;
  errors: string[];
  warnings: SanitizationWarning[];
}
