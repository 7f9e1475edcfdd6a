// 内容净化：正文 HTML 去除可执行内容，纯文本去标签，URL 仅保留 http(s) 与相对地址

import type { SecurityLimits } from "../config/types.js";
import type { SanitizationWarning } from "../errors/index.js";
import { applyPurify, isUnsafeUrl } from "./purify.js";

export { applyPurify, isUnsafeUrl } from "./purify.js";


/** DOM 净化之后的兜底：保证输出中不残留 <script 与 onxxx= */
const RESIDUAL_RULES: ReadonlyArray<[RegExp, string]> = [
  [/<script\b[^>]*>[\s\S]*?<\/script\s*>/gi, ""],
  [/<\/?script\b[^>]*>?/gi, ""],
  [/\b(?:javascript|vbscript)\s*:/gi, ""],
  [/\bon(\w+)\s*=/gi, "on$1&#61;"],
];


const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;


function applyResidualRules(html: string): { html: string; removed: number } {
  let out = html;
  let removed = 0;
  for (const [pattern, replacement] of RESIDUAL_RULES) {
    out = out.replace(pattern, (...args: unknown[]) => {
      removed++;
      const group = args[1];
      return typeof group === "string" ? replacement.replace("$1", group) : replacement;
    });
  }
  return { html: out, removed };
}


/** 正文与字段净化器：每条流水线构造一次，持有安全上限 */
export class Sanitizer {
  constructor(private readonly limits: SecurityLimits) {}

  /** 超长截断并记警告，不拒绝 */
  truncate(value: string, max: number, field: string, warnings: SanitizationWarning[]): string {
    if (value.length <= max) return value;
    warnings.push({ field, message: `长度 ${value.length} 超过上限 ${max}，已截断` });
    return value.slice(0, max);
  }

  /** 正文 HTML：截断至 maxContentLength，移除 script/iframe/object/embed、事件属性与危险协议 */
  sanitizeHtml(value: string, field: string, warnings: SanitizationWarning[]): string {
    const truncated = this.truncate(value, this.limits.maxContentLength, field, warnings);
    const purified = applyPurify(truncated);
    const residual = applyResidualRules(purified.html);
    const removed = purified.removed + residual.removed;
    if (removed === 0) return truncated;
    warnings.push({ field, message: `移除了 ${removed} 处不安全标记` });
    return residual.html;
  }

  /** 纯文本字段：剥离全部标签，可选长度上限 */
  stripTags(value: string, field: string, warnings: SanitizationWarning[], max?: number): string {
    const text = value
      .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, "")
      .replace(/<\/?[a-z!][^>]*>/gi, "")
      .trim();
    if (text !== value.trim()) {
      warnings.push({ field, message: "已移除 HTML 标签" });
    }
    return max === undefined ? text : this.truncate(text, max, field, warnings);
  }

  /** URL 字段：http(s) 与相对地址保留，其余协议清空并记警告 */
  sanitizeUrl(value: string, field: string, warnings: SanitizationWarning[]): string {
    const url = value.trim();
    if (!url) return "";
    const scheme = SCHEME_PATTERN.exec(url)?.[1]?.toLowerCase();
    if (scheme === undefined && !isUnsafeUrl(url)) return url;
    if (scheme === "http" || scheme === "https") return url;
    warnings.push({ field, message: `不允许的 URL 协议 "${scheme ?? url}"，已清空` });
    return "";
  }
}
