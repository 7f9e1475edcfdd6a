// 字段规则：每个构造器返回一个 zod schema，负责强制转换、截断、夹取与默认值

import { z } from "zod";
import type { SecurityLimits } from "../config/types.js";
import type { SanitizationWarning } from "../errors/index.js";
import type { Sanitizer } from "../sanitizer/index.js";
import { resolveColor } from "./palette.js";
import { slugify } from "./slug.js";


/** 单次校验的上下文：警告与错误各自收集，规则出错时仍返回安全的替代值 */
export interface RuleContext {
  sanitizer: Sanitizer;
  limits: SecurityLimits;
  warnings: SanitizationWarning[];
  errors: string[];
}


const raw = z.string().optional();


function fieldOf(ctx: z.RefinementCtx): string {
  return ctx.path.join(".");
}


function fail<T>(rc: RuleContext, ctx: z.RefinementCtx, message: string, fallback: T): T {
  rc.errors.push(`${fieldOf(ctx)}: ${message}`);
  return fallback;
}


/** 纯文本：剥离标签，可选必填与长度上限 */
export function text(rc: RuleContext, opts: { required?: boolean; max?: number } = {}) {
  return raw.transform((v, ctx) => {
    const value = rc.sanitizer.stripTags(v ?? "", fieldOf(ctx), rc.warnings, opts.max);
    if (!value && opts.required) return fail(rc, ctx, "必填字段缺失", value);
    return value;
  });
}


/** 外键引用：保留原值（slug 或名称），入库时解析 */
export function ref(rc: RuleContext, opts: { required?: boolean } = {}) {
  return text(rc, opts);
}


/** slug：显式给出时同样规整为 URL 安全形式，缺省为空串由记录级规则补全 */
export function slug() {
  return raw.transform((v) => {
    const value = (v ?? "").trim();
    return value ? slugify(value) : "";
  });
}


function toNumber(v: string | undefined): number | null {
  if (v === undefined || v.trim() === "") return null;
  const n = Number(v.trim().replace(/,/g, "").replace(/%$/, ""));
  return Number.isFinite(n) ? n : null;
}


interface NumberOptions {
  min?: number;
  max?: number;
  fallback: number;
}


function clampNumber(rc: RuleContext, field: string, v: string | undefined, n: number | null, opts: NumberOptions): number {
  if (n === null) {
    if (v !== undefined && v.trim() !== "") {
      rc.warnings.push({ field, message: `"${v}" 不是数字，使用默认值 ${opts.fallback}` });
    }
    return opts.fallback;
  }
  const lo = opts.min ?? -Infinity;
  const hi = opts.max ?? Infinity;
  const clamped = Math.min(hi, Math.max(lo, n));
  if (clamped !== n) {
    rc.warnings.push({ field, message: `${n} 超出范围 [${lo}, ${hi}]，已夹取为 ${clamped}` });
  }
  return clamped;
}


/** 整数：宽松解析，非数字取默认值，越界夹取 */
export function int(rc: RuleContext, opts: NumberOptions) {
  return raw.transform((v, ctx) => {
    const n = toNumber(v);
    return clampNumber(rc, fieldOf(ctx), v, n === null ? null : Math.trunc(n), opts);
  });
}


/** 浮点数：同 int，不取整 */
export function float(rc: RuleContext, opts: NumberOptions) {
  return raw.transform((v, ctx) => clampNumber(rc, fieldOf(ctx), v, toNumber(v), opts));
}


const TRUE_VALUES = ["true", "yes", "1", "on", "y"];
const FALSE_VALUES = ["false", "no", "0", "off", "n"];


/** 布尔：true/yes/1/on 与 false/no/0/off，无法识别取默认值 */
export function bool(rc: RuleContext, fallback: boolean) {
  return raw.transform((v, ctx) => {
    if (v === undefined || v.trim() === "") return fallback;
    const s = v.trim().toLowerCase();
    if (TRUE_VALUES.includes(s)) return true;
    if (FALSE_VALUES.includes(s)) return false;
    rc.warnings.push({ field: fieldOf(ctx), message: `"${v}" 不是布尔值，使用默认值 ${fallback}` });
    return fallback;
  });
}


const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;


/** 日期：ISO 形式原样保留，其他可解析的写法归一为 YYYY-MM-DD，无法解析报错并置空 */
export function date(rc: RuleContext) {
  return raw.transform((v, ctx) => {
    const s = (v ?? "").trim();
    if (!s) return "";
    const ms = Date.parse(s);
    if (Number.isNaN(ms)) return fail(rc, ctx, `无法解析的日期 "${s}"`, "");
    if (ISO_DATE_PATTERN.test(s)) return s;
    const d = new Date(ms);
    const pad = (n: number) => String(n).padStart(2, "0");
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  });
}


/** 逗号分隔列表：去空、去重，超出个数与单项长度的部分丢弃 */
export function list(rc: RuleContext, opts: { maxItems?: number; maxLength?: number; normalize?: (s: string) => string } = {}) {
  return raw.transform((v, ctx) => {
    const field = fieldOf(ctx);
    const items: string[] = [];
    for (const part of (v ?? "").split(",")) {
      const stripped = rc.sanitizer.stripTags(part, field, rc.warnings);
      const item = opts.normalize ? opts.normalize(stripped) : stripped;
      if (!item || items.includes(item)) continue;
      if (opts.maxLength !== undefined && item.length > opts.maxLength) {
        rc.warnings.push({ field, message: `"${item.slice(0, 20)}…" 超过 ${opts.maxLength} 字符，已丢弃` });
        continue;
      }
      items.push(item);
    }
    if (opts.maxItems !== undefined && items.length > opts.maxItems) {
      rc.warnings.push({ field, message: `共 ${items.length} 项，仅保留前 ${opts.maxItems} 项` });
      return items.slice(0, opts.maxItems);
    }
    return items;
  });
}


/** URL：仅 http(s) 与相对地址 */
export function url(rc: RuleContext) {
  return raw.transform((v, ctx) => rc.sanitizer.sanitizeUrl(v ?? "", fieldOf(ctx), rc.warnings));
}


const EMAIL_PATTERN = /^[^\s@<>"]+@[^\s@<>"]+\.[^\s@<>"]+$/;


/** 邮箱：格式不符时清空并记警告 */
export function email(rc: RuleContext) {
  return raw.transform((v, ctx) => {
    const s = (v ?? "").trim();
    if (!s || EMAIL_PATTERN.test(s)) return s;
    rc.warnings.push({ field: fieldOf(ctx), message: `无效的邮箱 "${s}"，已清空` });
    return "";
  });
}


/** Twitter：存账号名（去掉 @），给出完整链接时按 URL 处理 */
export function twitterHandle(rc: RuleContext) {
  return raw.transform((v, ctx) => {
    const s = (v ?? "").trim();
    if (/^[a-z][a-z0-9+.-]*:/i.test(s)) return rc.sanitizer.sanitizeUrl(s, fieldOf(ctx), rc.warnings);
    const handle = s.replace(/^@/, "");
    if (handle && !/^\w{1,50}$/.test(handle)) {
      rc.warnings.push({ field: fieldOf(ctx), message: `无效的账号名 "${s}"，已清空` });
      return "";
    }
    return handle;
  });
}


/** LinkedIn：缺协议的地址补 https:// */
export function profileUrl(rc: RuleContext) {
  return raw.transform((v, ctx) => {
    const s = (v ?? "").trim();
    if (!s) return "";
    const withScheme = /^[a-z][a-z0-9+.-]*:/i.test(s) ? s : `https://${s.replace(/^\/+/, "")}`;
    return rc.sanitizer.sanitizeUrl(withScheme, fieldOf(ctx), rc.warnings);
  });
}


/** 颜色：调色板名或十六进制，缺省为灰色 */
export function color() {
  return raw.transform((v) => resolveColor(v ?? ""));
}


/** 枚举：不在取值范围内取默认值并记警告 */
export function oneOf<const T extends string>(rc: RuleContext, values: readonly T[], fallback: T) {
  return raw.transform((v, ctx): T => {
    const s = (v ?? "").trim().toLowerCase();
    if (!s) return fallback;
    const hit = values.find((x) => x === s);
    if (hit !== undefined) return hit;
    rc.warnings.push({ field: fieldOf(ctx), message: `"${v}" 不在 ${values.join("/")} 中，使用默认值 ${fallback}` });
    return fallback;
  });
}


/** 带默认值的纯文本：缺省或为空时取 fallback */
export function textOr(rc: RuleContext, fallback: string, opts: { max?: number } = {}) {
  return text(rc, opts).transform((v) => v || fallback);
}
