// 内容文件解析：`key: value` 元数据行 + `---` 分隔行 + 自由正文

import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { FormatError } from "../errors/index.js";
import type { ContentFile, ParsedContent } from "./types.js";


const SEPARATOR = "---";


/** 键名归一化：去首尾空白、小写，内部空白与连字符折叠为下划线 */
export function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[\s-]+/g, "_");
}


/** 去掉首尾空行，保留正文内部的缩进与空行 */
function trimBlankLines(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start++;
  while (end > start && lines[end - 1].trim() === "") end--;
  return lines.slice(start, end).join("\n");
}


/** 解析原始文本；找不到仅含 `---` 的行时抛 FormatError */
export function parseContent(raw: string): ParsedContent {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const lines = text.split(/\r?\n/);
  const sepIndex = lines.findIndex((line) => line.trim() === SEPARATOR);
  if (sepIndex === -1) {
    throw new FormatError("缺少 '---' 分隔行");
  }

  const fields = new Map<string, string>();
  for (const line of lines.slice(0, sepIndex)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const colon = trimmed.indexOf(":");
    if (colon <= 0) continue;
    const key = normalizeKey(trimmed.slice(0, colon));
    if (!key) continue;
    fields.set(key, trimmed.slice(colon + 1).trim());
  }

  return { fields, body: trimBlankLines(lines.slice(sepIndex + 1)) };
}


/** 源文件内容校验和：sha256 hex，用于变更检测 */
export function checksumOf(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}


/** 读取并解析单个内容文件 */
export async function readContentFile(sourcePath: string): Promise<ContentFile> {
  const buf = await readFile(sourcePath);
  const parsed = parseContent(buf.toString("utf-8"));
  return { ...parsed, sourcePath, checksum: checksumOf(buf) };
}
