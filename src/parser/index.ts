// 内容文件解析器

export { parseContent, readContentFile, normalizeKey, checksumOf } from "./parse.js";
export type { ParsedContent, ContentFile } from "./types.js";
