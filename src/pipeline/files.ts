// 内容文件枚举：按扩展名过滤，按文件名排序保证处理顺序稳定

import { readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import { logger } from "../logger/index.js";
import { applyAliases } from "../model/aliases.js";
import type { ContentFile } from "../parser/types.js";
import { slugify } from "../validator/slug.js";


/** 目录下的内容文件（绝对路径）；目录不存在时返回空列表 */
export async function listContentFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.warn("pipeline", "内容目录不存在，跳过", { dir });
      return [];
    }
    throw err;
  }
  return names
    .filter((n) => !n.startsWith(".") && extensions.includes(extname(n).toLowerCase()))
    .sort()
    .map((n) => join(dir, n));
}


/** 分类按层级排序：无父分类的在前，子分类在其父分类之后；父分类不在本批时视为顶级 */
export function orderCategories<T extends { content: ContentFile }>(files: T[]): T[] {
  const keyOf = (f: T): string => {
    const fields = applyAliases("categories", f.content.fields).fields;
    return slugify(fields.get("slug") || fields.get("name") || "");
  };
  const parentOf = (f: T): string => {
    const parent = applyAliases("categories", f.content.fields).fields.get("parent") ?? "";
    return parent ? slugify(parent) : "";
  };
  const byKey = new Map<string, T>();
  for (const f of files) byKey.set(keyOf(f), f);

  const depth = (f: T, seen: Set<T>): number => {
    const parent = byKey.get(parentOf(f));
    if (!parent || parent === f || seen.has(parent)) return 0;
    seen.add(f);
    return depth(parent, seen) + 1;
  };
  return files
    .map((f, index) => ({ f, index, depth: depth(f, new Set()) }))
    .sort((a, b) => a.depth - b.depth || a.index - b.index)
    .map((x) => x.f);
}
