// slug 生成：小写、连字符分隔、URL 安全

const MAX_SLUG_LENGTH = 100;


/** 由标题或名称生成 slug；空输入返回 "untitled" */
export function slugify(input: string): string {
  const slug = input
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, "")
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, "");
  return slug || "untitled";
}
