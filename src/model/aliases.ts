// 旧字段别名表：旧键 → 规范键，在校验之前显式套用

import type { ContentType } from "./types.js";


/** 每类内容的别名；同一文件中规范键与旧键并存时规范键优先 */
export const FIELD_ALIASES: { readonly [K in ContentType]: ReadonlyMap<string, string> } = {
  articles: new Map([
    ["subtitle", "excerpt"],
    ["publication_date", "publish_date"],
    ["date", "publish_date"],
    ["read_time", "read_time_minutes"],
    ["meta_description", "seo_description"],
    ["image", "image_url"],
    ["hero_image", "hero_image_url"],
    ["thumbnail", "thumbnail_url"],
    ["author_slug", "author"],
    ["author_name", "author"],
    ["category_slug", "category"],
    ["category_name", "category"],
    ["is_featured", "featured"],
  ]),
  authors: new Map([
    ["twitter_handle", "twitter"],
    ["linkedin_url", "linkedin"],
    ["image", "image_url"],
    ["avatar", "image_url"],
    ["job_title", "title"],
  ]),
  categories: new Map([
    ["featured", "is_featured"],
    ["parent_id", "parent"],
    ["parent_slug", "parent"],
    ["category_icon", "icon"],
  ]),
  trending: new Map([
    ["topic", "title"],
    ["trend_score", "heat_score"],
    ["youtube_mentions", "mentions_youtube"],
    ["tiktok_mentions", "mentions_tiktok"],
    ["instagram_mentions", "mentions_instagram"],
    ["twitter_mentions", "mentions_twitter"],
    ["twitch_mentions", "mentions_twitch"],
    ["category_slug", "category"],
  ]),
};


/** 由服务端维护的字段：源文件中出现也忽略 */
export const SERVER_OWNED_FIELDS: readonly string[] = [
  "id", "views", "view_count", "likes", "comments", "article_count", "articles_written",
  "created_at", "updated_at", "checksum",
];


export interface AliasResult {
  fields: Map<string, string>;
  /** 实际命中的旧键 */
  legacyKeys: string[];
  /** 被忽略的服务端字段 */
  ignored: string[];
}


/** 把旧键改写为规范键，保持字段顺序 */
export function applyAliases(type: ContentType, fields: ReadonlyMap<string, string>): AliasResult {
  const aliases = FIELD_ALIASES[type];
  const out = new Map<string, string>();
  const legacyKeys: string[] = [];
  const ignored: string[] = [];
  for (const [key, value] of fields) {
    if (SERVER_OWNED_FIELDS.includes(key)) {
      ignored.push(key);
      continue;
    }
    const canonical = aliases.get(key);
    if (canonical === undefined) {
      out.set(key, value);
      continue;
    }
    legacyKeys.push(key);
    if (fields.has(canonical)) continue;
    if (!out.has(canonical)) out.set(canonical, value);
  }
  return { fields: out, legacyKeys, ignored };
}
