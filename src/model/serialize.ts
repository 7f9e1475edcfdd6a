// 规范化序列化：按当前字段名与顺序写回内容文件格式

import type { ContentRecordMap, ContentType } from "./types.js";


type FieldValue = string | number | boolean | string[];


interface Layout {
  fields: readonly string[];
  body: string;
}


/** 每类内容写入元数据块的字段（按顺序）与写入正文的字段 */
const LAYOUT = {
  articles: {
    fields: [
      "title", "slug", "author", "category", "publish_date", "excerpt", "tags", "read_time_minutes",
      "image_url", "hero_image_url", "thumbnail_url", "seo_title", "seo_description",
      "mobile_title", "mobile_excerpt", "featured", "trending",
    ],
    body: "content",
  },
  authors: {
    fields: [
      "name", "slug", "title", "bio", "email", "location", "expertise", "twitter", "linkedin",
      "image_url", "rating", "is_active", "joined_date",
    ],
    body: "extended_bio",
  },
  categories: {
    fields: ["name", "slug", "description", "color", "icon", "sort_order", "parent", "is_featured"],
    body: "content",
  },
  trending: {
    fields: [
      "title", "slug", "description", "category", "heat_score", "growth_rate", "momentum", "hashtag",
      "icon", "status", "is_active", "mentions_youtube", "mentions_tiktok", "mentions_instagram",
      "mentions_twitter", "mentions_twitch", "related_articles",
    ],
    body: "content",
  },
} satisfies { [K in ContentType]: { fields: readonly (keyof ContentRecordMap[K])[]; body: keyof ContentRecordMap[K] } };


function formatValue(value: FieldValue): string {
  if (Array.isArray(value)) return value.join(", ");
  return String(value);
}


/** 写出规范形态：元数据行、分隔行、正文；空值字段省略 */
export function serializeRecord<T extends ContentType>(type: T, record: ContentRecordMap[T], body?: string): string {
  const layout: Layout = LAYOUT[type];
  const values: Readonly<Record<string, FieldValue>> = record;
  const lines: string[] = [];
  for (const key of layout.fields) {
    const text = formatValue(values[key]);
    if (text === "") continue;
    lines.push(`${key}: ${text}`);
  }
  lines.push("---", "", body ?? formatValue(values[layout.body]));
  return lines.join("\n").trimEnd() + "\n";
}
