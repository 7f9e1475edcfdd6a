// 记录 → 表列：解析外键，布尔转 0/1，列表序列化

import type { ContentStore } from "../db/index.js";
import type { SqlValue } from "../db/types.js";
import { MissingReferenceError, ValidationError } from "../errors/index.js";
import type { SanitizationWarning } from "../errors/index.js";
import type { ContentRecordMap, ContentType } from "../model/types.js";
import { slugify } from "../validator/slug.js";


export interface ColumnContext {
  store: ContentStore;
  warnings: SanitizationWarning[];
  /** 已有行的 id，用于分类环检测 */
  existingId?: number;
}


type Columns = Record<string, SqlValue>;


function flag(b: boolean): number {
  return b ? 1 : 0;
}


function requireRef(ctx: ColumnContext, field: string, target: "authors" | "categories", ref: string): number {
  const id = ctx.store.resolveRef(target, ref);
  if (id === undefined) throw new MissingReferenceError(field, target, ref);
  return id;
}


function optionalRef(ctx: ColumnContext, field: string, target: "categories", ref: string): number | null {
  return ref ? requireRef(ctx, field, target, ref) : null;
}


/** 父分类不能是自身或自身的后代 */
function assertNoCycle(ctx: ColumnContext, parentId: number): void {
  if (ctx.existingId === undefined) return;
  const seen = new Set<number>();
  let cursor: number | null = parentId;
  while (cursor !== null && !seen.has(cursor)) {
    if (cursor === ctx.existingId) {
      throw new ValidationError(["parent: 分类层级出现循环"]);
    }
    seen.add(cursor);
    cursor = ctx.store.getCategoryParent(cursor);
  }
}


/** 每类记录的列构造器；外键缺失抛 MissingReferenceError */
export const COLUMN_BUILDERS: { [K in ContentType]: (record: ContentRecordMap[K], ctx: ColumnContext) => Columns } = {
  articles: (r, ctx) => ({
    title: r.title,
    slug: r.slug,
    excerpt: r.excerpt,
    content: r.content,
    author_id: requireRef(ctx, "author", "authors", r.author),
    category_id: requireRef(ctx, "category", "categories", r.category),
    featured: flag(r.featured),
    trending: flag(r.trending),
    publish_date: r.publish_date || null,
    image_url: r.image_url,
    hero_image_url: r.hero_image_url,
    thumbnail_url: r.thumbnail_url,
    tags: JSON.stringify(r.tags),
    read_time_minutes: r.read_time_minutes,
    seo_title: r.seo_title,
    seo_description: r.seo_description,
    mobile_title: r.mobile_title,
    mobile_excerpt: r.mobile_excerpt,
  }),

  authors: (r) => ({
    name: r.name,
    slug: r.slug,
    title: r.title,
    bio: r.bio,
    extended_bio: r.extended_bio,
    email: r.email,
    location: r.location,
    expertise: r.expertise.join(", "),
    twitter: r.twitter,
    linkedin: r.linkedin,
    image_url: r.image_url,
    joined_date: r.joined_date || null,
    rating: r.rating,
    is_active: flag(r.is_active),
  }),

  categories: (r, ctx) => {
    let parentId: number | null = null;
    if (r.parent) {
      if (slugify(r.parent) === r.slug || r.parent.toLowerCase() === r.name.toLowerCase()) {
        throw new ValidationError(["parent: 分类不能以自身为父分类"]);
      }
      parentId = requireRef(ctx, "parent", "categories", r.parent);
      assertNoCycle(ctx, parentId);
    }
    return {
      name: r.name,
      slug: r.slug,
      description: r.description,
      content: r.content,
      color: r.color,
      icon: r.icon,
      parent_id: parentId,
      sort_order: r.sort_order,
      is_featured: flag(r.is_featured),
    };
  },

  trending: (r, ctx) => {
    const related: number[] = [];
    for (const slug of r.related_articles) {
      const id = ctx.store.resolveRef("articles", slug);
      if (id === undefined) {
        ctx.warnings.push({ field: "related_articles", message: `关联文章 "${slug}" 不存在，已跳过` });
      } else if (!related.includes(id)) {
        related.push(id);
      }
    }
    return {
      title: r.title,
      slug: r.slug,
      description: r.description,
      content: r.content,
      heat_score: r.heat_score,
      growth_rate: r.growth_rate,
      momentum: r.momentum,
      related_articles: JSON.stringify(related),
      hashtag: r.hashtag,
      icon: r.icon,
      category_id: optionalRef(ctx, "category", "categories", r.category),
      status: r.status,
      mentions_youtube: r.mentions_youtube,
      mentions_tiktok: r.mentions_tiktok,
      mentions_instagram: r.mentions_instagram,
      mentions_twitter: r.mentions_twitter,
      mentions_twitch: r.mentions_twitch,
      is_active: flag(r.is_active),
    };
  },
};
