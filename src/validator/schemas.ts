// 各内容类型的规则表：字段 → 规则；记录级规则补全 slug、正文派生字段

import { z } from "zod";
import type { Article, Author, Category, ContentRecordMap, ContentType, TrendingTopic } from "../model/types.js";
import { bool, color, date, email, float, int, list, oneOf, profileUrl, ref, slug, text, textOr, twitterHandle, url } from "./rules.js";
import type { RuleContext } from "./rules.js";
import { slugify } from "./slug.js";


/** 阅读速度：每分钟 200 词 */
const WORDS_PER_MINUTE = 200;


/** 按正文词数估算阅读时长，至少 1 分钟 */
export function estimateReadTime(body: string): number {
  const words = body.replace(/<[^>]*>/g, " ").split(/\s+/).filter(Boolean).length;
  return Math.max(1, Math.round(words / WORDS_PER_MINUTE));
}


/** 正文首个非空、非标题行的纯文本，用于摘要与描述的缺省值 */
export function firstBodyLine(rc: RuleContext, body: string, max: number): string {
  for (const line of body.split("\n")) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const plain = rc.sanitizer.stripTags(s.replace(/^(?:>|-|\*)\s+/, ""), "body", []);
    if (plain) return plain.length > max ? plain.slice(0, max) : plain;
  }
  return "";
}


type SchemaFactory<T> = (rc: RuleContext, body: string) => z.ZodType<T, z.ZodTypeDef, unknown>;


const articleSchema: SchemaFactory<Article> = (rc, body) => {
  const { limits } = rc;
  return z.object({
    title: text(rc, { required: true, max: limits.maxTitleLength }),
    slug: slug(),
    excerpt: text(rc, { max: limits.maxExcerptLength }),
    author: ref(rc, { required: true }),
    category: ref(rc, { required: true }),
    tags: list(rc, { maxItems: limits.maxTags, maxLength: limits.maxTagLength }),
    read_time_minutes: int(rc, { min: 1, fallback: 0 }),
    publish_date: date(rc),
    image_url: url(rc),
    hero_image_url: url(rc),
    thumbnail_url: url(rc),
    seo_title: text(rc, { max: limits.maxTitleLength }),
    seo_description: text(rc, { max: limits.maxExcerptLength }),
    mobile_title: text(rc, { max: limits.maxTitleLength }),
    mobile_excerpt: text(rc, { max: limits.maxExcerptLength }),
    featured: bool(rc, false),
    trending: bool(rc, false),
  }).transform((v) => {
    const content = rc.sanitizer.sanitizeHtml(body, "content", rc.warnings);
    if (!content.trim()) rc.errors.push("content: 正文为空");
    return {
      ...v,
      slug: v.slug || slugify(v.title),
      excerpt: v.excerpt || firstBodyLine(rc, content, limits.maxExcerptLength),
      content,
      read_time_minutes: v.read_time_minutes || estimateReadTime(content),
    };
  });
};


const authorSchema: SchemaFactory<Author> = (rc, body) => {
  const { limits } = rc;
  return z.object({
    name: text(rc, { required: true, max: limits.maxTitleLength }),
    slug: slug(),
    title: text(rc, { max: limits.maxTitleLength }),
    bio: text(rc, { max: limits.maxExcerptLength }),
    email: email(rc),
    location: text(rc, { max: limits.maxTitleLength }),
    expertise: list(rc, { maxItems: limits.maxTags, maxLength: limits.maxTagLength }),
    twitter: twitterHandle(rc),
    linkedin: profileUrl(rc),
    image_url: url(rc),
    rating: float(rc, { min: 0, max: 5, fallback: 0 }),
    is_active: bool(rc, true),
    joined_date: date(rc),
  }).transform((v) => {
    const extended_bio = rc.sanitizer.sanitizeHtml(body, "extended_bio", rc.warnings);
    return {
      ...v,
      slug: v.slug || slugify(v.name),
      bio: v.bio || firstBodyLine(rc, extended_bio, limits.maxExcerptLength),
      extended_bio,
    };
  });
};


const categorySchema: SchemaFactory<Category> = (rc, body) => {
  const { limits } = rc;
  return z.object({
    name: text(rc, { required: true, max: limits.maxTitleLength }),
    slug: slug(),
    description: text(rc, { max: limits.maxExcerptLength }),
    color: color(),
    icon: textOr(rc, "📁", { max: 16 }),
    sort_order: int(rc, { fallback: 999 }),
    parent: ref(rc),
    is_featured: bool(rc, false),
  }).transform((v) => {
    const content = rc.sanitizer.sanitizeHtml(body, "content", rc.warnings);
    return {
      ...v,
      slug: v.slug || slugify(v.name),
      description: v.description || firstBodyLine(rc, content, limits.maxExcerptLength),
      content,
    };
  });
};


const trendingSchema: SchemaFactory<TrendingTopic> = (rc, body) => {
  const { limits } = rc;
  const mentions = () => int(rc, { min: 0, fallback: 0 });
  return z.object({
    title: text(rc, { required: true, max: limits.maxTitleLength }),
    slug: slug(),
    description: text(rc, { max: limits.maxExcerptLength }),
    category: ref(rc),
    heat_score: int(rc, { min: 0, max: 100, fallback: 0 }),
    growth_rate: float(rc, { fallback: 0 }),
    momentum: float(rc, { fallback: 0 }),
    hashtag: text(rc, { max: limits.maxTagLength }),
    icon: textOr(rc, "🔥", { max: 16 }),
    status: oneOf(rc, ["active", "inactive"], "active"),
    is_active: bool(rc, true),
    mentions_youtube: mentions(),
    mentions_tiktok: mentions(),
    mentions_instagram: mentions(),
    mentions_twitter: mentions(),
    mentions_twitch: mentions(),
    related_articles: list(rc, { normalize: (s) => (s ? slugify(s) : "") }),
  }).transform((v) => {
    const content = rc.sanitizer.sanitizeHtml(body, "content", rc.warnings);
    return {
      ...v,
      slug: v.slug || slugify(v.title),
      description: v.description || firstBodyLine(rc, content, limits.maxExcerptLength),
      content,
    };
  });
};


/** 类型 → 规则表 */
export const SCHEMAS: { [K in ContentType]: SchemaFactory<ContentRecordMap[K]> } = {
  articles: articleSchema,
  authors: authorSchema,
  categories: categorySchema,
  trending: trendingSchema,
};
