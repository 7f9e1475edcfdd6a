// 页面上下文：从数据库行（含关联作者、分类）组装模板变量

import type { ContentStore } from "../db/index.js";
import type { ArticleView, AuthorRow, CategoryView, TrendingView } from "../db/types.js";
import type { ContentType } from "../model/types.js";
import type { TemplateContext } from "../template/index.js";
import { formatBody } from "./format.js";


/** 各类页面的目录、文件名前缀与模板 */
export const PAGE_LAYOUT: { readonly [K in ContentType]: { dir: string; prefix: string; template: string; listing: string; listingTemplate: string } } = {
  articles: { dir: "articles", prefix: "article_", template: "article.html", listing: "articles.html", listingTemplate: "article-list.html" },
  authors: { dir: "authors", prefix: "author_", template: "author.html", listing: "authors.html", listingTemplate: "author-list.html" },
  categories: { dir: "categories", prefix: "category_", template: "category.html", listing: "categories.html", listingTemplate: "category-list.html" },
  trending: { dir: "trending", prefix: "trend_", template: "trend.html", listing: "trending.html", listingTemplate: "trend-list.html" },
};


/** 详情页相对输出根目录的路径 */
export function pageHref(type: ContentType, slug: string, root = ""): string {
  const layout = PAGE_LAYOUT[type];
  return `${root}${layout.dir}/${layout.prefix}${slug}.html`;
}


function jsonList(s: string): unknown[] {
  try {
    const v: unknown = JSON.parse(s);
    return Array.isArray(v) ? v : [];
  } catch {
    return [];
  }
}


function jsonStrings(s: string): string[] {
  return jsonList(s).filter((x): x is string => typeof x === "string");
}


function jsonNumbers(s: string): number[] {
  return jsonList(s).filter((x): x is number => typeof x === "number");
}


function commaList(s: string | null): string[] {
  return (s ?? "").split(",").map((x) => x.trim()).filter(Boolean);
}


/** 热度分级：按热度与动量 */
export function trendStrength(heatScore: number, momentum: number): string {
  if (heatScore >= 100 && momentum >= 0.5) return "viral";
  if (heatScore >= 50 && momentum >= 0.25) return "hot";
  if (heatScore >= 20 && momentum >= 0.1) return "trending";
  if (heatScore >= 5) return "emerging";
  return "cool";
}


function twitterUrl(value: string | null): string {
  if (!value) return "";
  return /^https?:\/\//i.test(value) ? value : `https://twitter.com/${value}`;
}


/** 列表与卡片用的文章摘要 */
export function articleSummary(row: ArticleView, root: string): TemplateContext {
  return {
    title: row.title,
    slug: row.slug,
    url: pageHref("articles", row.slug, root),
    excerpt: row.excerpt ?? "",
    publish_date: row.publish_date ?? "",
    read_time_minutes: row.read_time_minutes,
    image_url: row.thumbnail_url || row.image_url || "",
    featured: row.featured === 1,
    tags: jsonStrings(row.tags),
    author_name: row.author_name ?? "",
    author_url: row.author_slug ? pageHref("authors", row.author_slug, root) : "",
    category_name: row.category_name ?? "",
    category_url: row.category_slug ? pageHref("categories", row.category_slug, root) : "",
    category_color: row.category_color ?? "",
    category_icon: row.category_icon ?? "",
  };
}


function authorSummary(row: AuthorRow, root: string): TemplateContext {
  return {
    name: row.name,
    slug: row.slug,
    url: pageHref("authors", row.slug, root),
    title: row.title ?? "",
    bio: row.bio ?? "",
    image_url: row.image_url ?? "",
    article_count: row.article_count,
    rating: row.rating.toFixed(1),
    is_active: row.is_active === 1,
    expertise: commaList(row.expertise),
  };
}


function categorySummary(row: CategoryView, root: string): TemplateContext {
  return {
    name: row.name,
    slug: row.slug,
    url: pageHref("categories", row.slug, root),
    description: row.description ?? "",
    color: row.color,
    icon: row.icon,
    article_count: row.article_count,
    is_featured: row.is_featured === 1,
    parent_name: row.parent_name ?? "",
    parent_url: row.parent_slug ? pageHref("categories", row.parent_slug, root) : "",
  };
}


function trendSummary(row: TrendingView, root: string): TemplateContext {
  return {
    title: row.title,
    slug: row.slug,
    url: pageHref("trending", row.slug, root),
    description: row.description ?? "",
    icon: row.icon,
    hashtag: row.hashtag ?? "",
    heat_score: row.heat_score,
    growth: `${row.growth_rate > 0 ? "+" : ""}${row.growth_rate}%`,
    strength: trendStrength(row.heat_score, row.momentum),
    is_active: row.is_active === 1 && row.status === "active",
    article_count: row.article_count,
    category_name: row.category_name ?? "",
    category_url: row.category_slug ? pageHref("categories", row.category_slug, root) : "",
  };
}


const DETAIL_ROOT = "../";


export function articleContext(store: ContentStore, row: ArticleView): TemplateContext {
  const summary = articleSummary(row, DETAIL_ROOT);
  return {
    root: DETAIL_ROOT,
    page_title: row.seo_title || row.title,
    meta_description: row.seo_description || row.excerpt || "",
    mobile_title: row.mobile_title || row.title,
    mobile_excerpt: row.mobile_excerpt || row.excerpt || "",
    article: {
      ...summary,
      content_html: formatBody(row.content ?? ""),
      hero_image_url: row.hero_image_url || row.image_url || "",
      views: row.views,
      likes: row.likes,
      comments: row.comments,
    },
    more_from_author: store
      .listArticlesByAuthor(row.author_id)
      .filter((a) => a.id !== row.id)
      .slice(0, 3)
      .map((a) => articleSummary(a, DETAIL_ROOT)),
  };
}


export function authorContext(store: ContentStore, row: AuthorRow): TemplateContext {
  return {
    root: DETAIL_ROOT,
    page_title: row.name,
    meta_description: row.bio ?? "",
    author: {
      ...authorSummary(row, DETAIL_ROOT),
      extended_bio_html: formatBody(row.extended_bio ?? ""),
      location: row.location ?? "",
      email: row.email ?? "",
      joined_date: row.joined_date ?? "",
      twitter_url: twitterUrl(row.twitter),
      linkedin_url: row.linkedin ?? "",
    },
    articles: store.listArticlesByAuthor(row.id).map((a) => articleSummary(a, DETAIL_ROOT)),
  };
}


export function categoryContext(store: ContentStore, row: CategoryView): TemplateContext {
  return {
    root: DETAIL_ROOT,
    page_title: row.name,
    meta_description: row.description ?? "",
    category: {
      ...categorySummary(row, DETAIL_ROOT),
      content_html: formatBody(row.content ?? ""),
    },
    children: store.listChildCategories(row.id).map((c) => categorySummary(c, DETAIL_ROOT)),
    articles: store.listArticlesByCategory(row.id).map((a) => articleSummary(a, DETAIL_ROOT)),
    topics: store.listTrendingByCategory(row.id).map((t) => trendSummary(t, DETAIL_ROOT)),
  };
}


const PLATFORMS: ReadonlyArray<[label: string, key: keyof TrendingView]> = [
  ["YouTube", "mentions_youtube"],
  ["TikTok", "mentions_tiktok"],
  ["Instagram", "mentions_instagram"],
  ["Twitter", "mentions_twitter"],
  ["Twitch", "mentions_twitch"],
];


export function trendContext(store: ContentStore, row: TrendingView): TemplateContext {
  const mentions = PLATFORMS
    .map(([platform, key]) => ({ platform, count: Number(row[key]) || 0 }))
    .filter((m) => m.count > 0);
  return {
    root: DETAIL_ROOT,
    page_title: row.title,
    meta_description: row.description ?? "",
    topic: {
      ...trendSummary(row, DETAIL_ROOT),
      content_html: formatBody(row.content ?? ""),
      momentum: row.momentum,
      status: row.status,
    },
    mentions,
    total_mentions: mentions.reduce((sum, m) => sum + m.count, 0),
    related: store.listArticlesByIds(jsonNumbers(row.related_articles)).map((a) => articleSummary(a, DETAIL_ROOT)),
  };
}


/** 列表页上下文：位于输出根目录 */
export function listingContext(store: ContentStore, type: ContentType): TemplateContext {
  switch (type) {
    case "articles":
      return { root: "", page_title: "Articles", items: store.listArticles().map((a) => articleSummary(a, "")) };
    case "authors":
      return { root: "", page_title: "Authors", items: store.listAuthors().map((a) => authorSummary(a, "")) };
    case "categories":
      return { root: "", page_title: "Categories", items: store.listCategories().map((c) => categorySummary(c, "")) };
    case "trending":
      return { root: "", page_title: "Trending", items: store.listTrending().map((t) => trendSummary(t, "")) };
  }
}
