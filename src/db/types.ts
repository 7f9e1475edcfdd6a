// 数据库行类型：布尔列以 0/1 存储，列表列为 JSON 数组字符串

import type { LogEntry } from "../logger/types.js";
import type { ContentType } from "../model/types.js";


/** 可绑定到 better-sqlite3 语句的值 */
export type SqlValue = string | number | null;


/** 内容类型 → 表名 */
export const TABLES: { readonly [K in ContentType]: string } = {
  articles: "articles",
  authors: "authors",
  categories: "categories",
  trending: "trending_topics",
};


/** 各表公共列 */
export interface BaseRow {
  id: number;
  slug: string;
  source_path: string | null;
  checksum: string | null;
  created_at: string;
  updated_at: string;
}


export interface ArticleRow extends BaseRow {
  title: string;
  excerpt: string | null;
  content: string | null;
  author_id: number;
  category_id: number;
  featured: number;
  trending: number;
  publish_date: string | null;
  image_url: string | null;
  hero_image_url: string | null;
  thumbnail_url: string | null;
  tags: string;
  views: number;
  likes: number;
  comments: number;
  read_time_minutes: number;
  seo_title: string | null;
  seo_description: string | null;
  mobile_title: string | null;
  mobile_excerpt: string | null;
}


/** 文章行 + 作者、分类的展示字段（LEFT JOIN） */
export interface ArticleView extends ArticleRow {
  author_name: string | null;
  author_slug: string | null;
  author_image_url: string | null;
  category_name: string | null;
  category_slug: string | null;
  category_color: string | null;
  category_icon: string | null;
}


export interface AuthorRow extends BaseRow {
  name: string;
  title: string | null;
  bio: string | null;
  extended_bio: string | null;
  email: string | null;
  location: string | null;
  expertise: string | null;
  twitter: string | null;
  linkedin: string | null;
  image_url: string | null;
  joined_date: string | null;
  article_count: number;
  rating: number;
  is_active: number;
}


export interface CategoryRow extends BaseRow {
  name: string;
  description: string | null;
  content: string | null;
  color: string;
  icon: string;
  parent_id: number | null;
  sort_order: number;
  article_count: number;
  is_featured: number;
}


/** 分类行 + 父分类展示字段 */
export interface CategoryView extends CategoryRow {
  parent_name: string | null;
  parent_slug: string | null;
}


export interface TrendingRow extends BaseRow {
  title: string;
  description: string | null;
  content: string | null;
  heat_score: number;
  growth_rate: number;
  momentum: number;
  article_count: number;
  related_articles: string;
  hashtag: string | null;
  icon: string;
  category_id: number | null;
  status: string;
  mentions_youtube: number;
  mentions_tiktok: number;
  mentions_instagram: number;
  mentions_twitter: number;
  mentions_twitch: number;
  is_active: number;
}


/** 话题行 + 分类展示字段 */
export interface TrendingView extends TrendingRow {
  category_name: string | null;
  category_slug: string | null;
}


/** 类型 → 详情页所用的行 */
export interface RowViewMap {
  articles: ArticleView;
  authors: AuthorRow;
  categories: CategoryView;
  trending: TrendingView;
}


/** 按 slug 查到的已有记录，供入库比对 */
export interface ExistingRow {
  id: number;
  source_path: string | null;
  checksum: string | null;
}


/** 带来源路径的行摘要，供清理使用 */
export interface SourceRow {
  id: number;
  slug: string;
  source_path: string | null;
}


/** 数据库状态检查结果 */
export interface StoreStatus {
  path: string;
  tables: Record<string, boolean>;
  foreignKeys: boolean;
  journalMode: string;
  integrity: string;
}


/** sync_logs 表中的一条记录 */
export interface LogRow extends Pick<LogEntry, "level" | "category" | "message" | "created_at"> {
  source_path: string | null;
}
