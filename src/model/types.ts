// 内容模型类型：四类内容记录，字段名即数据库列名

/** 内容类型，亦是 content/ 下的子目录名 */
export type ContentType = "categories" | "authors" | "articles" | "trending";


/** 同步顺序：被引用方先于引用方 */
export const CONTENT_TYPES: readonly ContentType[] = ["categories", "authors", "articles", "trending"];


export function isContentType(s: string): s is ContentType {
  return CONTENT_TYPES.some((t) => t === s);
}


/** 文章：作者与分类以 slug 引用，落库时解析为 id */
export type Article = {
  title: string;
  slug: string;
  excerpt: string;
  content: string;
  author: string;
  category: string;
  tags: string[];
  read_time_minutes: number;
  publish_date: string;
  image_url: string;
  hero_image_url: string;
  thumbnail_url: string;
  seo_title: string;
  seo_description: string;
  mobile_title: string;
  mobile_excerpt: string;
  featured: boolean;
  trending: boolean;
};


export type Author = {
  name: string;
  slug: string;
  title: string;
  bio: string;
  extended_bio: string;
  email: string;
  location: string;
  expertise: string[];
  twitter: string;
  linkedin: string;
  image_url: string;
  rating: number;
  is_active: boolean;
  joined_date: string;
};


/** 分类：parent 为父分类 slug，空串表示顶级 */
export type Category = {
  name: string;
  slug: string;
  description: string;
  color: string;
  icon: string;
  sort_order: number;
  parent: string;
  is_featured: boolean;
  content: string;
};


/** 趋势话题：related_articles 为文章 slug 列表 */
export type TrendingTopic = {
  title: string;
  slug: string;
  description: string;
  content: string;
  category: string;
  heat_score: number;
  growth_rate: number;
  momentum: number;
  hashtag: string;
  icon: string;
  status: "active" | "inactive";
  is_active: boolean;
  mentions_youtube: number;
  mentions_tiktok: number;
  mentions_instagram: number;
  mentions_twitter: number;
  mentions_twitch: number;
  related_articles: string[];
};


/** 类型 → 记录结构的映射，供泛型签名使用 */
export interface ContentRecordMap {
  articles: Article;
  authors: Author;
  categories: Category;
  trending: TrendingTopic;
}


export type ContentRecord = ContentRecordMap[ContentType];
