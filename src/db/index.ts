// 数据库模块：管理 SQLite 连接、schema 初始化与四类内容的读写

import Database from "better-sqlite3";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { LogEntry } from "../logger/types.js";
import type { ContentType } from "../model/types.js";
import { slugify } from "../validator/slug.js";
import { SCHEMA_SQL } from "./schema.js";
import { TABLES } from "./types.js";
import type {
  ArticleView,
  AuthorRow,
  CategoryView,
  ExistingRow,
  LogRow,
  SourceRow,
  SqlValue,
  StoreStatus,
  TrendingView,
} from "./types.js";

export { TABLES } from "./types.js";
export type {
  ArticleRow,
  ArticleView,
  AuthorRow,
  BaseRow,
  CategoryRow,
  CategoryView,
  ExistingRow,
  LogRow,
  RowViewMap,
  SourceRow,
  SqlValue,
  StoreStatus,
  TrendingRow,
  TrendingView,
} from "./types.js";


/** 源文件可写的列（不含 id、计数器与时间戳） */
const WRITABLE_COLUMNS: { readonly [K in ContentType]: readonly string[] } = {
  articles: [
    "title", "slug", "excerpt", "content", "author_id", "category_id", "featured", "trending",
    "publish_date", "image_url", "hero_image_url", "thumbnail_url", "tags", "read_time_minutes",
    "seo_title", "seo_description", "mobile_title", "mobile_excerpt", "source_path", "checksum",
  ],
  authors: [
    "name", "slug", "title", "bio", "extended_bio", "email", "location", "expertise", "twitter",
    "linkedin", "image_url", "joined_date", "rating", "is_active", "source_path", "checksum",
  ],
  categories: [
    "name", "slug", "description", "content", "color", "icon", "parent_id", "sort_order",
    "is_featured", "source_path", "checksum",
  ],
  trending: [
    "title", "slug", "description", "content", "heat_score", "growth_rate", "momentum",
    "related_articles", "hashtag", "icon", "category_id", "status", "mentions_youtube",
    "mentions_tiktok", "mentions_instagram", "mentions_twitter", "mentions_twitch", "is_active",
    "source_path", "checksum",
  ],
};


const ARTICLE_VIEW_SQL = `
  SELECT a.*,
         au.name AS author_name, au.slug AS author_slug, au.image_url AS author_image_url,
         c.name AS category_name, c.slug AS category_slug, c.color AS category_color, c.icon AS category_icon
  FROM articles a
  LEFT JOIN authors au ON au.id = a.author_id
  LEFT JOIN categories c ON c.id = a.category_id
`;


const ARTICLE_ORDER = "ORDER BY COALESCE(a.publish_date, '') DESC, a.id DESC";


const CATEGORY_VIEW_SQL = `
  SELECT c.*, p.name AS parent_name, p.slug AS parent_slug
  FROM categories c
  LEFT JOIN categories p ON p.id = c.parent_id
`;


const TRENDING_VIEW_SQL = `
  SELECT t.*, c.name AS category_name, c.slug AS category_slug
  FROM trending_topics t
  LEFT JOIN categories c ON c.id = t.category_id
`;


function assertColumns(type: ContentType, columns: Record<string, SqlValue>): string[] {
  const keys = Object.keys(columns);
  const allowed = WRITABLE_COLUMNS[type];
  const unknown = keys.filter((k) => !allowed.includes(k));
  if (unknown.length > 0) {
    throw new Error(`${TABLES[type]} 不可写的列: ${unknown.join(", ")}`);
  }
  return keys;
}


/** LIKE 模式转义：% _ \ 按字面匹配 */
function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}


/** 内容库：每条流水线打开一次，显式传给入库与页面生成 */
export class ContentStore {
  readonly path: string;
  private readonly db: Database.Database;

  constructor(path: string) {
    this.path = path;
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  /** 在单个事务中执行；抛错即回滚 */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  // ---- 入库 ----

  findBySlug(type: ContentType, slug: string): ExistingRow | undefined {
    return this.db
      .prepare<{ slug: string }, ExistingRow>(`SELECT id, source_path, checksum FROM ${TABLES[type]} WHERE slug = @slug`)
      .get({ slug });
  }

  /** 同一源文件此前写入的行（slug 改名时用） */
  findBySource(type: ContentType, sourcePath: string): (ExistingRow & { slug: string }) | undefined {
    return this.db
      .prepare<{ sourcePath: string }, ExistingRow & { slug: string }>(
        `SELECT id, slug, source_path, checksum FROM ${TABLES[type]} WHERE source_path = @sourcePath ORDER BY id LIMIT 1`,
      )
      .get({ sourcePath });
  }

  /** 分类的父分类 id，不存在时为 null */
  getCategoryParent(id: number): number | null {
    const row = this.db
      .prepare<{ id: number }, { parent_id: number | null }>("SELECT parent_id FROM categories WHERE id = @id")
      .get({ id });
    return row?.parent_id ?? null;
  }

  /** 引用解析：先按 slug，再按名称/标题（不区分大小写） */
  resolveRef(type: "authors" | "categories" | "articles", ref: string): number | undefined {
    const nameColumn = type === "articles" ? "title" : "name";
    const row = this.db
      .prepare<{ ref: string; slug: string }, { id: number }>(`
        SELECT id FROM ${TABLES[type]}
        WHERE slug = @slug OR slug = @ref OR lower(${nameColumn}) = lower(@ref)
        ORDER BY (slug = @slug) DESC, (slug = @ref) DESC, id
        LIMIT 1
      `)
      .get({ ref: ref.trim(), slug: slugify(ref) });
    return row?.id;
  }

  /** 新增一行，返回 id */
  insert(type: ContentType, columns: Record<string, SqlValue>): number {
    const keys = assertColumns(type, columns);
    const sql = `INSERT INTO ${TABLES[type]} (${keys.join(", ")}) VALUES (${keys.map((k) => `@${k}`).join(", ")})`;
    const info = this.db.prepare<Record<string, SqlValue>>(sql).run(columns);
    return Number(info.lastInsertRowid);
  }

  /** 原地更新可写列，id 与计数器保持不变 */
  update(type: ContentType, id: number, columns: Record<string, SqlValue>): void {
    const keys = assertColumns(type, columns);
    const sets = keys.map((k) => `${k} = @${k}`).join(", ");
    this.db
      .prepare<Record<string, SqlValue>>(`UPDATE ${TABLES[type]} SET ${sets}, updated_at = CURRENT_TIMESTAMP WHERE id = @__id`)
      .run({ ...columns, __id: id });
  }

  /** 重新计算冗余计数：作者/分类文章数、话题关联文章数 */
  refreshCounters(): void {
    this.db.exec(`
      UPDATE authors SET article_count = (SELECT COUNT(*) FROM articles WHERE author_id = authors.id)
      WHERE article_count != (SELECT COUNT(*) FROM articles WHERE author_id = authors.id);
      UPDATE categories SET article_count = (SELECT COUNT(*) FROM articles WHERE category_id = categories.id)
      WHERE article_count != (SELECT COUNT(*) FROM articles WHERE category_id = categories.id);
      UPDATE trending_topics SET article_count = (
        SELECT COUNT(*) FROM json_each(trending_topics.related_articles) j JOIN articles a ON a.id = j.value
      )
      WHERE article_count != (
        SELECT COUNT(*) FROM json_each(trending_topics.related_articles) j JOIN articles a ON a.id = j.value
      );
    `);
  }

  // ---- 查询 ----

  getArticle(slug: string): ArticleView | undefined {
    return this.db.prepare<{ slug: string }, ArticleView>(`${ARTICLE_VIEW_SQL} WHERE a.slug = @slug`).get({ slug });
  }

  listArticles(): ArticleView[] {
    return this.db.prepare<[], ArticleView>(`${ARTICLE_VIEW_SQL} ${ARTICLE_ORDER}`).all();
  }

  listArticlesByAuthor(authorId: number): ArticleView[] {
    return this.db
      .prepare<{ authorId: number }, ArticleView>(`${ARTICLE_VIEW_SQL} WHERE a.author_id = @authorId ${ARTICLE_ORDER}`)
      .all({ authorId });
  }

  listArticlesByCategory(categoryId: number): ArticleView[] {
    return this.db
      .prepare<{ categoryId: number }, ArticleView>(`${ARTICLE_VIEW_SQL} WHERE a.category_id = @categoryId ${ARTICLE_ORDER}`)
      .all({ categoryId });
  }

  /** 按 id 取文章，保持传入顺序，缺失的 id 跳过 */
  listArticlesByIds(ids: number[]): ArticleView[] {
    const stmt = this.db.prepare<{ id: number }, ArticleView>(`${ARTICLE_VIEW_SQL} WHERE a.id = @id`);
    const out: ArticleView[] = [];
    for (const id of ids) {
      const row = stmt.get({ id });
      if (row) out.push(row);
    }
    return out;
  }

  getAuthor(slug: string): AuthorRow | undefined {
    return this.db.prepare<{ slug: string }, AuthorRow>("SELECT * FROM authors WHERE slug = @slug").get({ slug });
  }

  listAuthors(): AuthorRow[] {
    return this.db.prepare<[], AuthorRow>("SELECT * FROM authors ORDER BY name, slug").all();
  }

  getCategory(slug: string): CategoryView | undefined {
    return this.db.prepare<{ slug: string }, CategoryView>(`${CATEGORY_VIEW_SQL} WHERE c.slug = @slug`).get({ slug });
  }

  listCategories(): CategoryView[] {
    return this.db.prepare<[], CategoryView>(`${CATEGORY_VIEW_SQL} ORDER BY c.sort_order, c.name, c.slug`).all();
  }

  listChildCategories(parentId: number): CategoryView[] {
    return this.db
      .prepare<{ parentId: number }, CategoryView>(`${CATEGORY_VIEW_SQL} WHERE c.parent_id = @parentId ORDER BY c.sort_order, c.name, c.slug`)
      .all({ parentId });
  }

  getTrending(slug: string): TrendingView | undefined {
    return this.db.prepare<{ slug: string }, TrendingView>(`${TRENDING_VIEW_SQL} WHERE t.slug = @slug`).get({ slug });
  }

  listTrending(): TrendingView[] {
    return this.db.prepare<[], TrendingView>(`${TRENDING_VIEW_SQL} ORDER BY t.heat_score DESC, t.title, t.slug`).all();
  }

  listTrendingByCategory(categoryId: number): TrendingView[] {
    return this.db
      .prepare<{ categoryId: number }, TrendingView>(`${TRENDING_VIEW_SQL} WHERE t.category_id = @categoryId ORDER BY t.heat_score DESC, t.title, t.slug`)
      .all({ categoryId });
  }

  /** 只读搜索契约：标题、摘要、正文、标签的 LIKE 匹配 */
  searchArticles(term: string, limit = 20): ArticleView[] {
    const q = term.trim();
    if (!q) return [];
    return this.db
      .prepare<{ pattern: string; limit: number }, ArticleView>(`
        ${ARTICLE_VIEW_SQL}
        WHERE a.title LIKE @pattern ESCAPE '\\' OR a.excerpt LIKE @pattern ESCAPE '\\'
           OR a.content LIKE @pattern ESCAPE '\\' OR a.tags LIKE @pattern ESCAPE '\\'
        ${ARTICLE_ORDER}
        LIMIT @limit
      `)
      .all({ pattern: likePattern(q), limit });
  }

  // ---- 清理 ----

  listSources(type: ContentType): SourceRow[] {
    return this.db
      .prepare<[], SourceRow>(`SELECT id, slug, source_path FROM ${TABLES[type]} ORDER BY slug`)
      .all();
  }

  /** 引用该行的其他行数量；大于 0 时不可删除 */
  countReferences(type: ContentType, id: number): number {
    const count = (sql: string): number =>
      this.db.prepare<{ id: number }, { n: number }>(sql).get({ id })?.n ?? 0;
    switch (type) {
      case "authors":
        return count("SELECT COUNT(*) AS n FROM articles WHERE author_id = @id");
      case "categories":
        return count("SELECT COUNT(*) AS n FROM articles WHERE category_id = @id")
          + count("SELECT COUNT(*) AS n FROM categories WHERE parent_id = @id")
          + count("SELECT COUNT(*) AS n FROM trending_topics WHERE category_id = @id");
      case "articles":
      case "trending":
        return 0;
    }
  }

  deleteRow(type: ContentType, id: number): void {
    this.db.prepare<{ id: number }>(`DELETE FROM ${TABLES[type]} WHERE id = @id`).run({ id });
  }

  // ---- 运维 ----

  /** 各表行数 */
  stats(): Record<ContentType | "sync_logs", number> {
    const count = (table: string): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
    return {
      categories: count(TABLES.categories),
      authors: count(TABLES.authors),
      articles: count(TABLES.articles),
      trending: count(TABLES.trending),
      sync_logs: count("sync_logs"),
    };
  }

  status(): StoreStatus {
    const present = new Set(
      this.db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
        .all()
        .map((r) => r.name),
    );
    const tables: Record<string, boolean> = {};
    for (const table of [...Object.values(TABLES), "sync_logs"]) {
      tables[table] = present.has(table);
    }
    return {
      path: this.path,
      tables,
      foreignKeys: this.db.pragma("foreign_keys", { simple: true }) === 1,
      journalMode: String(this.db.pragma("journal_mode", { simple: true })),
      integrity: String(this.db.pragma("integrity_check", { simple: true })),
    };
  }

  /** SQLite 在线备份到目标文件 */
  async backup(destination: string): Promise<void> {
    await this.db.backup(destination);
  }

  insertLog(entry: LogEntry): void {
    this.db
      .prepare<Record<string, SqlValue>>(`
        INSERT INTO sync_logs (level, category, message, payload, source_path, created_at)
        VALUES (@level, @category, @message, @payload, @source_path, @created_at)
      `)
      .run({
        level: entry.level,
        category: entry.category,
        message: entry.message,
        payload: entry.payload ? JSON.stringify(entry.payload) : null,
        source_path: entry.source_path ?? null,
        created_at: entry.created_at,
      });
  }

  /** 最近的落库日志，新的在前 */
  recentLogs(limit = 10): LogRow[] {
    return this.db
      .prepare<{ limit: number }, LogRow>(`
        SELECT level, category, message, source_path, created_at FROM sync_logs ORDER BY id DESC LIMIT @limit
      `)
      .all({ limit });
  }
}


/** 打开（或创建）内容库，自动创建所在目录 */
export async function openStore(path: string): Promise<ContentStore> {
  if (path !== ":memory:") {
    await mkdir(dirname(path), { recursive: true });
  }
  return new ContentStore(path);
}
