// 数据库结构：四张内容表 + 同步日志表；列名即只读搜索层的读取契约

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS authors (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    name          TEXT NOT NULL,
    slug          TEXT UNIQUE NOT NULL,
    title         TEXT,
    bio           TEXT,
    extended_bio  TEXT,
    email         TEXT,
    location      TEXT,
    expertise     TEXT,
    twitter       TEXT,
    linkedin      TEXT,
    image_url     TEXT,
    joined_date   TEXT,
    article_count INTEGER NOT NULL DEFAULT 0,
    rating        REAL NOT NULL DEFAULT 0.0,
    is_active     INTEGER NOT NULL DEFAULT 1,
    source_path   TEXT,
    checksum      TEXT,
    created_at    TEXT DEFAULT CURRENT_TIMESTAMP,
    updated_at    TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS categories (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    name          TEXT NOT NULL,
    slug          TEXT UNIQUE NOT NULL,
    description   TEXT,
    content       TEXT,
    color         TEXT NOT NULL DEFAULT '#6B7280',
    icon          TEXT NOT NULL DEFAULT '📁',
    parent_id     INTEGER,
    sort_order    INTEGER NOT NULL DEFAULT 999,
    article_count INTEGER NOT NULL DEFAULT 0,
    is_featured   INTEGER NOT NULL DEFAULT 0,
    source_path   TEXT,
    checksum      TEXT,
    created_at    TEXT DEFAULT CURRENT_TIMESTAMP,
    updated_at    TEXT DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (parent_id) REFERENCES categories(id) ON DELETE RESTRICT
  );

  CREATE TABLE IF NOT EXISTS articles (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    title             TEXT NOT NULL,
    slug              TEXT UNIQUE NOT NULL,
    excerpt           TEXT,
    content           TEXT,
    author_id         INTEGER NOT NULL,
    category_id       INTEGER NOT NULL,
    featured          INTEGER NOT NULL DEFAULT 0,
    trending          INTEGER NOT NULL DEFAULT 0,
    publish_date      TEXT,
    image_url         TEXT,
    hero_image_url    TEXT,
    thumbnail_url     TEXT,
    tags              TEXT NOT NULL DEFAULT '[]',
    views             INTEGER NOT NULL DEFAULT 0,
    likes             INTEGER NOT NULL DEFAULT 0,
    comments          INTEGER NOT NULL DEFAULT 0,
    read_time_minutes INTEGER NOT NULL DEFAULT 1,
    seo_title         TEXT,
    seo_description   TEXT,
    mobile_title      TEXT,
    mobile_excerpt    TEXT,
    source_path       TEXT,
    checksum          TEXT,
    created_at        TEXT DEFAULT CURRENT_TIMESTAMP,
    updated_at        TEXT DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (author_id) REFERENCES authors(id) ON DELETE RESTRICT,
    FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE RESTRICT
  );

  CREATE TABLE IF NOT EXISTS trending_topics (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    title              TEXT NOT NULL,
    slug               TEXT UNIQUE NOT NULL,
    description        TEXT,
    content            TEXT,
    heat_score         INTEGER NOT NULL DEFAULT 0 CHECK (heat_score BETWEEN 0 AND 100),
    growth_rate        REAL NOT NULL DEFAULT 0.0,
    momentum           REAL NOT NULL DEFAULT 0.0,
    article_count      INTEGER NOT NULL DEFAULT 0,
    related_articles   TEXT NOT NULL DEFAULT '[]',
    hashtag            TEXT,
    icon               TEXT NOT NULL DEFAULT '🔥',
    category_id        INTEGER,
    status             TEXT NOT NULL DEFAULT 'active',
    mentions_youtube   INTEGER NOT NULL DEFAULT 0,
    mentions_tiktok    INTEGER NOT NULL DEFAULT 0,
    mentions_instagram INTEGER NOT NULL DEFAULT 0,
    mentions_twitter   INTEGER NOT NULL DEFAULT 0,
    mentions_twitch    INTEGER NOT NULL DEFAULT 0,
    is_active          INTEGER NOT NULL DEFAULT 1,
    source_path        TEXT,
    checksum           TEXT,
    created_at         TEXT DEFAULT CURRENT_TIMESTAMP,
    updated_at         TEXT DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE RESTRICT
  );

  CREATE TABLE IF NOT EXISTS sync_logs (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    level       TEXT NOT NULL,
    category    TEXT NOT NULL,
    message     TEXT NOT NULL,
    payload     TEXT,
    source_path TEXT,
    created_at  TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_articles_author       ON articles(author_id);
  CREATE INDEX IF NOT EXISTS idx_articles_category     ON articles(category_id);
  CREATE INDEX IF NOT EXISTS idx_articles_publish_date ON articles(publish_date DESC);
  CREATE INDEX IF NOT EXISTS idx_categories_parent     ON categories(parent_id);
  CREATE INDEX IF NOT EXISTS idx_categories_sort       ON categories(sort_order);
  CREATE INDEX IF NOT EXISTS idx_trending_heat         ON trending_topics(heat_score DESC);
  CREATE INDEX IF NOT EXISTS idx_trending_category     ON trending_topics(category_id);
  CREATE INDEX IF NOT EXISTS idx_sync_logs_created     ON sync_logs(created_at);
`;
