import Database from "better-sqlite3";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ContentStore } from "../src/db/index.js";
import { MissingReferenceError, SlugConflictError, ValidationError } from "../src/errors/index.js";
import { toRecord } from "../src/model/index.js";
import type { ContentRecordMap, ContentType } from "../src/model/types.js";
import { parseContent } from "../src/parser/index.js";
import { Reconciler } from "../src/reconciler/index.js";
import { Sanitizer } from "../src/sanitizer/index.js";
import { FieldValidator } from "../src/validator/index.js";
import { LIMITS, makeTempDir, removeDir } from "./helpers.js";


const validator = new FieldValidator(new Sanitizer(LIMITS), LIMITS);


function build<T extends ContentType>(type: T, text: string): ContentRecordMap[T] {
  return toRecord(type, parseContent(text), validator).record;
}


const TECH = "Name: Tech\nColor: blue\n---\nTechnology news.";
const SAM = "Name: Sam Writer\n---\nSam writes.";
const STORY = "Title: First Story\nAuthor: Sam Writer\nCategory: tech\n---\nStory body.";


describe("Reconciler", () => {
  let dir = "";
  let store: ContentStore;
  let reconciler: Reconciler;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new ContentStore(join(dir, "test.db"));
    reconciler = new Reconciler(store);
  });

  afterEach(async () => {
    store.close();
    await removeDir(dir);
  });

  function seed(): void {
    reconciler.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech.txt", checksum: "c1" });
    reconciler.reconcile("authors", build("authors", SAM), { sourcePath: "authors/sam.txt", checksum: "a1" });
  }

  it("新记录 created，同校验和再次写入 unchanged", () => {
    const record = build("categories", TECH);
    const first = reconciler.reconcile("categories", record, { sourcePath: "categories/tech.txt", checksum: "c1" });
    const second = reconciler.reconcile("categories", record, { sourcePath: "categories/tech.txt", checksum: "c1" });
    expect(first.outcome).toBe("created");
    expect(second.outcome).toBe("unchanged");
    expect(second.id).toBe(first.id);
    expect(store.stats().categories).toBe(1);
  });

  it("校验和变化时原地更新，保留 id 与浏览数", () => {
    seed();
    const created = reconciler.reconcile("articles", build("articles", STORY), { sourcePath: "articles/first.txt", checksum: "s1" });
    const raw = new Database(store.path);
    raw.prepare("UPDATE articles SET views = 42 WHERE id = ?").run(created.id);
    raw.close();

    const edited = build("articles", STORY.replace("Story body.", "Story body, revised."));
    const updated = reconciler.reconcile("articles", edited, { sourcePath: "articles/first.txt", checksum: "s2" });
    expect(updated.outcome).toBe("updated");
    expect(updated.id).toBe(created.id);
    const row = store.getArticle("first-story");
    expect(row?.views).toBe(42);
    expect(row?.content).toBe("Story body, revised.");
    expect(row?.checksum).toBe("s2");
  });

  it("外键按 slug 或名称解析并刷新计数", () => {
    seed();
    reconciler.reconcile("articles", build("articles", STORY), { sourcePath: "articles/first.txt", checksum: "s1" });
    const article = store.getArticle("first-story");
    expect(article?.author_slug).toBe("sam-writer");
    expect(article?.category_slug).toBe("tech");
    expect(store.getAuthor("sam-writer")?.article_count).toBe(1);
    expect(store.getCategory("tech")?.article_count).toBe(1);
  });

  it("另一个源文件占用同一 slug 时抛 SlugConflictError", () => {
    reconciler.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech.txt", checksum: "c1" });
    expect(() =>
      reconciler.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech-copy.txt", checksum: "c2" }),
    ).toThrow(SlugConflictError);
    expect(store.stats().categories).toBe(1);
    expect(store.getCategory("tech")?.source_path).toBe("categories/tech.txt");
  });

  it("占用 slug 的源文件已不存在时由新文件接管", () => {
    const moving = new Reconciler(store, { sourceExists: (path) => path !== "categories/tech.txt" });
    const first = moving.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech.txt", checksum: "c1" });
    const moved = moving.reconcile("categories", build("categories", TECH), { sourcePath: "categories/technology.txt", checksum: "c1" });
    expect(moved).toMatchObject({ outcome: "unchanged", id: first.id });
    expect(store.getCategory("tech")?.source_path).toBe("categories/technology.txt");

    // 新路径仍存在，再有第三个文件同 slug 时冲突
    expect(() =>
      moving.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech-copy.txt", checksum: "c1" }),
    ).toThrow(SlugConflictError);
  });

  it("外键缺失时抛 MissingReferenceError 且不写入", () => {
    seed();
    const orphan = build("articles", "Title: Orphan\nAuthor: nobody\nCategory: tech\n---\nBody.");
    expect(() => reconciler.reconcile("articles", orphan, { sourcePath: "articles/orphan.txt", checksum: "o1" })).toThrow(
      MissingReferenceError,
    );
    expect(store.stats().articles).toBe(0);
    expect(store.getAuthor("sam-writer")?.article_count).toBe(0);
  });

  it("同一源文件改了 slug 视为改名", () => {
    seed();
    const first = reconciler.reconcile("articles", build("articles", STORY), { sourcePath: "articles/first.txt", checksum: "s1" });
    const renamed = build("articles", STORY.replace("First Story", "Renamed Story"));
    const result = reconciler.reconcile("articles", renamed, { sourcePath: "articles/first.txt", checksum: "s2" });
    expect(result).toMatchObject({ outcome: "updated", id: first.id, slug: "renamed-story", previousSlug: "first-story" });
    expect(store.stats().articles).toBe(1);
    expect(store.getArticle("first-story")).toBeUndefined();
  });

  it("父分类缺失、指向自身或成环时拒绝", () => {
    seed();
    const missingParent = build("categories", "Name: Gadgets\nParent: hardware\n---\n");
    expect(() => reconciler.reconcile("categories", missingParent, { sourcePath: "categories/gadgets.txt", checksum: "g1" })).toThrow(
      MissingReferenceError,
    );
    const selfParent = build("categories", "Name: Loop\nParent: loop\n---\n");
    expect(() => reconciler.reconcile("categories", selfParent, { sourcePath: "categories/loop.txt", checksum: "l1" })).toThrow(
      ValidationError,
    );

    reconciler.reconcile("categories", build("categories", "Name: Phones\nParent: tech\n---\n"), { sourcePath: "categories/phones.txt", checksum: "p1" });
    const cycle = build("categories", `${TECH.replace("---", "Parent: phones\n---")}`);
    expect(() => reconciler.reconcile("categories", cycle, { sourcePath: "categories/tech.txt", checksum: "c2" })).toThrow(ValidationError);
    expect(store.getCategory("tech")?.parent_id).toBeNull();
    expect(store.getCategory("phones")?.parent_slug).toBe("tech");
  });

  it("话题的关联文章缺失只记警告，计数取存在的文章", () => {
    seed();
    reconciler.reconcile("articles", build("articles", STORY), { sourcePath: "articles/first.txt", checksum: "s1" });
    const topic = build("trending", "Title: Big Topic\nCategory: tech\nRelated Articles: first-story, gone-story\n---\n");
    const result = reconciler.reconcile("trending", topic, { sourcePath: "trending/big.txt", checksum: "t1" });
    expect(result.outcome).toBe("created");
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].field).toBe("related_articles");
    const row = store.getTrending("big-topic");
    expect(row?.article_count).toBe(1);
    expect(row?.category_slug).toBe("tech");
  });
});


describe("ContentStore", () => {
  it("内存库可用，状态报告包含全部表", () => {
    const store = new ContentStore(":memory:");
    const status = store.status();
    expect(status.tables).toEqual({
      categories: true,
      authors: true,
      articles: true,
      trending_topics: true,
      sync_logs: true,
    });
    expect(status.foreignKeys).toBe(true);
    expect(status.integrity).toBe("ok");
    store.close();
  });

  it("搜索按字面匹配 % 与 _", () => {
    const store = new ContentStore(":memory:");
    const reconciler = new Reconciler(store);
    reconciler.reconcile("categories", build("categories", TECH), { sourcePath: "categories/tech.txt", checksum: "c1" });
    reconciler.reconcile("authors", build("authors", SAM), { sourcePath: "authors/sam.txt", checksum: "a1" });
    reconciler.reconcile("articles", build("articles", "Title: Rates Up 5%\nAuthor: sam-writer\nCategory: tech\n---\nBody."), { sourcePath: "articles/a.txt", checksum: "1" });
    reconciler.reconcile("articles", build("articles", "Title: Rates Up 50\nAuthor: sam-writer\nCategory: tech\n---\nBody."), { sourcePath: "articles/b.txt", checksum: "2" });
    expect(store.searchArticles("5%").map((a) => a.title)).toEqual(["Rates Up 5%"]);
    expect(store.searchArticles("rates").length).toBe(2);
    expect(store.searchArticles("   ")).toEqual([]);
    store.close();
  });
});
