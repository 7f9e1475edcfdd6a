import Database from "better-sqlite3";
import { appendFile, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { NewsdeskConfig } from "../src/config/types.js";
import { parseContent } from "../src/parser/index.js";
import { ContentPipeline } from "../src/pipeline/index.js";
import { makeWorkspace, removeDir } from "./helpers.js";


async function listFiles(dir: string): Promise<string[]> {
  const out: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) out.push(...(await listFiles(path)));
    else if (entry.isFile()) out.push(path);
  }
  return out.sort();
}


async function snapshotPages(dir: string): Promise<Map<string, string>> {
  const pages = new Map<string, string>();
  for (const path of await listFiles(dir)) {
    pages.set(path, await readFile(path, "utf-8"));
  }
  return pages;
}


describe("ContentPipeline", () => {
  let config: NewsdeskConfig;
  let pipeline: ContentPipeline;

  beforeEach(async () => {
    config = await makeWorkspace();
    pipeline = await ContentPipeline.open(config);
  });

  afterEach(async () => {
    pipeline.close();
    await removeDir(config.rootDir);
  });

  const contentPath = (rel: string): string => join(config.paths.contentDir, rel);
  const outputPath = (rel: string): string => join(config.paths.outputDir, rel);

  it("首次同步写入全部内容，旧字段被映射", async () => {
    const summary = await pipeline.sync();
    expect(summary.failures).toEqual([]);
    expect(summary.failedRequired).toBe(false);
    expect(summary.types.categories).toMatchObject({ created: 2, failed: 0 });
    expect(summary.types.authors).toMatchObject({ created: 1, failed: 0 });
    expect(summary.types.articles).toMatchObject({ created: 2, failed: 0 });
    expect(summary.types.trending).toMatchObject({ created: 1, failed: 0, warnings: 3 });

    const store = pipeline.store;
    const tech = store.getCategory("technology");
    expect(tech).toMatchObject({ color: "#3B82F6", icon: "💻", sort_order: 1, is_featured: 1, article_count: 1 });
    expect(store.getCategory("ai")).toMatchObject({ parent_slug: "technology", color: "#8B5CF6", article_count: 1 });

    expect(store.getAuthor("jane-doe")).toMatchObject({
      twitter: "janedoe",
      linkedin: "https://linkedin.com/in/janedoe",
      title: "Senior Tech Reporter",
      expertise: "gadgets, AI, startups",
      article_count: 2,
    });

    const phone = store.getArticle("new-phone-launch-draws-crowds");
    expect(phone).toMatchObject({
      excerpt: "Lines formed early at flagship stores.",
      publish_date: "2024-05-02",
      read_time_minutes: 4,
      seo_description: "Crowds gather for the new phone.",
      tags: '["phones","launch","retail"]',
      views: 0,
      author_slug: "jane-doe",
      category_slug: "technology",
    });

    const topic = store.getTrending("ai-agents");
    expect(topic).toMatchObject({
      title: "AI Agents",
      heat_score: 100,
      growth_rate: 35.5,
      momentum: 0,
      is_active: 1,
      mentions_youtube: 1200,
      mentions_tiktok: 0,
      article_count: 1,
      category_slug: "ai",
      description: "Autonomous agents are everywhere this month.",
    });
  });

  it("生成详情页与列表页", async () => {
    await pipeline.sync();
    const pages = (await listFiles(config.paths.outputDir)).map((p) => p.slice(config.paths.outputDir.length + 1));
    expect(pages).toEqual([
      "articles.html",
      "articles/article_ai-chip-startup-raises-funding.html",
      "articles/article_new-phone-launch-draws-crowds.html",
      "authors.html",
      "authors/author_jane-doe.html",
      "categories.html",
      "categories/category_ai.html",
      "categories/category_technology.html",
      "trending.html",
      "trending/trend_ai-agents.html",
    ].map((p) => join(p)));

    const article = await readFile(outputPath("articles/article_new-phone-launch-draws-crowds.html"), "utf-8");
    expect(article).toContain("<h1>New Phone Launch Draws Crowds</h1>");
    expect(article).toContain("<h2>Launch Day</h2>");
    expect(article).toContain("<blockquote><p>It was worth the wait</p><footer>— A shopper</footer></blockquote>");
    expect(article).toContain("<li>Longer battery</li>");
  });

  it("第二次同步全部 unchanged，不写任何页面", async () => {
    await pipeline.sync();
    const before = await snapshotPages(config.paths.outputDir);
    const mtime = (await stat(outputPath("articles.html"))).mtimeMs;

    const summary = await pipeline.sync();
    for (const report of Object.values(summary.types)) {
      expect(report).toMatchObject({ created: 0, updated: 0, failed: 0 });
    }
    expect(summary.types.categories?.unchanged).toBe(2);
    expect(summary.types.articles?.unchanged).toBe(2);
    expect(summary.pages.written).toBe(0);
    expect(await snapshotPages(config.paths.outputDir)).toEqual(before);
    expect((await stat(outputPath("articles.html"))).mtimeMs).toBe(mtime);
  });

  it("源文件修改后原地更新，保留浏览数", async () => {
    await pipeline.sync();
    const before = pipeline.store.getArticle("ai-chip-startup-raises-funding");
    const raw = new Database(config.database.path);
    raw.prepare("UPDATE articles SET views = 42 WHERE slug = ?").run("ai-chip-startup-raises-funding");
    raw.close();

    await appendFile(contentPath("articles/ai-chip.txt"), "\nInvestors expect a product next year.\n", "utf-8");
    const summary = await pipeline.sync(["articles"]);
    expect(summary.types.articles).toMatchObject({ updated: 1, unchanged: 1 });

    const after = pipeline.store.getArticle("ai-chip-startup-raises-funding");
    expect(after?.id).toBe(before?.id);
    expect(after?.views).toBe(42);
    expect(after?.content).toContain("Investors expect a product next year.");
    const page = await readFile(outputPath("articles/article_ai-chip-startup-raises-funding.html"), "utf-8");
    expect(page).toContain("Investors expect a product next year.");
  });

  it("单个文件失败不影响其余文件，必需类型失败时标记", async () => {
    await writeFile(contentPath("articles/broken.txt"), "Title: No Separator\nBody text\n", "utf-8");
    await writeFile(contentPath("articles/orphan.txt"), "Title: Orphan Story\nAuthor: ghost\nCategory: technology\n---\nBody.\n", "utf-8");

    const summary = await pipeline.sync();
    expect(summary.types.articles).toMatchObject({ created: 2, failed: 2 });
    expect(summary.failures.map((f) => [f.sourcePath, f.kind])).toEqual([
      ["articles/broken.txt", "format"],
      ["articles/orphan.txt", "reference"],
    ]);
    expect(summary.failedRequired).toBe(true);
    expect(pipeline.store.stats().articles).toBe(2);
    expect(pipeline.store.getArticle("orphan-story")).toBeUndefined();
  });

  it("失败类型不在必需列表时不标记", async () => {
    pipeline.close();
    pipeline = await ContentPipeline.open({ ...config, sync: { ...config.sync, requiredTypes: ["authors"] } });
    await writeFile(contentPath("articles/broken.txt"), "no separator here\n", "utf-8");
    const summary = await pipeline.sync();
    expect(summary.types.articles?.failed).toBe(1);
    expect(summary.failedRequired).toBe(false);
  });

  it("两个源文件使用同一 slug 时后者失败", async () => {
    await writeFile(contentPath("categories/tech-copy.txt"), "Name: Technology\n---\nDuplicate.\n", "utf-8");
    const summary = await pipeline.sync(["categories"]);
    expect(summary.types.categories).toMatchObject({ created: 2, failed: 1 });
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].kind).toBe("validation");
  });

  it("被引用的作者文件改名后由新路径接管原行", async () => {
    await pipeline.sync();
    const before = pipeline.store.getAuthor("jane-doe");
    await rename(contentPath("authors/jane-doe.txt"), contentPath("authors/jane.txt"));

    const summary = await pipeline.sync();
    expect(summary.failures).toEqual([]);
    expect(summary.failedRequired).toBe(false);
    expect(summary.types.authors).toMatchObject({ created: 0, updated: 0, unchanged: 1, failed: 0 });

    const after = pipeline.store.getAuthor("jane-doe");
    expect(after?.id).toBe(before?.id);
    expect(after?.source_path).toBe("authors/jane.txt");
    expect(after?.article_count).toBe(2);
    expect(pipeline.store.stats().authors).toBe(1);

    expect(await pipeline.prune("authors")).toMatchObject({ deleted: [], blocked: [] });
    const again = await pipeline.sync();
    expect(again.failedRequired).toBe(false);
    expect(again.types.authors?.unchanged).toBe(1);
  });

  it("改名且内容变化时记为 updated", async () => {
    await pipeline.sync(["categories", "authors"]);
    await rename(contentPath("authors/jane-doe.txt"), contentPath("authors/jane.txt"));
    await appendFile(contentPath("authors/jane.txt"), "\nNow based in Lisbon.\n", "utf-8");
    const summary = await pipeline.sync(["authors"]);
    expect(summary.types.authors).toMatchObject({ updated: 1, failed: 0 });
    expect(pipeline.store.getAuthor("jane-doe")?.source_path).toBe("authors/jane.txt");
  });

  it("正文中的脚本与事件属性不进入数据库与页面", async () => {
    await writeFile(
      contentPath("articles/unsafe.txt"),
      'Title: Unsafe Story\nAuthor: jane-doe\nCategory: technology\n---\n\nHello<script>alert(1)</script>\n\n<img src="a.png" onerror="alert(2)">\n',
      "utf-8",
    );
    const summary = await pipeline.sync();
    expect(summary.types.articles?.created).toBe(3);
    const row = pipeline.store.getArticle("unsafe-story");
    expect(row?.content).not.toMatch(/<script/i);
    expect(row?.content).not.toMatch(/onerror\s*=/i);
    const page = await readFile(outputPath("articles/article_unsafe-story.html"), "utf-8");
    expect(page).not.toMatch(/<script/i);
    expect(page).not.toMatch(/onerror/i);
    expect(page).toContain('src="a.png"');
  });

  it("警告与错误写入日志表", async () => {
    await writeFile(contentPath("articles/broken.txt"), "no separator here\n", "utf-8");
    await pipeline.sync();
    const logs = pipeline.store.recentLogs(50);
    const trendWarnings = logs.filter((l) => l.level === "warn" && l.source_path === "trending/ai-agents.txt");
    expect(trendWarnings).toHaveLength(3);
    expect(logs.filter((l) => l.level === "error").map((l) => [l.category, l.source_path])).toEqual([
      ["pipeline", "articles/broken.txt"],
    ]);
    expect(logs.some((l) => l.level === "info")).toBe(false);
  });

  it("regenerate 按数据库重建页面", async () => {
    await pipeline.sync();
    await rm(config.paths.outputDir, { recursive: true, force: true });
    const reports = await pipeline.regenerate(["articles"]);
    expect(reports.articles).toMatchObject({ written: 3, unchanged: 0, errors: [] });
    expect(reports.authors).toBeUndefined();
    const page = await readFile(outputPath("articles/article_ai-chip-startup-raises-funding.html"), "utf-8");
    expect(page).toContain("AI Chip Startup Raises Funding");
  });
});


describe("ContentPipeline.prune", () => {
  let config: NewsdeskConfig;
  let pipeline: ContentPipeline;

  beforeEach(async () => {
    config = await makeWorkspace();
    pipeline = await ContentPipeline.open(config);
    await pipeline.sync();
  });

  afterEach(async () => {
    pipeline.close();
    await removeDir(config.rootDir);
  });

  it("同步不会删除源文件已消失的行", async () => {
    await rm(join(config.paths.contentDir, "articles/ai-chip.txt"));
    await pipeline.sync();
    expect(pipeline.store.stats().articles).toBe(2);
  });

  it("dry-run 只报告，不删除", async () => {
    await rm(join(config.paths.contentDir, "articles/ai-chip.txt"));
    const report = await pipeline.prune("articles", { dryRun: true });
    expect(report).toEqual({ type: "articles", dryRun: true, deleted: ["ai-chip-startup-raises-funding"], blocked: [] });
    expect(pipeline.store.stats().articles).toBe(2);
  });

  it("删除行与详情页并刷新计数", async () => {
    await rm(join(config.paths.contentDir, "articles/ai-chip.txt"));
    const report = await pipeline.prune("articles");
    expect(report.deleted).toEqual(["ai-chip-startup-raises-funding"]);
    expect(pipeline.store.stats().articles).toBe(1);
    expect(pipeline.store.getAuthor("jane-doe")?.article_count).toBe(1);
    expect(pipeline.store.getTrending("ai-agents")?.article_count).toBe(0);
    await expect(stat(join(config.paths.outputDir, "articles/article_ai-chip-startup-raises-funding.html"))).rejects.toThrow();
  });

  it("仍被文章引用的作者不删除", async () => {
    await rm(join(config.paths.contentDir, "authors/jane-doe.txt"));
    const report = await pipeline.prune("authors");
    expect(report.deleted).toEqual([]);
    expect(report.blocked).toEqual([{ slug: "jane-doe", references: 2 }]);
    expect(pipeline.store.getAuthor("jane-doe")).toBeDefined();
  });
});


describe("ContentPipeline.upgrade", () => {
  let config: NewsdeskConfig;
  let pipeline: ContentPipeline;

  beforeEach(async () => {
    config = await makeWorkspace();
    pipeline = await ContentPipeline.open(config);
  });

  afterEach(async () => {
    pipeline.close();
    await removeDir(config.rootDir);
  });

  it("只报告含旧字段的文件", async () => {
    const path = join(config.paths.contentDir, "trending/ai-agents.txt");
    const original = await readFile(path, "utf-8");
    const report = await pipeline.upgrade("trending");
    expect(report.upgraded).toEqual([
      {
        sourcePath: "trending/ai-agents.txt",
        legacyKeys: ["topic", "trend_score", "category_slug", "youtube_mentions", "tiktok_mentions"],
      },
    ]);
    expect(await readFile(path, "utf-8")).toBe(original);
  });

  it("write 时改写为当前字段名，再次升级无事可做", async () => {
    const path = join(config.paths.contentDir, "trending/ai-agents.txt");
    await pipeline.upgrade("trending", { write: true });
    const rewritten = parseContent(await readFile(path, "utf-8"));
    expect(rewritten.fields.get("title")).toBe("AI Agents");
    expect(rewritten.fields.get("heat_score")).toBe("100");
    expect(rewritten.fields.get("category")).toBe("ai");
    expect(rewritten.fields.has("topic")).toBe(false);
    expect(rewritten.body).toBe("Autonomous agents are everywhere this month.\n\nMore analysis follows.");
    expect((await pipeline.upgrade("trending")).upgraded).toEqual([]);
  });

  it("规范格式的文件不在报告中", async () => {
    const report = await pipeline.upgrade("articles");
    expect(report.upgraded.map((u) => u.sourcePath)).toEqual(["articles/new-phone-launch.txt"]);
  });
});
