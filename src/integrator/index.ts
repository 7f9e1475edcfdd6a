// 页面生成：详情页按 slug 写到固定路径，列表页每次从数据库重新查询；内容不变则不写盘

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ContentStore } from "../db/index.js";
import { RenderError, errorMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { ContentType } from "../model/types.js";
import type { TemplateContext, TemplateRenderer } from "../template/index.js";
import { PAGE_LAYOUT, articleContext, authorContext, categoryContext, listingContext, trendContext } from "./contexts.js";

export { formatBody } from "./format.js";
export { PAGE_LAYOUT, pageHref, trendStrength } from "./contexts.js";


export type PageOutcome = "written" | "unchanged";


export interface PageResult {
  path: string;
  outcome: PageOutcome;
}


/** 整类重建的结果 */
export interface RenderReport {
  written: number;
  unchanged: number;
  errors: RenderError[];
}


async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}


export class PageIntegrator {
  constructor(
    private readonly store: ContentStore,
    private readonly renderer: TemplateRenderer,
    private readonly outputDir: string,
  ) {}

  detailPath(type: ContentType, slug: string): string {
    const layout = PAGE_LAYOUT[type];
    return join(this.outputDir, layout.dir, `${layout.prefix}${slug}.html`);
  }

  listingPath(type: ContentType): string {
    return join(this.outputDir, PAGE_LAYOUT[type].listing);
  }

  /** 渲染单个详情页；任何失败都包装为 RenderError */
  async renderItem(type: ContentType, slug: string): Promise<PageResult> {
    try {
      const html = await this.renderer.renderPage(PAGE_LAYOUT[type].template, this.detailContext(type, slug));
      return await this.writeIfChanged(this.detailPath(type, slug), html);
    } catch (err) {
      if (err instanceof RenderError) throw err;
      throw new RenderError(slug, errorMessage(err));
    }
  }

  /** 列表页总是从数据库重新查询 */
  async renderListing(type: ContentType): Promise<PageResult> {
    try {
      const html = await this.renderer.renderPage(PAGE_LAYOUT[type].listingTemplate, listingContext(this.store, type));
      return await this.writeIfChanged(this.listingPath(type), html);
    } catch (err) {
      throw new RenderError(PAGE_LAYOUT[type].listing, errorMessage(err));
    }
  }

  /** 删除详情页，文件不存在时返回 false */
  async removeItem(type: ContentType, slug: string): Promise<boolean> {
    const path = this.detailPath(type, slug);
    if ((await readIfExists(path)) === null) return false;
    await rm(path, { force: true });
    return true;
  }

  /** 重建某类全部详情页与列表页，单页失败不影响其余 */
  async renderAll(type: ContentType): Promise<RenderReport> {
    const report: RenderReport = { written: 0, unchanged: 0, errors: [] };
    const pages = [...this.store.listSources(type).map((r) => () => this.renderItem(type, r.slug)), () => this.renderListing(type)];
    for (const page of pages) {
      try {
        const result = await page();
        report[result.outcome]++;
      } catch (err) {
        const renderError = err instanceof RenderError ? err : new RenderError("", errorMessage(err));
        logger.error("render", "页面生成失败", { type, slug: renderError.slug, err: renderError.message });
        report.errors.push(renderError);
      }
    }
    return report;
  }

  private detailContext(type: ContentType, slug: string): TemplateContext {
    const missing = (): never => {
      throw new RenderError(slug, `数据库中不存在 ${type} "${slug}"`);
    };
    switch (type) {
      case "articles": {
        const row = this.store.getArticle(slug) ?? missing();
        return articleContext(this.store, row);
      }
      case "authors": {
        const row = this.store.getAuthor(slug) ?? missing();
        return authorContext(this.store, row);
      }
      case "categories": {
        const row = this.store.getCategory(slug) ?? missing();
        return categoryContext(this.store, row);
      }
      case "trending": {
        const row = this.store.getTrending(slug) ?? missing();
        return trendContext(this.store, row);
      }
    }
  }

  private async writeIfChanged(path: string, html: string): Promise<PageResult> {
    if ((await readIfExists(path)) === html) {
      return { path, outcome: "unchanged" };
    }
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, html, "utf-8");
    logger.debug("render", "页面已写入", { path });
    return { path, outcome: "written" };
  }
}
