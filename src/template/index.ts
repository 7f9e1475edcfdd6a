// 模板渲染：{{path}} 转义输出，{{{path}}} 与 {{!path}} 原样输出，支持 #if/else 与 #each 块

import { readFile } from "node:fs/promises";
import { join } from "node:path";


export type TemplateContext = Record<string, unknown>;


type TemplateNode =
  | { kind: "text"; value: string }
  | { kind: "var"; path: string; raw: boolean }
  | { kind: "if"; path: string; then: TemplateNode[]; otherwise: TemplateNode[] }
  | { kind: "each"; path: string; body: TemplateNode[]; otherwise: TemplateNode[] };


type BlockNode = Extract<TemplateNode, { kind: "if" | "each" }>;


/** 模板语法错误：块未闭合或闭合标签不匹配 */
export class TemplateSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateSyntaxError";
  }
}


const TAG_PATTERN = /\{\{\{\s*([^}]+?)\s*\}\}\}|\{\{\s*([^}]+?)\s*\}\}/g;


const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};


/** HTML 转义 */
export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}


function parseTemplate(source: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: { block: BlockNode; inElse: boolean }[] = [];
  const current = (): TemplateNode[] => {
    const top = stack[stack.length - 1];
    if (!top) return root;
    if (top.inElse) return top.block.otherwise;
    return top.block.kind === "if" ? top.block.then : top.block.body;
  };

  let last = 0;
  for (const m of source.matchAll(TAG_PATTERN)) {
    const index = m.index ?? 0;
    if (index > last) current().push({ kind: "text", value: source.slice(last, index) });
    last = index + m[0].length;

    if (m[1] !== undefined) {
      current().push({ kind: "var", path: m[1], raw: true });
      continue;
    }
    const tag = m[2] ?? "";
    const open = /^#(if|each)\s+(\S+)$/.exec(tag);
    if (open) {
      const block: BlockNode = open[1] === "if"
        ? { kind: "if", path: open[2], then: [], otherwise: [] }
        : { kind: "each", path: open[2], body: [], otherwise: [] };
      current().push(block);
      stack.push({ block, inElse: false });
      continue;
    }
    const close = /^\/(if|each)$/.exec(tag);
    if (close) {
      const top = stack.pop();
      if (!top || top.block.kind !== close[1]) {
        throw new TemplateSyntaxError(`多余或不匹配的 {{/${close[1]}}}`);
      }
      continue;
    }
    if (tag === "else") {
      const top = stack[stack.length - 1];
      if (!top || top.inElse) throw new TemplateSyntaxError("{{else}} 不在块内");
      top.inElse = true;
      continue;
    }
    if (tag.startsWith("!")) {
      current().push({ kind: "var", path: tag.slice(1).trim(), raw: true });
      continue;
    }
    current().push({ kind: "var", path: tag, raw: false });
  }
  if (last < source.length) current().push({ kind: "text", value: source.slice(last) });
  const open = stack.pop();
  if (open) throw new TemplateSyntaxError(`{{#${open.block.kind} ${open.block.path}}} 未闭合`);
  return root;
}


function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}


interface Frame {
  value: unknown;
  index?: number;
}


function lookup(frames: Frame[], path: string): unknown {
  const [head, ...rest] = path.split(".");
  let value: unknown;
  if (head === "this") {
    value = frames[frames.length - 1]?.value;
  } else if (head === "@index") {
    value = frames[frames.length - 1]?.index;
  } else {
    for (let i = frames.length - 1; i >= 0; i--) {
      const v = frames[i].value;
      if (isRecord(v) && Object.hasOwn(v, head)) {
        value = v[head];
        break;
      }
    }
  }
  for (const key of rest) {
    value = isRecord(value) && Object.hasOwn(value, key) ? value[key] : undefined;
  }
  return value;
}


function truthy(v: unknown): boolean {
  if (Array.isArray(v)) return v.length > 0;
  return Boolean(v);
}


function stringify(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (Array.isArray(v)) return v.map(stringify).join(", ");
  if (isRecord(v)) return "";
  return String(v);
}


function renderNodes(nodes: TemplateNode[], frames: Frame[]): string {
  let out = "";
  for (const node of nodes) {
    switch (node.kind) {
      case "text":
        out += node.value;
        break;
      case "var": {
        const s = stringify(lookup(frames, node.path));
        out += node.raw ? s : escapeHtml(s);
        break;
      }
      case "if":
        out += renderNodes(truthy(lookup(frames, node.path)) ? node.then : node.otherwise, frames);
        break;
      case "each": {
        const items = lookup(frames, node.path);
        if (!Array.isArray(items) || items.length === 0) {
          out += renderNodes(node.otherwise, frames);
          break;
        }
        items.forEach((item: unknown, index) => {
          out += renderNodes(node.body, [...frames, { value: item, index }]);
        });
        break;
      }
    }
  }
  return out;
}


/** 模板渲染器：每条流水线一个实例，缓存解析结果与模板文件 */
export class TemplateRenderer {
  private readonly parsed = new Map<string, TemplateNode[]>();
  private readonly files = new Map<string, string>();

  constructor(private readonly templatesDir: string) {}

  /** 渲染模板字符串 */
  render(template: string, context: TemplateContext): string {
    let nodes = this.parsed.get(template);
    if (!nodes) {
      nodes = parseTemplate(template);
      this.parsed.set(template, nodes);
    }
    return renderNodes(nodes, [{ value: context }]);
  }

  /** 读取 templatesDir 下的模板文件（缓存） */
  async load(name: string): Promise<string> {
    const cached = this.files.get(name);
    if (cached !== undefined) return cached;
    const source = await readFile(join(this.templatesDir, name), "utf-8");
    this.files.set(name, source);
    return source;
  }

  /** 以 layout.html 包裹页面模板：页面内容注入 {{{body}}} */
  async renderPage(name: string, context: TemplateContext): Promise<string> {
    const [layout, page] = await Promise.all([this.load("layout.html"), this.load(name)]);
    const body = this.render(page, context);
    return this.render(layout, { ...context, body });
  }
}
