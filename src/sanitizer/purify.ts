// 基于 node-html-parser 的 HTML 净化：移除可执行元素、事件属性、危险协议链接与注释

import { parse, NodeType } from "node-html-parser";
import type { HTMLElement, Node } from "node-html-parser";


const TAGS_TO_REMOVE = [
  "script", "iframe", "frame", "frameset", "object", "embed",
  "applet", "noscript", "base", "form",
];


const URL_ATTRIBUTES = ["href", "src", "action", "formaction", "xlink:href", "poster", "background"];


const EVENT_ATTR_PATTERN = /^on\w+$/i;


const SAFE_DATA_URL_PATTERN = /^data:image\/(?:png|jpe?g|gif|webp);/i;


/** 协议是否可执行：javascript/vbscript 以及非图片 data: */
export function isUnsafeUrl(value: string): boolean {
  // 浏览器解析 URL 前会忽略空白与控制字符
  const compact = value.replace(/[\s\u0000-\u001f]+/g, "").toLowerCase();
  if (compact.startsWith("javascript:") || compact.startsWith("vbscript:")) return true;
  return compact.startsWith("data:") && !SAFE_DATA_URL_PATTERN.test(compact);
}


function collectCommentNodes(node: Node, out: Node[]): void {
  if (node.nodeType === NodeType.COMMENT_NODE) {
    out.push(node);
    return;
  }
  for (const child of node.childNodes) {
    collectCommentNodes(child, out);
  }
}


function stripUnsafeAttributes(root: HTMLElement): number {
  let removed = 0;
  for (const elem of root.querySelectorAll("*")) {
    for (const name of Object.keys(elem.rawAttributes)) {
      if (EVENT_ATTR_PATTERN.test(name)) {
        elem.removeAttribute(name);
        removed++;
        continue;
      }
      if (!URL_ATTRIBUTES.includes(name.toLowerCase())) continue;
      const value = elem.getAttribute(name);
      if (value !== undefined && isUnsafeUrl(value)) {
        elem.removeAttribute(name);
        removed++;
      }
    }
  }
  return removed;
}


/** DOM 净化结果：removed 为 0 时 html 即原文 */
export interface PurifyResult {
  html: string;
  removed: number;
}


/** 使用 node-html-parser 解析并净化 HTML；未做任何移除时原样返回，不重新序列化 */
export function applyPurify(html: string): PurifyResult {
  const root = parse(html, { comment: true });
  let removed = 0;
  for (const tag of TAGS_TO_REMOVE) {
    for (const el of root.querySelectorAll(tag)) {
      el.remove();
      removed++;
    }
  }
  const commentNodes: Node[] = [];
  collectCommentNodes(root, commentNodes);
  for (const node of commentNodes) {
    node.remove();
    removed++;
  }
  removed += stripUnsafeAttributes(root);
  return removed > 0 ? { html: root.toString(), removed } : { html, removed };
}
