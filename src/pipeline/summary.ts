// 运行报告的文本表格

import { CONTENT_TYPES } from "../model/types.js";
import type { SyncSummary, TypeReport } from "./types.js";


const COLUMNS: readonly (keyof TypeReport)[] = ["created", "updated", "unchanged", "failed", "renderErrors", "warnings"];


function row(cells: string[], widths: number[]): string {
  return cells.map((c, i) => (i === 0 ? c.padEnd(widths[i]) : c.padStart(widths[i]))).join("  ").trimEnd();
}


/** 每类一行：created / updated / unchanged / failed 等计数，末尾列出失败文件 */
export function formatSummary(summary: SyncSummary): string {
  const header = ["type", ...COLUMNS];
  const body: string[][] = [];
  for (const type of CONTENT_TYPES) {
    const report = summary.types[type];
    if (!report) continue;
    body.push([type, ...COLUMNS.map((c) => String(report[c]))]);
  }
  const widths = header.map((h, i) => Math.max(h.length, ...body.map((r) => r[i].length)));
  const lines = [row(header, widths), widths.map((w) => "-".repeat(w)).join("  "), ...body.map((r) => row(r, widths))];
  if (summary.failures.length > 0) {
    lines.push("", "failures:");
    for (const f of summary.failures) {
      lines.push(`  [${f.kind}] ${f.sourcePath}: ${f.message}`);
    }
  }
  return lines.join("\n");
}
