// 命令行参数解析

import { isContentType } from "../model/types.js";
import type { ContentType } from "../model/types.js";


/** 命令行参数：首个非选项参数为命令，其余为类型列表 */
export interface CliArgs {
  command: string;
  types: ContentType[];
  flags: Set<string>;
  unknown: string[];
}


export function parseArgs(argv: readonly string[]): CliArgs {
  const flags = new Set(argv.filter((a) => a.startsWith("--")));
  const positional = argv.filter((a) => !a.startsWith("--"));
  const [first, ...rest] = positional;
  // 首参数是类型名时视为 sync
  const command = first === undefined || isContentType(first) ? "sync" : first;
  const typeArgs = first !== undefined && isContentType(first) ? positional : rest;
  return {
    command,
    types: typeArgs.filter(isContentType),
    flags,
    unknown: typeArgs.filter((a) => !isContentType(a)),
  };
}
