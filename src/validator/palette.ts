// 分类颜色：调色板名 → 十六进制，未知名称回落到灰色

export const DEFAULT_COLOR = "#6B7280";


const PALETTE = new Map<string, string>(Object.entries({
  blue: "#3B82F6",
  green: "#10B981",
  orange: "#F59E0B",
  pink: "#EC4899",
  purple: "#8B5CF6",
  red: "#EF4444",
  gray: "#6B7280",
  grey: "#6B7280",
  indigo: "#6366F1",
  yellow: "#EAB308",
  teal: "#14B8A6",
}));


const HEX_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;


/** 颜色解析：合法的 #RGB/#RRGGBB 原样返回，调色板名查表，其余给默认色 */
export function resolveColor(value: string): string {
  const v = value.trim();
  if (HEX_PATTERN.test(v)) return v;
  return PALETTE.get(v.toLowerCase()) ?? DEFAULT_COLOR;
}
