// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），不把一切打满控制台；error/warn 可落库便于按源文件排查。

/** 日志级别：控制输出与落库策略（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选，便于在 DB/控制台按 category 过滤 */
export type LogCategory =
  | "parser"    // 内容文件解析
  | "validator" // 字段校验与净化
  | "db"        // 数据库读写、备份
  | "reconcile" // 单文件入库
  | "render"    // 页面生成
  | "pipeline"  // 同步批次、清理
  | "cli"       // 命令行
  | "config";   // 配置加载

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、type、slug 等），落库时存为 JSON */
  payload?: Record<string, unknown>;
  /** 触发该日志的源文件路径，便于按文件查日志 */
  source_path?: string;
  created_at: string;
}

/** 落库目标：由 ContentStore 在流水线启动时注册 */
export type LogSink = (entry: LogEntry) => void;
