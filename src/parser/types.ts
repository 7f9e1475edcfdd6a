// 内容文件解析结果

/** 元数据块 + 正文：字段保持文件中的出现顺序，值为原始字符串 */
export interface ParsedContent {
  fields: Map<string, string>;
  /** 分隔行之后的正文，未净化 */
  body: string;
}


/** 从磁盘读取的内容文件：附带源路径与原始字节的 sha256 */
export interface ContentFile extends ParsedContent {
  sourcePath: string;
  checksum: string;
}
