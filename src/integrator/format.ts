// 正文排版：类 Markdown 的标题、引用、列表、[INFO] 提示块转为 HTML
// 输入是已净化的片段，文本按原样嵌入

function formatBlock(lines: string[]): string {
  const first = lines[0];
  if (first.startsWith(">")) {
    const text = lines.map((l) => l.replace(/^>\s?/, "").trim()).join(" ");
    const cut = text.lastIndexOf(" - ");
    if (cut > 0) {
      return `<blockquote><p>${text.slice(0, cut)}</p><footer>— ${text.slice(cut + 3)}</footer></blockquote>`;
    }
    return `<blockquote><p>${text}</p></blockquote>`;
  }
  if (/^[-*]\s/.test(first)) {
    const items = lines.filter((l) => /^[-*]\s/.test(l)).map((l) => `  <li>${l.slice(2).trim()}</li>`);
    return `<ul>\n${items.join("\n")}\n</ul>`;
  }
  if (first.startsWith("[INFO]")) {
    const text = [first.slice("[INFO]".length).trim(), ...lines.slice(1)].join(" ").trim();
    return `<div class="info-box"><p>${text}</p></div>`;
  }
  if (first.startsWith("<")) {
    return lines.join("\n");
  }
  return `<p>${lines.join(" ")}</p>`;
}


/** 把正文转为 HTML 段落序列；空正文返回空串 */
export function formatBody(body: string): string {
  const out: string[] = [];
  let block: string[] = [];
  const flush = () => {
    if (block.length > 0) out.push(formatBlock(block));
    block = [];
  };
  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trim();
    const heading = /^(#{2,4})\s+(.*)$/.exec(line);
    if (heading) {
      flush();
      const level = heading[1].length;
      out.push(`<h${level}>${heading[2]}</h${level}>`);
    } else if (!line) {
      flush();
    } else {
      block.push(line);
    }
  }
  flush();
  return out.join("\n");
}
