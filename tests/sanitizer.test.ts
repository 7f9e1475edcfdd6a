import { describe, it, expect } from "vitest";
import type { SanitizationWarning } from "../src/errors/index.js";
import { Sanitizer, isUnsafeUrl } from "../src/sanitizer/index.js";
import { LIMITS } from "./helpers.js";


describe("Sanitizer.sanitizeHtml", () => {
  const sanitizer = new Sanitizer(LIMITS);

  it("移除 script 元素与事件属性", () => {
    const warnings: SanitizationWarning[] = [];
    const out = sanitizer.sanitizeHtml('<p>Hi</p><script>alert(1)</script><img src="x.png" onerror="alert(1)">', "content", warnings);
    expect(out).not.toMatch(/<script/i);
    expect(out).not.toMatch(/onerror/i);
    expect(out).toContain("<p>Hi</p>");
    expect(out).toContain('src="x.png"');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].field).toBe("content");
  });

  it("大写的 script 标签连同内容一起移除", () => {
    const out = sanitizer.sanitizeHtml("<SCRIPT>bad()</SCRIPT>text", "content", []);
    expect(out).not.toMatch(/<script/i);
    expect(out).not.toContain("bad()");
    expect(out).toContain("text");
  });

  it("移除 javascript: 链接", () => {
    const out = sanitizer.sanitizeHtml('<a href="javascript:alert(1)">x</a>', "content", []);
    expect(out).not.toMatch(/javascript:/i);
    expect(out).toContain(">x</a>");
  });

  it("移除 iframe 与注释", () => {
    const out = sanitizer.sanitizeHtml('<p>a</p><iframe src="https://example.com"></iframe><!-- note -->', "content", []);
    expect(out).toBe("<p>a</p>");
  });

  it("纯文本中的 onxxx= 被中和", () => {
    const out = sanitizer.sanitizeHtml("set onload=run here", "content", []);
    expect(out).toBe("set onload&#61;run here");
  });

  it("安全内容原样返回且不记警告", () => {
    const warnings: SanitizationWarning[] = [];
    const body = "## Heading\n\nSome *text* & more\n\n- item";
    expect(sanitizer.sanitizeHtml(body, "content", warnings)).toBe(body);
    expect(warnings).toEqual([]);
  });

  it("超长正文截断并记警告", () => {
    const small = new Sanitizer({ ...LIMITS, maxContentLength: 10 });
    const warnings: SanitizationWarning[] = [];
    expect(small.sanitizeHtml("abcdefghijklmnop", "content", warnings)).toBe("abcdefghij");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toContain("截断");
  });
});


describe("Sanitizer.stripTags", () => {
  const sanitizer = new Sanitizer(LIMITS);

  it("剥离标签并记警告", () => {
    const warnings: SanitizationWarning[] = [];
    expect(sanitizer.stripTags("<b>Bold</b> title", "title", warnings)).toBe("Bold title");
    expect(warnings).toEqual([{ field: "title", message: "已移除 HTML 标签" }]);
  });

  it("script 内容一并去掉", () => {
    expect(sanitizer.stripTags("A<script>x()</script>B", "title", [])).toBe("AB");
  });

  it("按上限截断", () => {
    const warnings: SanitizationWarning[] = [];
    expect(sanitizer.stripTags("abcdef", "title", warnings, 3)).toBe("abc");
    expect(warnings).toHaveLength(1);
  });
});


describe("Sanitizer.sanitizeUrl", () => {
  const sanitizer = new Sanitizer(LIMITS);

  it("保留 http(s) 与相对地址", () => {
    expect(sanitizer.sanitizeUrl("https://example.com/a.png", "image_url", [])).toBe("https://example.com/a.png");
    expect(sanitizer.sanitizeUrl("images/a.png", "image_url", [])).toBe("images/a.png");
    expect(sanitizer.sanitizeUrl("/static/a.png", "image_url", [])).toBe("/static/a.png");
  });

  it("其他协议清空并记警告", () => {
    const warnings: SanitizationWarning[] = [];
    expect(sanitizer.sanitizeUrl("javascript:alert(1)", "image_url", warnings)).toBe("");
    expect(sanitizer.sanitizeUrl("ftp://example.com/a", "image_url", warnings)).toBe("");
    expect(warnings).toHaveLength(2);
  });
});


describe("isUnsafeUrl", () => {
  it("识别夹带空白的 javascript: 与非图片 data:", () => {
    expect(isUnsafeUrl(" java\tscript:alert(1)")).toBe(true);
    expect(isUnsafeUrl("data:text/html;base64,AAAA")).toBe(true);
    expect(isUnsafeUrl("data:image/png;base64,AAAA")).toBe(false);
    expect(isUnsafeUrl("https://example.com")).toBe(false);
  });
});
