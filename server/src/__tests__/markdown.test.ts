import { describe, expect, it } from "vitest";
import { renderMarkdown } from "../markdown";

describe("renderMarkdown", () => {
  it("renders emphasis and paragraphs", () => {
    expect(renderMarkdown("**bold** and *soft*")).toBe("<p><strong>bold</strong> and <em>soft</em></p>");
  });

  it("renders fenced code with its language", () => {
    expect(renderMarkdown("```ts\nconst a = 1;\n```")).toBe(
      '<pre><code class="language-ts">const a = 1;\n</code></pre>'
    );
  });

  it("supports GFM tables and strikethrough", () => {
    const html = renderMarkdown("| a | b |\n| - | - |\n| 1 | 2 |\n\n~~gone~~");
    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
    expect(html).toContain("<p><del>gone</del></p>");
  });

  it("keeps ordinary links", () => {
    expect(renderMarkdown("See [the docs](https://example.com/guide).")).toBe(
      '<p>See <a href="https://example.com/guide">the docs</a>.</p>'
    );
  });

  it("strips script URLs from links", () => {
    expect(renderMarkdown("[click me](javascript:alert(document.cookie))")).toBe("<p><a>click me</a></p>");
  });

  it("shows raw HTML as escaped text", () => {
    expect(renderMarkdown("Use the <br> element for breaks.")).toBe(
      "<p>Use the &#x3C;br> element for breaks.</p>"
    );
    expect(renderMarkdown("a <b>x</b> c")).toBe("<p>a &#x3C;b>x&#x3C;/b> c</p>");
    expect(renderMarkdown("<script>alert(1)</script>")).toBe("<p>&#x3C;script>alert(1)&#x3C;/script></p>");
  });

  it("keeps a reasoning block's text", () => {
    const html = renderMarkdown("<think>\nFirst I add two and two.\n</think>\n\nThe answer is 4.");
    expect(html).toBe("<p>&#x3C;think>\nFirst I add two and two.\n&#x3C;/think></p>\n<p>The answer is 4.</p>");
  });

  it("renders an empty string for empty input", () => {
    expect(renderMarkdown("")).toBe("");
  });
});
