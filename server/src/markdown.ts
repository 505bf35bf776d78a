import rehypeSanitize from "rehype-sanitize";
import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype, { type Options as RemarkRehypeOptions } from "remark-rehype";
import { unified } from "unified";

const FLOW_PARENTS = new Set(["root", "blockquote", "listItem", "footnoteDefinition"]);

// Raw HTML in model output is shown as literal text: reasoning models open
// their reply with <think>, and prose mentions tags by name.
const handlers: RemarkRehypeOptions["handlers"] = {
  html(_state, node, parent) {
    const value = typeof node.value === "string" ? node.value : "";
    const text = { type: "text" as const, value };
    if (parent && FLOW_PARENTS.has(parent.type)) {
      return { type: "element", tagName: "p", properties: {}, children: [text] };
    }
    return text;
  },
};

// rehype-sanitize applies GitHub's schema: link URLs keep only safe protocols
// (no javascript:) and the only classes left are language-* on code.
const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { handlers })
  .use(rehypeSanitize)
  .use(rehypeStringify);

export function renderMarkdown(markdown: string): string {
  return String(processor.processSync(markdown));
}
