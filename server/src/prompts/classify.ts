import systemPrompts from "./systemPrompts.json";

export type PromptCategory =
  | "llamaUsage"
  | "modelComparison"
  | "weather"
  | "time"
  | "encyclopedia"
  | "products"
  | "greeting"
  | "general";

// Checked top to bottom; the first category with a matching term wins.
const CATEGORY_TERMS: ReadonlyArray<readonly [PromptCategory, readonly string[]]> = [
  ["llamaUsage", ["how to use llama models"]],
  ["modelComparison", ["compare deepseek and llama"]],
  ["weather", ["weather", "temperature", "forecast", "rain", "sunny", "cloudy"]],
  ["time", ["time", "clock", "hour", "timezone", "what time"]],
  [
    "encyclopedia",
    ["wikipedia", "wiki", "article", "encyclopedia", "information about", "tell me about", "what is", "who is"],
  ],
  ["products", ["find", "search for", "looking for", "buy", "purchase", "product", "headphones", "laptop", "phone"]],
  [
    "greeting",
    [
      "hi",
      "hello",
      "hey",
      "greetings",
      "good morning",
      "good afternoon",
      "good evening",
      "how are you",
      "what's up",
      "nice to meet you",
    ],
  ],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word match, so "hi" does not fire on "this" nor "rain" on "train". */
export function containsTerm(text: string, term: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(term)}($|[^a-z0-9])`, "u").test(text);
}

export function classifyPrompt(prompt: string): PromptCategory {
  const text = prompt.toLowerCase();
  for (const [category, terms] of CATEGORY_TERMS) {
    if (terms.some((term) => containsTerm(text, term))) {
      return category;
    }
  }
  return "general";
}

export function systemPromptFor(category: PromptCategory, quickMode: boolean): string {
  switch (category) {
    case "llamaUsage":
    case "modelComparison":
    case "general": {
      const variants = systemPrompts[category];
      return quickMode ? variants.quick : variants.detailed;
    }
    case "weather":
    case "time":
    case "encyclopedia":
    case "products":
    case "greeting":
      return systemPrompts[category];
    default: {
      const exhaustive: never = category;
      return exhaustive;
    }
  }
}
