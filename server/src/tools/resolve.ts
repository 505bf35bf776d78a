export type ToolCategory = "weather" | "time" | "products" | "wikipedia";

// Models sometimes send a description ("get the current weather") instead of
// the function name, so names are matched against aliases by substring.
const ALIASES: ReadonlyArray<readonly [ToolCategory, readonly string[]]> = [
  [
    "weather",
    [
      "weather",
      "get weather",
      "current weather",
      "get the current weather",
      "get_weather",
      "get_real_weather",
      "real weather",
      "real-time weather",
    ],
  ],
  [
    "time",
    [
      "time",
      "current time",
      "get time",
      "get the current time",
      "get_current_time",
      "get_real_time",
      "accurate time",
      "real time",
    ],
  ],
  [
    "products",
    ["products", "search products", "search for products", "get products", "find products", "search_products"],
  ],
  [
    "wikipedia",
    [
      "wikipedia search",
      "search wikipedia",
      "wiki search",
      "search wiki",
      "search_wikipedia",
      "lookup wikipedia",
      "find on wikipedia",
      "wikipedia article",
    ],
  ],
];

const GREETINGS = new Set([
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
]);

export function resolveToolCategory(name: string): ToolCategory | null {
  const normalized = name.toLowerCase();
  for (const [category, aliases] of ALIASES) {
    if (aliases.some((alias) => normalized.includes(alias))) {
      return category;
    }
  }
  return null;
}

/** True when the tool's main argument is nothing but a greeting. */
export function isGreetingOnly(args: Record<string, unknown>): boolean {
  const subject = args.query ?? args.location;
  if (subject === undefined || subject === null) return false;
  return GREETINGS.has(String(subject).trim().toLowerCase());
}
