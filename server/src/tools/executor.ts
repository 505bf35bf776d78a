import { z } from "zod";
import type { ToolKeys } from "../config";
import { ToolExecutionError, describeError } from "../errors";
import { formatZodError } from "../http";
import type { Logger } from "../logger";
import { searchProducts } from "./products";
import { isGreetingOnly, resolveToolCategory } from "./resolve";
import { getRealTime } from "./time";
import type { ToolContext, ToolResult } from "./types";
import { getRealWeather } from "./weather";
import { searchWikipedia } from "./wikipedia";

const weatherArgs = z.object({
  location: z.string().trim().min(1),
  unit: z.enum(["celsius", "fahrenheit"]).catch("celsius"),
});

const timeArgs = z.object({
  location: z.string().trim().min(1),
  format: z.enum(["12h", "24h"]).catch("24h"),
});

const productArgs = z.object({
  query: z.string(),
  category: z.string().trim().min(1).optional().catch(undefined),
  max_price: z.coerce.number().positive().optional().catch(undefined),
  sort_by: z.enum(["price_asc", "price_desc", "popularity", "rating"]).catch("popularity"),
});

const wikipediaArgs = z.object({
  query: z.string().trim().min(1),
  limit: z.coerce.number().int().catch(1),
});

export interface ToolExecutorOptions {
  keys: ToolKeys;
  logger: Logger;
  now?: () => Date;
  fetch?: typeof fetch;
}

export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw?.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolExecutionError(`arguments are not valid JSON (${describeError(err)})`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ToolExecutionError("arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: Record<string, unknown>): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ToolExecutionError(formatZodError(parsed.error));
  }
  return parsed.data;
}

export class ToolExecutor {
  private readonly ctx: ToolContext;
  private readonly logger: Logger;

  constructor(options: ToolExecutorOptions) {
    this.logger = options.logger.child({ module: "tools" });
    this.ctx = {
      keys: options.keys,
      logger: this.logger,
      now: options.now ?? (() => new Date()),
      fetch: options.fetch,
    };
  }

  /**
   * Run the tool a model asked for. Unknown names and greeting-only arguments
   * produce an `{ error }` result for the model to read; malformed arguments
   * throw ToolExecutionError.
   */
  async execute(name: string, rawArguments: string | undefined): Promise<ToolResult> {
    const args = parseToolArguments(rawArguments);

    if (isGreetingOnly(args)) {
      this.logger.warn("tool.greeting_refused", { tool: name });
      return {
        error: "Function calls are not needed for simple greetings",
        message: "This is a simple greeting that doesn't require API data",
      };
    }

    const category = resolveToolCategory(name);
    this.logger.info("tool.resolved", { tool: name, category });

    switch (category) {
      case "weather": {
        const { location, unit } = parseArgs(weatherArgs, args);
        return getRealWeather(this.ctx, location, unit);
      }
      case "time": {
        const { location, format } = parseArgs(timeArgs, args);
        return getRealTime(this.ctx, location, format);
      }
      case "products": {
        const search = parseArgs(productArgs, args);
        return searchProducts({
          query: search.query,
          category: search.category,
          maxPrice: search.max_price,
          sortBy: search.sort_by,
        });
      }
      case "wikipedia": {
        const { query, limit } = parseArgs(wikipediaArgs, args);
        return searchWikipedia(this.ctx, query, limit);
      }
      case null:
        return { error: `Function ${name} not implemented` };
      default: {
        const exhaustive: never = category;
        return exhaustive;
      }
    }
  }
}
