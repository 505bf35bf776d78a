import { z } from "zod";
import { describeError } from "../errors";
import { type ToolContext, type ToolResult, fetchJson, stamp } from "./types";

const API_URL = "https://en.wikipedia.org/w/api.php";
export const MAX_WIKIPEDIA_RESULTS = 5;
const DATA_SOURCE = "Wikipedia API (real-time data)";

const searchSchema = z.object({
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string(),
            wordcount: z.number().optional(),
            timestamp: z.string().optional(),
          })
        )
        .default([]),
      searchinfo: z.object({ suggestion: z.string().optional() }).optional(),
    })
    .default({}),
});

const pagesSchema = z.object({
  query: z
    .object({
      pages: z
        .record(
          z.object({
            title: z.string().optional(),
            extract: z.string().optional(),
            fullurl: z.string().optional(),
            description: z.string().optional(),
          })
        )
        .default({}),
    })
    .default({}),
});

function articleUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;
}

async function fetchArticle(ctx: ToolContext, title: string) {
  const params = new URLSearchParams({
    action: "query",
    format: "json",
    prop: "extracts|info|description",
    exintro: "1",
    explaintext: "1",
    inprop: "url",
    redirects: "1",
    titles: title,
  });
  const res = await fetchJson(ctx, `${API_URL}?${params}`);
  const parsed = pagesSchema.safeParse(res.body);
  if (!res.ok || !parsed.success) {
    ctx.logger.warn("tool.wikipedia.article_failed", { title, status: res.status });
    return null;
  }
  const [page] = Object.values(parsed.data.query.pages);
  return page ?? null;
}

/**
 * MediaWiki full-text search followed by one extract request per hit. When
 * nothing matches and the API offers a spelling suggestion, the search runs
 * once more with the suggestion.
 */
export async function searchWikipedia(
  ctx: ToolContext,
  query: string,
  limit = 1,
  allowSuggestion = true
): Promise<ToolResult> {
  const srlimit = Math.min(Math.max(1, Math.floor(limit)), MAX_WIKIPEDIA_RESULTS);

  try {
    const params = new URLSearchParams({
      action: "query",
      format: "json",
      list: "search",
      srsearch: query,
      srlimit: String(srlimit),
      srinfo: "totalhits|suggestion",
      srprop: "wordcount|timestamp",
    });
    const res = await fetchJson(ctx, `${API_URL}?${params}`);
    if (!res.ok) {
      return {
        error: `Wikipedia search failed: ${res.status}`,
        query,
        data_source: DATA_SOURCE,
        timestamp: stamp(ctx.now()),
      };
    }

    const parsed = searchSchema.safeParse(res.body);
    const hits = parsed.success ? parsed.data.query.search : [];
    const suggestion = parsed.success ? parsed.data.query.searchinfo?.suggestion : undefined;

    if (!hits.length && suggestion && allowSuggestion) {
      ctx.logger.info("tool.wikipedia.suggestion", { query, suggestion });
      return searchWikipedia(ctx, suggestion, limit, false);
    }

    if (!hits.length) {
      return {
        query,
        results_count: 0,
        message: `No Wikipedia articles found for '${query}'`,
        results: [],
        data_source: DATA_SOURCE,
        timestamp: stamp(ctx.now()),
      };
    }

    const results: ToolResult[] = [];
    for (const hit of hits) {
      const page = await fetchArticle(ctx, hit.title);
      if (!page) continue;
      results.push({
        title: page.title ?? hit.title,
        extract: page.extract ?? "No content available",
        description: page.description ?? "",
        url: page.fullurl ?? articleUrl(hit.title),
        word_count: hit.wordcount ?? 0,
        last_modified: hit.timestamp ?? "",
      });
    }

    return {
      query,
      results_count: results.length,
      results,
      data_source: DATA_SOURCE,
      timestamp: stamp(ctx.now()),
    };
  } catch (err) {
    ctx.logger.warn("tool.wikipedia.failed", { query, error: describeError(err) });
    return {
      error: `Error searching Wikipedia: ${describeError(err)}`,
      query,
      data_source: DATA_SOURCE,
      timestamp: stamp(ctx.now()),
    };
  }
}
