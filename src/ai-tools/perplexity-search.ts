import { z } from "zod";
import { getEnvVar, getNumber, getString } from "../util/env";
import { getLogger } from "../util/logger";
import { defineTool, ToolCategory } from "./base";

/**
 * Perplexity Search
 *
 * Purpose:
 * - Run a web search restricted to a publication-date window.
 * - Return compact hits (title, url, date, last_updated, snippet) for the agents.
 *
 * Notes:
 * - Date filters use the provider's MM/DD/YYYY format.
 * - Never throws: a missing key, HTTP failure, timeout or malformed body is `ok: false`.
 */

const US_DATE = /^\d{1,2}\/\d{1,2}\/\d{4}$/;

const inputSchema = z.object({
  query: z.string().trim().min(1).describe("Search query"),
  maxResults: z
    .number()
    .int()
    .positive()
    .max(20)
    .describe("Max number of results (<=20), default 12")
    .default(12),
  maxTokens: z
    .number()
    .int()
    .positive()
    .describe("Total content token budget across results, default 12000")
    .default(12_000),
  maxTokensPerPage: z
    .number()
    .int()
    .positive()
    .describe("Content token budget per result page, default 2048")
    .default(2048),
  searchAfterDate: z
    .string()
    .regex(US_DATE, "expected MM/DD/YYYY")
    .describe("Only results published on or after this date")
    .optional(),
  searchBeforeDate: z
    .string()
    .regex(US_DATE, "expected MM/DD/YYYY")
    .describe("Only results published on or before this date")
    .optional(),
  country: z
    .string()
    .length(2)
    .describe("ISO 3166-1 alpha-2 country code")
    .optional(),
});

export type PerplexitySearchInput = z.input<typeof inputSchema>;

export type SearchHit = {
  title?: string;
  url?: string;
  date?: string;
  lastUpdated?: string;
  snippet?: string;
};

export type SearchOutput = {
  query: string;
  results: SearchHit[];
};

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v == null || v === "" ? undefined : v));

const responseSchema = z.object({
  results: z
    .array(
      z.object({
        title: optionalText,
        url: optionalText,
        snippet: optionalText,
        date: optionalText,
        last_updated: optionalText,
      })
    )
    .nullish()
    .transform((v) => v ?? []),
});

export interface PerplexitySearchOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

function resolveOptions(options: PerplexitySearchOptions) {
  return {
    apiKey: options.apiKey ?? getEnvVar("PERPLEXITY_API_KEY"),
    baseUrl: (
      options.baseUrl ??
      getString("PERPLEXITY_BASE_URL", "https://api.perplexity.ai")
    ).replace(/\/+$/, ""),
    timeoutMs: options.timeoutMs ?? getNumber("PERPLEXITY_TIMEOUT_MS", 30_000),
  };
}

export function createPerplexitySearchTool(
  options: PerplexitySearchOptions = {}
) {
  return defineTool<z.output<typeof inputSchema>, SearchOutput>({
    name: "perplexity_search",
    description: "Web search restricted to a publication-date window",
    category: ToolCategory.SEARCH,
    schema: inputSchema,
    async handler(input) {
      const logger = getLogger("ai-tools/perplexity-search");
      const { apiKey, baseUrl, timeoutMs } = resolveOptions(options);
      if (!apiKey) {
        return { ok: false, error: "PERPLEXITY_API_KEY is not set" };
      }

      const body: Record<string, string | number> = {
        query: input.query,
        max_results: input.maxResults,
        max_tokens: input.maxTokens,
        max_tokens_per_page: input.maxTokensPerPage,
      };
      if (input.searchAfterDate)
        body.search_after_date_filter = input.searchAfterDate;
      if (input.searchBeforeDate)
        body.search_before_date_filter = input.searchBeforeDate;
      if (input.country) body.country = input.country;

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      const startedAt = Date.now();
      try {
        const res = await fetch(`${baseUrl}/search`, {
          method: "POST",
          signal: controller.signal,
          headers: {
            Authorization: `Bearer ${apiKey}`,
            "Content-Type": "application/json",
            Accept: "application/json",
          },
          body: JSON.stringify(body),
        });
        if (!res.ok) {
          const detail = (await res.text()).slice(0, 200);
          logger.warn(
            { status: res.status, query: input.query },
            "Search request failed"
          );
          return {
            ok: false,
            error: `Search API responded ${res.status}${detail ? `: ${detail}` : ""}`,
          };
        }

        const parsed = responseSchema.safeParse(await res.json());
        if (!parsed.success) {
          return { ok: false, error: "Search API returned an unexpected body" };
        }

        const results: SearchHit[] = parsed.data.results.map((r) => ({
          title: r.title,
          url: r.url,
          date: r.date,
          lastUpdated: r.last_updated,
          snippet: r.snippet,
        }));
        logger.debug(
          {
            query: input.query,
            results: results.length,
            elapsedMs: Date.now() - startedAt,
          },
          "Search completed"
        );
        return { ok: true, data: { query: input.query, results } };
      } catch (err) {
        const aborted = controller.signal.aborted;
        const msg = aborted
          ? `Search timed out after ${timeoutMs}ms`
          : err instanceof Error
            ? err.message
            : String(err);
        logger.warn({ query: input.query, error: msg }, "Search unavailable");
        return { ok: false, error: msg };
      } finally {
        clearTimeout(timeout);
      }
    },
  });
}

export const PerplexitySearchTool = createPerplexitySearchTool();
