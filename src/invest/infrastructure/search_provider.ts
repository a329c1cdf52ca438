import {
  getBenchmarkTools,
  type SearchOutput,
  type Tool,
} from "../../ai-tools";
import type { SearchProvider } from "./contracts";

/**
 * Windowed search backed by the Perplexity search tool.
 */
export function createPerplexitySearchProvider(
  tool: Tool<unknown, SearchOutput> = getBenchmarkTools().perplexity_search
): SearchProvider {
  return {
    async search({ query, window, settings }) {
      const res = await tool.execute({
        query,
        maxResults: settings.maxResults,
        maxTokens: settings.maxTokens,
        maxTokensPerPage: settings.maxTokensPerPage,
        searchAfterDate: window.start,
        searchBeforeDate: window.end,
        country: settings.country,
      });
      if (!res.ok) return { ok: false, error: res.error };
      return { ok: true, data: res.data.results };
    },
  };
}
