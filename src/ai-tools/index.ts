export * from "./base";
export * from "./perplexity-search";

import { PerplexitySearchTool } from "./perplexity-search";

/**
 * Get the tool set shared by the research and evaluator agents
 */
export function getBenchmarkTools() {
  return {
    perplexity_search: PerplexitySearchTool,
  } as const;
}
