import type { Result, SearchHit } from "../../ai-tools";
import { scenarioConfigSchema, type ScenarioConfigInput } from "../domain/schema";
import type { DateWindow, ScenarioConfig } from "../domain/types";
import type { SearchProvider } from "../infrastructure/contracts";

export interface RecordedSearch {
  query: string;
  window: DateWindow;
}

type Respond = (
  query: string,
  window: DateWindow
) => Result<SearchHit[]> | Promise<Result<SearchHit[]>>;

/**
 * In-memory search provider that records every query it receives.
 */
export function createFakeSearch(
  respond: Respond
): SearchProvider & { calls: RecordedSearch[] } {
  const calls: RecordedSearch[] = [];
  return {
    calls,
    async search({ query, window }) {
      calls.push({ query, window });
      return respond(query, window);
    },
  };
}

export function hitsFor(
  table: Record<string, SearchHit[]>
): Respond {
  return (query) => {
    const ticker = query.split(" ")[0];
    return { ok: true, data: table[ticker] ?? [] };
  };
}

export function scenario(input: ScenarioConfigInput = {}): ScenarioConfig {
  return scenarioConfigSchema.parse(input);
}
