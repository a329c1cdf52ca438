import type { Result, SearchHit } from "../../ai-tools";
import type { CalendarWindow } from "../../util/dates";
import type {
  DateWindow,
  EvidenceDatePolicyName,
  SearchSettings,
  VerdictLabel,
} from "../domain/types";

/**
 * Search capability shared by both agents. Implementations MUST NOT throw:
 * an unavailable source is an `ok: false` result for that query only.
 */
export interface SearchProvider {
  search(params: {
    query: string;
    window: DateWindow;
    settings: SearchSettings;
  }): Promise<Result<SearchHit[]>>;
}

/**
 * Decides whether a search hit counts as dated within a window.
 */
export interface EvidenceDatePolicy {
  readonly name: EvidenceDatePolicyName;
  accepts(hit: SearchHit, window: CalendarWindow): boolean;
}

export interface VerdictInference {
  verdict: VerdictLabel;
  confidence: number;
  rationale: string;
}

/**
 * Turns research-window evidence into a verdict for one ticker.
 */
export interface VerdictReasoner {
  readonly name: string;
  infer(params: {
    ticker: string;
    hits: SearchHit[];
    targetDate: string;
    targetIncreasePct: number;
  }): Promise<VerdictInference>;
}
