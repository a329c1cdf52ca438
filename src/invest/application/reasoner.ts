import { getString } from "../../util/env";
import { createKeywordVerdictReasoner } from "../business/sentiment";
import type { VerdictReasoner } from "../infrastructure/contracts";
import { createLlmVerdictReasoner } from "../infrastructure/llm_reasoner";

export type ReasonerName = "keyword" | "llm";

export function parseReasonerName(raw: string): ReasonerName {
  if (raw === "keyword" || raw === "llm") return raw;
  throw new Error(`Unsupported reasoner: ${raw}`);
}

/**
 * Picks the verdict reasoner from `REASONER` (default "keyword").
 */
export function createVerdictReasoner(
  name: ReasonerName = parseReasonerName(getString("REASONER", "keyword"))
): VerdictReasoner {
  const keyword = createKeywordVerdictReasoner();
  return name === "llm"
    ? createLlmVerdictReasoner({ fallback: keyword })
    : keyword;
}
