import type { SearchHit } from "../../ai-tools";
import type {
  VerdictInference,
  VerdictReasoner,
} from "../infrastructure/contracts";

export const POSITIVE_KEYWORDS = [
  "beat",
  "record",
  "profit",
  "profitability",
  "growth",
  "upgrade",
  "raise",
  "surge",
  "soar",
  "rally",
  "strong",
  "bullish",
  "momentum",
  "guidance",
] as const;

export const NEGATIVE_KEYWORDS = [
  "loss",
  "decline",
  "downgrade",
  "cut",
  "plunge",
  "slump",
  "warning",
  "bearish",
  "drop",
  "falls",
  "weak",
  "miss",
] as const;

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Keyword balance: +1 per positive occurrence, -1 per negative occurrence.
 * Substring matching, so "profitability" also counts as "profit".
 */
export function scoreSentiment(text: string): number {
  const lower = text.toLowerCase();
  let score = 0;
  for (const word of POSITIVE_KEYWORDS) score += countOccurrences(lower, word);
  for (const word of NEGATIVE_KEYWORDS) score -= countOccurrences(lower, word);
  return score;
}

export function hitsToText(hits: SearchHit[]): string {
  return hits.map((h) => `${h.title ?? ""}\n${h.snippet ?? ""}`).join("\n");
}

const round3 = (n: number) => Math.round(n * 1000) / 1000;

export function inferVerdictFromKeywords(
  hits: SearchHit[],
  targetIncreasePct = 0.3
): VerdictInference {
  if (hits.length === 0) {
    return {
      verdict: "unknown",
      confidence: 0.2,
      rationale:
        "Insufficient data: no search results available in the research window.",
    };
  }

  const score = scoreSentiment(hitsToText(hits));
  if (score > 0) {
    return {
      verdict: "increase",
      confidence: round3(Math.min(0.9, 0.55 + 0.1 * score)),
      rationale: "Positive sentiment dominates fundamentals.",
    };
  }
  if (score < 0) {
    return {
      verdict: "no_increase",
      confidence: round3(Math.min(0.9, 0.55 + 0.1 * Math.abs(score))),
      rationale: "Negative or cautious sentiment dominates.",
    };
  }
  return {
    verdict: "unknown",
    confidence: 0.35,
    rationale: `Mixed or neutral fundamentals; unable to project ${Math.round(
      targetIncreasePct * 100
    )}%+ gain.`,
  };
}

/**
 * Deterministic reasoner; no model call, so benchmark runs are reproducible.
 */
export function createKeywordVerdictReasoner(): VerdictReasoner {
  return {
    name: "keyword",
    async infer({ hits, targetIncreasePct }) {
      return inferVerdictFromKeywords(hits, targetIncreasePct);
    },
  };
}
