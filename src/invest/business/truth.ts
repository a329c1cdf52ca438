import type { SearchHit } from "../../ai-tools";

const PERCENT = /(\d+(?:\.\d+)?)%/g;

/**
 * Largest percentage mentioned in the text; "thirty percent" counts as 30.
 */
export function extractMaxPercentage(text: string): number {
  let max = 0;
  for (const match of text.matchAll(PERCENT)) {
    const pct = Number(match[1]);
    if (Number.isFinite(pct)) max = Math.max(max, pct);
  }
  if (text.toLowerCase().includes("thirty percent")) max = Math.max(max, 30);
  return max;
}

export interface TruthInference {
  /** undefined when there is no evidence to decide on */
  actualIncrease: boolean | undefined;
  rationale: string;
}

export function inferTruth(
  hits: SearchHit[],
  targetIncreasePct: number
): TruthInference {
  if (hits.length === 0) {
    return {
      actualIncrease: undefined,
      rationale: "No verify-window evidence found.",
    };
  }

  const corpus = [
    ...hits.map((h) => h.title ?? "").filter(Boolean),
    ...hits.map((h) => h.snippet ?? "").filter(Boolean),
  ].join("\n");
  const maxPct = extractMaxPercentage(corpus);
  // 0.3 * 100 is 30.000000000000004 in floating point
  const thresholdPct = Math.round(targetIncreasePct * 100 * 1e6) / 1e6;
  if (maxPct >= thresholdPct) {
    return {
      actualIncrease: true,
      rationale: `Found mention of ${maxPct.toFixed(1)}% move.`,
    };
  }
  return {
    actualIncrease: false,
    rationale: `Max move mentioned: ${maxPct.toFixed(1)}% (< ${thresholdPct.toFixed(0)}%).`,
  };
}
