import { parseUsWindow } from "../../util/dates";
import { getLogger } from "../../util/logger";
import type {
  Evidence,
  ResearchResponse,
  ResearchWorkload,
  Verdict,
} from "../domain/types";
import type {
  SearchProvider,
  VerdictReasoner,
} from "../infrastructure/contracts";
import { filterHitsByWindow, getEvidenceDatePolicy } from "./evidence_policy";
import { buildQuery, defaultResearchQuery } from "./queries";

export const MAX_EVIDENCE = 3;

export interface ResearchDeps {
  search: SearchProvider;
  reasoner: VerdictReasoner;
}

function insufficient(ticker: string, reason: string): Verdict {
  return {
    ticker,
    verdict: "unknown",
    predictedIncrease: false,
    confidence: 0.2,
    rationale: `Insufficient data: ${reason}`,
    evidence: [],
    insufficientData: true,
  };
}

/**
 * One ticker, research window only. Never throws; search problems become an
 * insufficient-data verdict.
 */
export async function researchTicker(
  ticker: string,
  workload: ResearchWorkload,
  deps: ResearchDeps
): Promise<Verdict> {
  const logger = getLogger("invest/research");
  const window = parseUsWindow(workload.researchWindow);
  if (!window) {
    return insufficient(ticker, "research window is invalid.");
  }

  const query = buildQuery(ticker, workload.baseQuery, defaultResearchQuery);
  const res = await deps.search.search({
    query,
    window: workload.researchWindow,
    settings: workload,
  });
  if (!res.ok) {
    logger.warn({ ticker, error: res.error }, "Research search unavailable");
    return insufficient(ticker, `search unavailable (${res.error}).`);
  }

  const policy = getEvidenceDatePolicy(workload.evidenceDatePolicy);
  const { kept, dropped } = filterHitsByWindow(res.data, window, policy);
  if (dropped > 0) {
    logger.debug(
      { ticker, dropped, policy: policy.name },
      "Dropped results outside the research window"
    );
  }
  if (kept.length === 0) {
    return insufficient(
      ticker,
      "no search results available in the research window."
    );
  }

  const inference = await deps.reasoner.infer({
    ticker,
    hits: kept,
    targetDate: workload.targetDate,
    targetIncreasePct: workload.targetIncreasePct,
  });
  const evidence: Evidence[] = kept.slice(0, MAX_EVIDENCE).map((h) => ({
    title: h.title,
    url: h.url,
    date: h.date ?? h.lastUpdated,
    snippet: h.snippet,
  }));

  return {
    ticker,
    verdict: inference.verdict,
    predictedIncrease: inference.verdict === "increase",
    confidence: inference.confidence,
    rationale: inference.rationale,
    evidence,
    insufficientData: false,
  };
}

/**
 * Researches every ticker concurrently; decisions keep the input order.
 */
export async function runResearch(
  workload: ResearchWorkload,
  deps: ResearchDeps & { runId: string }
): Promise<ResearchResponse> {
  const logger = getLogger("invest/research");
  logger.info(
    {
      runId: deps.runId,
      tickers: workload.tickers,
      window: workload.researchWindow,
      reasoner: deps.reasoner.name,
    },
    "Research started"
  );
  const decisions = await Promise.all(
    workload.tickers.map((t) => researchTicker(t, workload, deps))
  );
  return {
    runId: deps.runId,
    targetDate: workload.targetDate,
    targetIncreasePct: workload.targetIncreasePct,
    decisions,
  };
}
