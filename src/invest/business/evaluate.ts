import { parseUsWindow } from "../../util/dates";
import { getLogger } from "../../util/logger";
import type { Decision } from "../domain/schema";
import type {
  ResultArtifact,
  ResultSummary,
  ScenarioConfig,
  ScoreResult,
} from "../domain/types";
import type { SearchProvider } from "../infrastructure/contracts";
import { filterHitsByWindow, getEvidenceDatePolicy } from "./evidence_policy";
import { buildQuery, defaultVerifyQuery } from "./queries";
import { inferTruth } from "./truth";

export const MISSING_VERDICT_RATIONALE = "Research agent returned no verdict.";

function indeterminate(
  decision: Decision | { ticker: string },
  rationale: string
): ScoreResult {
  const verdict = "verdict" in decision ? decision.verdict : null;
  return {
    ticker: decision.ticker,
    agentVerdict: verdict,
    predictedIncrease: verdict === "increase",
    agentConfidence: "confidence" in decision ? decision.confidence : null,
    actualIncrease: null,
    status: "indeterminate",
    pass: null,
    rationale,
    evidenceChecked: 0,
  };
}

/**
 * Fact-checks one decision against verify-window search results. The
 * decision's own evidence is never consulted.
 */
export async function scoreDecision(
  decision: Decision,
  config: ScenarioConfig,
  search: SearchProvider
): Promise<ScoreResult> {
  const logger = getLogger("invest/evaluate");
  const window = parseUsWindow(config.verifyWindow);
  if (!window) return indeterminate(decision, "Verify window is invalid.");

  const res = await search.search({
    query: buildQuery(decision.ticker, config.baseQuery, defaultVerifyQuery),
    window: config.verifyWindow,
    settings: config,
  });
  if (!res.ok) {
    logger.warn(
      { ticker: decision.ticker, error: res.error },
      "Verify search unavailable"
    );
    return indeterminate(decision, `Search unavailable: ${res.error}`);
  }

  const policy = getEvidenceDatePolicy(config.evidenceDatePolicy);
  const { kept } = filterHitsByWindow(res.data, window, policy);
  const truth = inferTruth(kept, config.targetIncreasePct);
  if (truth.actualIncrease === undefined) {
    return indeterminate(decision, truth.rationale);
  }

  // "unknown" is scored as a no-increase prediction
  const predictedIncrease = decision.verdict === "increase";
  const pass = predictedIncrease === truth.actualIncrease;
  return {
    ticker: decision.ticker,
    agentVerdict: decision.verdict,
    predictedIncrease,
    agentConfidence: decision.confidence,
    actualIncrease: truth.actualIncrease,
    status: pass ? "pass" : "fail",
    pass,
    rationale: truth.rationale,
    evidenceChecked: kept.length,
  };
}

export function summarize(params: {
  runId: string;
  tickers: string[];
  results: ScoreResult[];
}): ResultSummary {
  const { runId, tickers, results } = params;
  const passed = results.filter((r) => r.status === "pass").length;
  const failed = results.filter((r) => r.status === "fail").length;
  const indeterminateCount = results.length - passed - failed;
  const determinate = passed + failed;
  const passRate = determinate === 0 ? null : (passed / determinate) * 100;

  return {
    total: results.length,
    determinate,
    passed,
    failed,
    indeterminate: indeterminateCount,
    passRate,
    lines: [
      `Invest benchmark (run ${runId})`,
      `Tickers: ${tickers.length ? tickers.join(", ") : "none"}`,
      passRate === null
        ? "Pass rate: n/a (0/0)"
        : `Pass rate: ${passRate.toFixed(1)}% (${passed}/${determinate})`,
      `Indeterminate: ${indeterminateCount}`,
    ],
  };
}

/**
 * Scores every decision concurrently (input order kept), then appends
 * configured tickers the research agent skipped.
 */
export async function evaluateDecisions(params: {
  runId: string;
  decisions: Decision[];
  config: ScenarioConfig;
  search: SearchProvider;
}): Promise<ResultArtifact> {
  const { runId, config, search } = params;
  const logger = getLogger("invest/evaluate");
  const decisions = params.decisions.filter((d) => d.ticker !== "");

  const results = await Promise.all(
    decisions.map((d) => scoreDecision(d, config, search))
  );
  const answered = new Set(decisions.map((d) => d.ticker));
  for (const ticker of config.tickers) {
    if (!answered.has(ticker)) {
      results.push(indeterminate({ ticker }, MISSING_VERDICT_RATIONALE));
    }
  }

  const summary = summarize({ runId, tickers: config.tickers, results });
  logger.info(
    {
      runId,
      passed: summary.passed,
      failed: summary.failed,
      indeterminate: summary.indeterminate,
    },
    "Evaluation finished"
  );
  return { runId, results, summary };
}
