/**
 * Domain types for the invest benchmark.
 * Dates stay as `MM/DD/YYYY` strings on the wire; see util/dates for parsing.
 */

export interface DateWindow {
  start: string;
  end: string;
}

export type EvidenceDatePolicyName =
  | "trust-provider"
  | "drop-out-of-window"
  | "require-date";

/** Search tuning shared by both agents. */
export interface SearchSettings {
  baseQuery?: string;
  maxResults: number;
  maxTokens: number;
  maxTokensPerPage: number;
  country?: string;
  evidenceDatePolicy: EvidenceDatePolicyName;
}

export interface ScenarioConfig extends SearchSettings {
  tickers: string[];
  targetDate: string;
  targetIncreasePct: number;
  researchWindow: DateWindow;
  verifyWindow: DateWindow;
}

/** Payload the evaluator sends to the research agent. */
export interface ResearchWorkload extends SearchSettings {
  tickers: string[];
  targetDate: string;
  targetIncreasePct: number;
  researchWindow: DateWindow;
}

export interface Evidence {
  title?: string;
  url?: string;
  date?: string;
  snippet?: string;
}

export type VerdictLabel = "increase" | "no_increase" | "unknown";

export interface Verdict {
  ticker: string;
  verdict: VerdictLabel;
  /** true iff verdict is "increase" */
  predictedIncrease: boolean;
  confidence: number;
  rationale: string;
  evidence: Evidence[];
  insufficientData: boolean;
}

export interface ResearchResponse {
  runId: string;
  targetDate: string;
  targetIncreasePct: number;
  decisions: Verdict[];
}

export type ScoreStatus = "pass" | "fail" | "indeterminate";

export interface ScoreResult {
  ticker: string;
  agentVerdict: VerdictLabel | null;
  predictedIncrease: boolean;
  agentConfidence: number | null;
  /** null when ground truth could not be determined */
  actualIncrease: boolean | null;
  status: ScoreStatus;
  pass: boolean | null;
  rationale: string;
  evidenceChecked: number;
}

export interface ResultSummary {
  total: number;
  determinate: number;
  passed: number;
  failed: number;
  indeterminate: number;
  /** Percentage of passed over determinate; null for zero of zero */
  passRate: number | null;
  lines: string[];
}

export interface ResultArtifact {
  runId: string;
  results: ScoreResult[];
  summary: ResultSummary;
}
