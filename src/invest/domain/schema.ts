import type { Result } from "../../ai-tools";
import { errorMessage } from "../../util/errors";
import { z } from "zod";
import {
  compareDates,
  parseUsDate,
  parseUsWindow,
} from "../../util/dates";
import type {
  DateWindow,
  ResearchWorkload,
  ScenarioConfig,
  SearchSettings,
} from "./types";

/**
 * Wire schemas. Requests use the scenario file's snake_case keys; the
 * research response is the JSON form of the domain types.
 */

export const DEFAULT_SCENARIO = {
  tickers: ["RR"],
  target_date: "12/31/2025",
  target_increase_pct: 0.3,
  research_window: { start: "06/01/2025", end: "09/30/2025" },
  verify_window: { start: "12/01/2025", end: "12/31/2025" },
} as const;

// TOML integers may arrive as bigint
const tomlNumber = z.preprocess(
  (v) => (typeof v === "bigint" ? Number(v) : v),
  z.number()
);

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : undefined));

export const usDateSchema = z
  .string()
  .refine((v) => parseUsDate(v) !== undefined, {
    message: "expected a valid MM/DD/YYYY date",
  });

export const dateWindowSchema = z
  .object({ start: usDateSchema, end: usDateSchema })
  .refine((w) => parseUsWindow(w) !== undefined, {
    message: "window start must not be after its end",
  });

export const tickerSchema = z
  .string()
  .trim()
  .min(1, "ticker must not be empty")
  .transform((t) => t.toUpperCase());

export const evidenceDatePolicySchema = z.enum([
  "trust-provider",
  "drop-out-of-window",
  "require-date",
]);

const searchSettingsShape = {
  base_query: optionalText,
  max_results: tomlNumber
    .pipe(z.number().int().positive().max(20))
    .default(12),
  max_tokens: tomlNumber.pipe(z.number().int().positive()).default(12_000),
  max_tokens_per_page: tomlNumber
    .pipe(z.number().int().positive())
    .default(2048),
  country: optionalText.pipe(z.string().length(2).optional()),
  evidence_date_policy: evidenceDatePolicySchema.default("drop-out-of-window"),
};

type SearchSettingsWire = {
  base_query?: string;
  max_results: number;
  max_tokens: number;
  max_tokens_per_page: number;
  country?: string;
  evidence_date_policy: SearchSettings["evidenceDatePolicy"];
};

function toSearchSettings(wire: SearchSettingsWire): SearchSettings {
  return {
    baseQuery: wire.base_query,
    maxResults: wire.max_results,
    maxTokens: wire.max_tokens,
    maxTokensPerPage: wire.max_tokens_per_page,
    country: wire.country,
    evidenceDatePolicy: wire.evidence_date_policy,
  };
}

function checkWindowOrder(
  value: {
    target_date: string;
    research_window: DateWindow;
    verify_window?: DateWindow;
  },
  ctx: z.RefinementCtx
): void {
  const target = parseUsDate(value.target_date);
  const research = parseUsWindow(value.research_window);
  if (target && research && compareDates(research.end, target) > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["research_window", "end"],
      message: "research window must end on or before target_date",
    });
  }
  if (!value.verify_window) return;
  const verify = parseUsWindow(value.verify_window);
  if (research && verify && compareDates(verify.start, research.end) <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["verify_window", "start"],
      message: "verify window must start after the research window ends",
    });
  }
}

const scenarioConfigShape = {
  ...searchSettingsShape,
  tickers: z.array(tickerSchema),
  target_date: usDateSchema,
  target_increase_pct: tomlNumber
    .pipe(z.number().positive())
    .default(DEFAULT_SCENARIO.target_increase_pct),
  research_window: dateWindowSchema,
  verify_window: dateWindowSchema,
};

function toScenarioConfig(
  wire: z.infer<z.ZodObject<typeof scenarioConfigShape>>
): ScenarioConfig {
  return {
    ...toSearchSettings(wire),
    tickers: wire.tickers,
    targetDate: wire.target_date,
    targetIncreasePct: wire.target_increase_pct,
    researchWindow: wire.research_window,
    verifyWindow: wire.verify_window,
  };
}

/**
 * `[config]` table of a scenario file. Tickers, target date and both windows
 * must be present.
 */
export const scenarioFileConfigSchema = z
  .object(scenarioConfigShape)
  .superRefine(checkWindowOrder)
  .transform(toScenarioConfig);

/**
 * Assessment request config. Missing fields fall back to the reference
 * scenario (RR, +30% by 12/31/2025).
 */
export const scenarioConfigSchema = z
  .object({
    ...scenarioConfigShape,
    tickers: scenarioConfigShape.tickers.default([...DEFAULT_SCENARIO.tickers]),
    target_date: usDateSchema.default(DEFAULT_SCENARIO.target_date),
    research_window: dateWindowSchema.default({
      ...DEFAULT_SCENARIO.research_window,
    }),
    verify_window: dateWindowSchema.default({
      ...DEFAULT_SCENARIO.verify_window,
    }),
  })
  .superRefine(checkWindowOrder)
  .transform(toScenarioConfig);

export type ScenarioConfigInput = z.input<typeof scenarioConfigSchema>;

/**
 * Research agent request body.
 */
export const researchWorkloadSchema = z
  .object({
    ...searchSettingsShape,
    tickers: z.array(tickerSchema),
    target_date: usDateSchema,
    target_increase_pct: tomlNumber.pipe(z.number().positive()).default(0.3),
    research_window: dateWindowSchema,
  })
  .superRefine(checkWindowOrder)
  .transform(
    (wire): ResearchWorkload => ({
      ...toSearchSettings(wire),
      tickers: wire.tickers,
      targetDate: wire.target_date,
      targetIncreasePct: wire.target_increase_pct,
      researchWindow: wire.research_window,
    })
  );

export type ResearchWorkloadWire = z.input<typeof researchWorkloadSchema>;

export function toWorkloadWire(cfg: ScenarioConfig): ResearchWorkloadWire {
  return {
    tickers: cfg.tickers,
    target_date: cfg.targetDate,
    target_increase_pct: cfg.targetIncreasePct,
    research_window: cfg.researchWindow,
    base_query: cfg.baseQuery,
    max_results: cfg.maxResults,
    max_tokens: cfg.maxTokens,
    max_tokens_per_page: cfg.maxTokensPerPage,
    country: cfg.country,
    evidence_date_policy: cfg.evidenceDatePolicy,
  };
}

/**
 * Evaluator request body: who to talk to, and the scenario config.
 */
export const assessmentRequestSchema = z.object({
  participants: z.record(z.string().url()),
  config: z.record(z.unknown()).default({}),
});

export type AssessmentRequest = z.infer<typeof assessmentRequestSchema>;

/**
 * Research agent decisions as read by the evaluator. Lenient: a malformed
 * field degrades to "unknown" or null, and an entry that is not an object is
 * dropped, rather than rejecting the batch.
 */
export const decisionSchema = z.object({
  ticker: z
    .string()
    .catch("")
    .transform((t) => t.trim().toUpperCase()),
  verdict: z.enum(["increase", "no_increase", "unknown"]).catch("unknown"),
  confidence: z.number().min(0).max(1).nullable().catch(null),
});

export type Decision = z.infer<typeof decisionSchema>;

export const decisionsPayloadSchema = z
  .object({ decisions: z.array(z.unknown()).catch([]) })
  .transform(({ decisions }) => ({
    decisions: decisions.flatMap((raw): Decision[] => {
      const parsed = decisionSchema.safeParse(raw);
      return parsed.success ? [parsed.data] : [];
    }),
  }));

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (i) => `${i.path.join(".") || "(root)"}: ${i.message}`
  );
}

/**
 * Parses a message body as JSON and validates it. Problems come back as a
 * single line suitable for an "Invalid request" rejection.
 */
export function parseJsonRequest<TOut>(
  text: string,
  schema: z.ZodType<TOut, z.ZodTypeDef, unknown>
): Result<TOut> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error).join("; ") };
  }
  return { ok: true, data: parsed.data };
}

export type ScenarioConfigWire = ResearchWorkloadWire & {
  verify_window: DateWindow;
};

export function toScenarioConfigWire(cfg: ScenarioConfig): ScenarioConfigWire {
  return { ...toWorkloadWire(cfg), verify_window: cfg.verifyWindow };
}

const verdictLabelSchema = z.enum(["increase", "no_increase", "unknown"]);

export const scoreResultSchema = z.object({
  ticker: z.string(),
  agentVerdict: verdictLabelSchema.nullable(),
  predictedIncrease: z.boolean(),
  agentConfidence: z.number().nullable(),
  actualIncrease: z.boolean().nullable(),
  status: z.enum(["pass", "fail", "indeterminate"]),
  pass: z.boolean().nullable(),
  rationale: z.string(),
  evidenceChecked: z.number().int().nonnegative(),
});

/**
 * Evaluator `Result` artifact as read back by the runner.
 */
export const resultArtifactSchema = z.object({
  runId: z.string(),
  results: z.array(scoreResultSchema),
  summary: z.object({
    total: z.number(),
    determinate: z.number(),
    passed: z.number(),
    failed: z.number(),
    indeterminate: z.number(),
    passRate: z.number().nullable(),
    lines: z.array(z.string()),
  }),
});
