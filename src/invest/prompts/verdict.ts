import { z } from "zod";

export const VerdictZodSchema = z.object({
  verdict: z
    .enum(["increase", "no_increase", "unknown"])
    .describe("Whether the stock rises by the target percentage by the target date"),
  confidence: z.number().min(0).max(1),
  rationale: z
    .string()
    .describe("One or two sentences citing only the provided search results"),
});

export function buildVerdictSystemPrompt(): string {
  return [
    "You are an equity research analyst.",
    "Judge only from the search results provided; they are all dated within the research window.",
    "Do not use knowledge of events after the research window.",
    'Answer "unknown" when the results do not support a judgement.',
    "Only output valid JSON that matches the provided schema.",
  ].join("\n");
}

export function buildVerdictUserPrompt(params: {
  ticker: string;
  targetDate: string;
  targetIncreasePct: number;
  results: Array<{ title?: string; date?: string; snippet?: string }>;
}): string {
  const pct = Math.round(params.targetIncreasePct * 100);
  return [
    `Ticker: ${params.ticker}.`,
    `Question: will the share price rise at least ${pct}% by ${params.targetDate}?`,
    "Search results:",
    JSON.stringify(params.results),
    "Return JSON only.",
  ].join("\n");
}
