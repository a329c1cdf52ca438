import { createAiClient, type AiClient } from "../../ai/client";
import { errorMessage } from "../../util/errors";
import { getLogger } from "../../util/logger";
import {
  VerdictZodSchema,
  buildVerdictSystemPrompt,
  buildVerdictUserPrompt,
} from "../prompts/verdict";
import type { VerdictReasoner } from "./contracts";

/**
 * Model-backed reasoner. Any model failure falls back to `fallback` for that
 * ticker only.
 */
export function createLlmVerdictReasoner(params: {
  fallback: VerdictReasoner;
  client?: AiClient;
}): VerdictReasoner {
  const { fallback } = params;
  let client = params.client;
  return {
    name: "llm",
    async infer(input) {
      const logger = getLogger("invest/llm_reasoner");
      try {
        client ??= createAiClient();
        const out = await client.generateJson({
          system: buildVerdictSystemPrompt(),
          prompt: buildVerdictUserPrompt({
            ticker: input.ticker,
            targetDate: input.targetDate,
            targetIncreasePct: input.targetIncreasePct,
            results: input.hits.map((h) => ({
              title: h.title,
              date: h.date ?? h.lastUpdated,
              snippet: h.snippet,
            })),
          }),
          schema: VerdictZodSchema,
        });
        return {
          verdict: out.verdict,
          confidence: Math.round(out.confidence * 1000) / 1000,
          rationale: out.rationale,
        };
      } catch (err) {
        logger.warn(
          {
            ticker: input.ticker,
            model: client?.model,
            error: errorMessage(err),
          },
          "LLM verdict failed; using fallback"
        );
        return fallback.infer(input);
      }
    },
  };
}
