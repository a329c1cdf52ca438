import { getEnvVar, getString } from "../util/env";

export type AiProvider = "openai"; // extend when adding more

export interface AiConfig {
  provider: AiProvider;
  model: string;
  apiKey: string | undefined;
}

function parseProvider(raw: string): AiProvider {
  if (raw === "openai") return raw;
  throw new Error(`Unsupported AI provider: ${raw}`);
}

export function loadAiConfig(): AiConfig {
  const provider = parseProvider(getString("MODEL_PROVIDER", "openai"));
  const model = getString("MODEL_NAME", "gpt-4o-mini");
  const apiKey = getEnvVar("OPENAI_API_KEY");
  return { provider, model, apiKey };
}
