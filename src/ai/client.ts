import { createOpenAI } from "@ai-sdk/openai";
import { generateObject } from "ai";
import { z } from "zod";
import { loadAiConfig, type AiConfig } from "./config";

export interface GenerateJsonParams<TSchema extends z.ZodTypeAny> {
  system: string;
  prompt: string;
  schema: TSchema;
}

export interface AiClient {
  readonly model: string;
  generateJson<TSchema extends z.ZodTypeAny>(
    params: GenerateJsonParams<TSchema>
  ): Promise<z.infer<TSchema>>;
}

export function createAiClient(cfg: AiConfig = loadAiConfig()): AiClient {
  if (cfg.provider === "openai") {
    const provider = createOpenAI({ apiKey: cfg.apiKey });
    return {
      model: cfg.model,
      async generateJson<TSchema extends z.ZodTypeAny>({
        system,
        prompt,
        schema,
      }: GenerateJsonParams<TSchema>): Promise<z.infer<TSchema>> {
        const requested: z.ZodTypeAny = schema;
        const { object } = await generateObject({
          model: provider(cfg.model),
          output: "object",
          system,
          prompt,
          schema: requested,
        });
        // The SDK validates too; parsing again restores the caller's static type
        return schema.parse(object);
      },
    };
  }

  throw new Error(`Unsupported AI provider: ${cfg.provider}`);
}
