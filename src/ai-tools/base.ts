import { z } from "zod";

/**
 * Result type returned by all tools. Tools MUST NOT throw.
 */
export type Result<TData, TMeta = unknown> =
  | { ok: true; data: TData; meta?: TMeta }
  | { ok: false; error: string; meta?: TMeta };

/**
 * Tool categories used by the benchmark agents
 */
export enum ToolCategory {
  SEARCH = "search",
}

/**
 * Plain-object tool contract. `execute` validates its input before the handler runs.
 */
export interface Tool<TInput, TOutput> {
  name: string;
  description: string;
  category: ToolCategory;
  execute(input: unknown): Promise<Result<TOutput>>;
}

/**
 * Helper to define a tool with input validation and unified error handling.
 */
export function defineTool<TInput, TOutput>(args: {
  name: string;
  description: string;
  category: ToolCategory;
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: (input: TInput) => Promise<Result<TOutput>> | Result<TOutput>;
}): Tool<TInput, TOutput> {
  const { name, description, category, schema, handler } = args;

  return {
    name,
    description,
    category,
    async execute(input) {
      const parsed = schema.safeParse(input);
      if (!parsed.success) {
        return {
          ok: false,
          error: `Invalid input for ${name}: ${parsed.error.issues
            .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
            .join("; ")}`,
        };
      }
      try {
        return await handler(parsed.data);
      } catch (err) {
        // Tools MUST NOT throw; normalize escaped errors
        return {
          ok: false,
          error: err instanceof Error ? err.message : String(err),
        };
      }
    },
  };
}
