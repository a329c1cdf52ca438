import type { AiClient } from "../../ai/client";
import type { VerdictReasoner } from "../infrastructure/contracts";
import { createLlmVerdictReasoner } from "../infrastructure/llm_reasoner";

const params = {
  ticker: "RR",
  hits: [{ title: "Backlog at record", date: "2025-07-01", snippet: "Orders up" }],
  targetDate: "12/31/2025",
  targetIncreasePct: 0.3,
};

function fakeClient(reply: unknown, prompts: string[] = []): AiClient {
  return {
    model: "test-model",
    async generateJson({ prompt, schema }) {
      prompts.push(prompt);
      return schema.parse(reply);
    },
  };
}

describe("createLlmVerdictReasoner", () => {
  const fallback: VerdictReasoner = {
    name: "stub",
    infer: jest.fn(async () => ({
      verdict: "unknown" as const,
      confidence: 0.35,
      rationale: "fallback",
    })),
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  test("returns the model's structured verdict", async () => {
    const prompts: string[] = [];
    const reasoner = createLlmVerdictReasoner({
      fallback,
      client: fakeClient(
        { verdict: "increase", confidence: 0.81234, rationale: "Backlog growth" },
        prompts
      ),
    });

    await expect(reasoner.infer(params)).resolves.toEqual({
      verdict: "increase",
      confidence: 0.812,
      rationale: "Backlog growth",
    });
    expect(fallback.infer).not.toHaveBeenCalled();
    expect(prompts[0]).toContain("Ticker: RR.");
    expect(prompts[0]).toContain("rise at least 30% by 12/31/2025");
    expect(prompts[0]).toContain('"title":"Backlog at record"');
  });

  test("falls back when the model output does not validate", async () => {
    const reasoner = createLlmVerdictReasoner({
      fallback,
      client: fakeClient({ verdict: "maybe" }),
    });
    await expect(reasoner.infer(params)).resolves.toEqual({
      verdict: "unknown",
      confidence: 0.35,
      rationale: "fallback",
    });
    expect(fallback.infer).toHaveBeenCalledWith(params);
  });

  test("falls back when the model call fails", async () => {
    const client: AiClient = {
      model: "test-model",
      generateJson: async () => {
        throw new Error("rate limited");
      },
    };
    const reasoner = createLlmVerdictReasoner({ fallback, client });
    const out = await reasoner.infer(params);
    expect(out.rationale).toBe("fallback");
    expect(reasoner.name).toBe("llm");
  });
});
