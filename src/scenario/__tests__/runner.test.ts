import type { Hono } from "hono";
import { routeFetchToApps } from "../../a2a/__tests__/fetch_router";
import { serveAgent } from "../../a2a/server";
import { createInvestAgentApp } from "../../invest/application/agent_apps";
import { createKeywordVerdictReasoner } from "../../invest/business/sentiment";
import { createFakeSearch } from "../../invest/__tests__/helpers";
import { parseScenario } from "../config";
import { listenPort, runScenario, waitForAgent } from "../runner";

const mockMounted = new Map<string, Hono>();

// Agents "listen" by registering with the in-process fetch router
jest.mock("../../a2a/server", () => {
  const actual =
    jest.requireActual<typeof import("../../a2a/server")>("../../a2a/server");
  return {
    ...actual,
    serveAgent: jest.fn(
      async (params: { app: Hono; host: string; port: number }) => {
        const origin = `http://${params.host}:${params.port}`;
        mockMounted.set(origin, params.app);
        return {
          url: `${origin}/`,
          close: async () => {
            mockMounted.delete(origin);
          },
        };
      }
    ),
  };
});

const search = createFakeSearch((query) => {
  const fundamentals = query.includes("fundamentals");
  return {
    ok: true,
    data: fundamentals
      ? [{ title: "RR record backlog", date: "2025-07-01" }]
      : [{ title: "RR shares up 12% in December", date: "2025-12-10" }],
  };
});
const deps = { search, reasoner: createKeywordVerdictReasoner() };

function scenarioWith(extra: Record<string, unknown> = {}) {
  return parseScenario({
    readiness_timeout_ms: 1000,
    green_agent: { endpoint: "http://127.0.0.1:9109" },
    participants: [{ role: "agent", endpoint: "http://127.0.0.1:9119" }],
    config: {
      tickers: ["RR"],
      target_date: "12/31/2025",
      research_window: { start: "06/01/2025", end: "09/30/2025" },
      verify_window: { start: "12/01/2025", end: "12/31/2025" },
    },
    ...extra,
  });
}

describe("runScenario", () => {
  let fetchSpy: ReturnType<typeof routeFetchToApps>;

  beforeEach(() => {
    mockMounted.clear();
    search.calls.length = 0;
    jest.clearAllMocks();
    fetchSpy = routeFetchToApps(mockMounted);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  test("hosts both agents, runs the assessment and stops them", async () => {
    const outcome = await runScenario(scenarioWith(), { deps });

    expect(serveAgent).toHaveBeenCalledTimes(2);
    expect(outcome?.artifact.results).toEqual([
      {
        ticker: "RR",
        agentVerdict: "increase",
        predictedIncrease: true,
        agentConfidence: 0.65,
        actualIncrease: false,
        status: "fail",
        pass: false,
        rationale: "Max move mentioned: 12.0% (< 30%).",
        evidenceChecked: 1,
      },
    ]);
    expect(outcome?.summaryText.split("\n").slice(1)).toEqual([
      "Tickers: RR",
      "Pass rate: 0.0% (0/1)",
      "Indeterminate: 0",
    ]);
    expect(mockMounted.size).toBe(0);
  });

  test("reuses an agent that already answers at its endpoint", async () => {
    mockMounted.set(
      "http://127.0.0.1:9119",
      createInvestAgentApp("research", "http://127.0.0.1:9119/", deps)
    );
    const outcome = await runScenario(scenarioWith(), { deps });

    expect(serveAgent).toHaveBeenCalledTimes(1);
    expect(outcome?.artifact.summary.total).toBe(1);
    // The external agent is left running
    expect([...mockMounted.keys()]).toEqual(["http://127.0.0.1:9119"]);
  });

  test("serve-only waits for the stop signal without assessing", async () => {
    const outcome = await runScenario(scenarioWith(), {
      deps,
      serveOnly: true,
      untilStopped: Promise.resolve(),
    });
    expect(outcome).toBeUndefined();
    expect(search.calls).toHaveLength(0);
    expect(mockMounted.size).toBe(0);
  });

  test("fails when an agent never becomes ready and stops the rest", async () => {
    const scenario = scenarioWith({
      readiness_timeout_ms: 300,
      participants: [
        { role: "agent", endpoint: "http://127.0.0.1:9119" },
        { role: "observer", endpoint: "http://127.0.0.1:9200" },
      ],
    });
    await expect(runScenario(scenario, { deps })).rejects.toThrow(
      "Agent at http://127.0.0.1:9200 is unreachable: not ready after 300ms"
    );
    expect(mockMounted.size).toBe(0);
  });
});

describe("waitForAgent", () => {
  test("gives up as soon as a spawned agent exits", async () => {
    await expect(
      waitForAgent({ url: "http://127.0.0.1:9300", exitCode: 1 }, 5000)
    ).rejects.toThrow("process exited with code 1 before becoming ready");
  });
});

describe("listenPort", () => {
  test("uses the explicit port", () => {
    expect(listenPort(new URL("http://127.0.0.1:9119"))).toBe(9119);
  });

  test("falls back to the protocol default", () => {
    expect(listenPort(new URL("http://agents.local/"))).toBe(80);
    expect(listenPort(new URL("https://agents.local/"))).toBe(443);
  });
});
