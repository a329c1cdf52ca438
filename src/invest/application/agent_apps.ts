import type { Messenger } from "../../a2a/messenger";
import { createAgentApp } from "../../a2a/server";
import type { Hono } from "hono";
import type {
  SearchProvider,
  VerdictReasoner,
} from "../infrastructure/contracts";
import {
  buildEvaluatorAgentCard,
  createEvaluatorExecutor,
} from "./evaluator_agent";
import {
  buildResearchAgentCard,
  createResearchExecutor,
} from "./research_agent";

export type AgentRole = "research" | "evaluator";

export const DEFAULT_AGENT_ENDPOINTS: Record<
  AgentRole,
  { host: string; port: number }
> = {
  research: { host: "127.0.0.1", port: 9119 },
  evaluator: { host: "127.0.0.1", port: 9109 },
};

export function parseAgentRole(raw: string): AgentRole {
  if (raw === "research" || raw === "evaluator") return raw;
  throw new Error(`Unknown agent role: ${raw} (expected research or evaluator)`);
}

export interface AgentAppDeps {
  search?: SearchProvider;
  reasoner?: VerdictReasoner;
  messenger?: Messenger;
}

/**
 * HTTP app for one benchmark agent; `cardUrl` is the URL it advertises.
 */
export function createInvestAgentApp(
  role: AgentRole,
  cardUrl: string,
  deps: AgentAppDeps = {}
): Hono {
  if (role === "research") {
    return createAgentApp({
      card: buildResearchAgentCard(cardUrl),
      executor: createResearchExecutor({
        search: deps.search,
        reasoner: deps.reasoner,
      }),
    });
  }
  return createAgentApp({
    card: buildEvaluatorAgentCard(cardUrl),
    executor: createEvaluatorExecutor({
      search: deps.search,
      messenger: deps.messenger,
    }),
  });
}
