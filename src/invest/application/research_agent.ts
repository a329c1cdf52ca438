import type { AgentExecutor } from "../../a2a/server";
import {
  agentCardSchema,
  getMessageText,
  newId,
  toDataPart,
  type AgentCard,
} from "../../a2a/types";
import { getLogger, withRunContext } from "../../util/logger";
import { parseJsonRequest, researchWorkloadSchema } from "../domain/schema";
import { runResearch } from "../business/research";
import type {
  SearchProvider,
  VerdictReasoner,
} from "../infrastructure/contracts";
import {
  createPerplexitySearchProvider,
} from "../infrastructure/search_provider";
import { createVerdictReasoner } from "./reasoner";

export const RESEARCH_AGENT_NAME = "invest_research_agent";

export function buildResearchAgentCard(url: string): AgentCard {
  return agentCardSchema.parse({
    name: RESEARCH_AGENT_NAME,
    description:
      "Researches tickers within a date window and predicts whether each reaches a target gain",
    url,
    version: "1.0.0",
    defaultInputModes: ["text"],
    defaultOutputModes: ["data"],
    capabilities: { streaming: false },
    skills: [
      {
        id: "invest_research",
        name: "Windowed equity research",
        description:
          "Returns one verdict per ticker with evidence dated inside the research window",
        tags: ["investing", "research"],
      },
    ],
  });
}

export function createResearchExecutor(
  deps: {
    search?: SearchProvider;
    reasoner?: VerdictReasoner;
  } = {}
): AgentExecutor {
  const search = deps.search ?? createPerplexitySearchProvider();
  const reasoner = deps.reasoner ?? createVerdictReasoner();
  return {
    async execute(message, updater) {
      const logger = getLogger("invest/research_agent");
      const workload = parseJsonRequest(
        getMessageText(message),
        researchWorkloadSchema
      );
      if (!workload.ok) {
        logger.warn({ error: workload.error }, "Rejected research request");
        await updater.reject(`Invalid request: ${workload.error}`);
        return;
      }

      await updater.updateStatus("working", "Running analysis");
      const runId = newId().slice(0, 8);
      const runLogger = withRunContext("invest/research_agent", {
        runId,
        taskId: updater.taskId,
        contextId: updater.contextId,
      });
      const response = await runResearch(workload.data, {
        search,
        reasoner,
        runId,
      });
      await updater.addArtifact("Decisions", [toDataPart(response)]);
      await updater.complete();
      runLogger.info(
        {
          tickers: workload.data.tickers,
          decisions: response.decisions.length,
        },
        "Research run complete"
      );
    },
  };
}
