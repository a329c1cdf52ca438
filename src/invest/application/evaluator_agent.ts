import { Messenger } from "../../a2a/messenger";
import type { AgentExecutor } from "../../a2a/server";
import {
  agentCardSchema,
  getMessageText,
  newId,
  toDataPart,
  type AgentCard,
} from "../../a2a/types";
import { withRunContext } from "../../util/logger";
import { evaluateDecisions } from "../business/evaluate";
import {
  assessmentRequestSchema,
  decisionsPayloadSchema,
  formatIssues,
  parseJsonRequest,
  scenarioConfigSchema,
  toWorkloadWire,
  type Decision,
} from "../domain/schema";
import type { SearchProvider } from "../infrastructure/contracts";
import {
  createPerplexitySearchProvider,
} from "../infrastructure/search_provider";

export const EVALUATOR_AGENT_NAME = "invest_evaluator";
export const REQUIRED_ROLES = ["agent"] as const;

export function buildEvaluatorAgentCard(url: string): AgentCard {
  return agentCardSchema.parse({
    name: EVALUATOR_AGENT_NAME,
    description:
      "Fact-checks a research agent's ticker verdicts against a later verify window",
    url,
    version: "1.0.0",
    defaultInputModes: ["text"],
    defaultOutputModes: ["text", "data"],
    capabilities: { streaming: false },
    skills: [
      {
        id: "invest_evaluation",
        name: "Invest benchmark evaluation",
        description:
          "Runs the research agent on a scenario and scores each verdict pass or fail",
        tags: ["investing", "benchmark"],
      },
    ],
  });
}

/**
 * Finds the research response among the agent's outputs: first data part
 * carrying `decisions`, else the response text parsed as JSON.
 */
export function extractDecisions(outputs: {
  responseText: string;
  dataParts: Array<Record<string, unknown>>;
}): Decision[] {
  const fromData = outputs.dataParts.find((d) => Array.isArray(d.decisions));
  if (fromData) return decisionsPayloadSchema.parse(fromData).decisions;
  const fromText = parseJsonRequest(outputs.responseText, decisionsPayloadSchema);
  return fromText.ok ? fromText.data.decisions : [];
}

export function createEvaluatorExecutor(
  deps: {
    search?: SearchProvider;
    messenger?: Messenger;
  } = {}
): AgentExecutor {
  const search = deps.search ?? createPerplexitySearchProvider();
  const messenger = deps.messenger ?? new Messenger();
  return {
    async execute(message, updater) {
      const request = parseJsonRequest(
        getMessageText(message),
        assessmentRequestSchema
      );
      if (!request.ok) {
        await updater.reject(`Invalid request: ${request.error}`);
        return;
      }

      const missing = REQUIRED_ROLES.filter(
        (r) => !(r in request.data.participants)
      );
      if (missing.length > 0) {
        await updater.reject(`Missing roles: ${missing.join(", ")}`);
        return;
      }

      const config = scenarioConfigSchema.safeParse(request.data.config);
      if (!config.success) {
        await updater.reject(
          `Invalid request: ${formatIssues(config.error).join("; ")}`
        );
        return;
      }

      const runId = newId().slice(0, 8);
      const agentUrl = request.data.participants.agent;
      const logger = withRunContext("invest/evaluator_agent", {
        runId,
        taskId: updater.taskId,
        contextId: updater.contextId,
      });
      logger.info(
        { agentUrl, tickers: config.data.tickers },
        "Assessment started"
      );

      await updater.updateStatus("working", "Contacting research agent");
      const outputs = await messenger.talkToAgent({
        message: JSON.stringify(toWorkloadWire(config.data)),
        url: agentUrl,
        newConversation: true,
      });
      const decisions = extractDecisions(outputs);
      logger.debug(
        { decisions: decisions.length },
        "Research decisions received"
      );

      const artifact = await evaluateDecisions({
        runId,
        decisions,
        config: config.data,
        search,
      });
      await updater.addArtifact("Result", [
        { kind: "text", text: artifact.summary.lines.join("\n") },
        toDataPart(artifact),
      ]);
      await updater.complete();
    },
  };
}
