import { getNumber } from "../util/env";
import {
  AgentRequestError,
  AgentUnreachableError,
  errorMessage,
} from "../util/errors";
import { getLogger } from "../util/logger";
import {
  AGENT_CARD_PATH,
  agentCardSchema,
  collectParts,
  createTextMessage,
  jsonRpcResponseSchema,
  newId,
  type AgentCard,
  type TaskState,
} from "./types";

export const DEFAULT_TIMEOUT_MS = 300_000;

export interface SendOutputs {
  responseText: string;
  contextId?: string;
  dataParts: Array<Record<string, unknown>>;
  /** Task state, or "completed" when the agent answered with a bare message */
  status: TaskState;
}

function resolveTimeout(timeoutMs?: number): number {
  return timeoutMs ?? getNumber("AGENT_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
}

async function fetchJson(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    if (!res.ok) {
      throw new AgentUnreachableError(url, `HTTP ${res.status}`);
    }
    return await res.json();
  } catch (err) {
    if (err instanceof AgentUnreachableError) throw err;
    if (controller.signal.aborted) {
      throw new AgentUnreachableError(url, `timed out after ${timeoutMs}ms`);
    }
    throw new AgentUnreachableError(url, errorMessage(err));
  } finally {
    clearTimeout(timeout);
  }
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

/**
 * Resolves the agent card published at `<baseUrl>/.well-known/agent-card.json`.
 */
export async function fetchAgentCard(
  baseUrl: string,
  timeoutMs?: number
): Promise<AgentCard> {
  const url = joinUrl(baseUrl, AGENT_CARD_PATH);
  const body = await fetchJson(
    url,
    { method: "GET", headers: { Accept: "application/json" } },
    resolveTimeout(timeoutMs)
  );
  const card = agentCardSchema.safeParse(body);
  if (!card.success) {
    throw new AgentUnreachableError(baseUrl, "invalid agent card");
  }
  return card.data;
}

/**
 * Sends one text message to an agent and collects text and data parts
 * from the returned message or task (status message and artifacts).
 */
export async function sendMessage(params: {
  message: string;
  baseUrl: string;
  contextId?: string;
  timeoutMs?: number;
}): Promise<SendOutputs> {
  const timeoutMs = resolveTimeout(params.timeoutMs);
  const card = await fetchAgentCard(params.baseUrl, timeoutMs);
  const outbound = createTextMessage({
    text: params.message,
    contextId: params.contextId,
  });

  const body = await fetchJson(
    card.url,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify({
        jsonrpc: "2.0",
        id: newId(),
        method: "message/send",
        params: { message: outbound },
      }),
    },
    timeoutMs
  );

  const parsed = jsonRpcResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new AgentUnreachableError(card.url, "malformed JSON-RPC response");
  }
  if ("error" in parsed.data) {
    throw new AgentRequestError(
      card.url,
      "error",
      `${parsed.data.error.code} ${parsed.data.error.message}`
    );
  }

  const result = parsed.data.result;
  if (result.kind === "message") {
    const { texts, data } = collectParts(result.parts);
    return {
      responseText: texts.join("\n"),
      contextId: result.contextId,
      dataParts: data,
      status: "completed",
    };
  }

  const statusParts = collectParts(result.status.message?.parts ?? []);
  const dataParts: Array<Record<string, unknown>> = [];
  const texts = [...statusParts.texts];
  for (const artifact of result.artifacts) {
    const collected = collectParts(artifact.parts);
    texts.push(...collected.texts);
    dataParts.push(...collected.data);
  }
  dataParts.push(...statusParts.data);

  return {
    responseText: texts.join("\n"),
    contextId: result.contextId,
    dataParts,
    status: result.status.state,
  };
}

/**
 * Conversation-aware client: remembers one context id per agent URL.
 */
export class Messenger {
  private readonly contextIds = new Map<string, string | undefined>();

  async talkToAgent(params: {
    message: string;
    url: string;
    newConversation?: boolean;
    timeoutMs?: number;
  }): Promise<SendOutputs> {
    const logger = getLogger("a2a/messenger");
    const { message, url, newConversation = false, timeoutMs } = params;
    const outputs = await sendMessage({
      message,
      baseUrl: url,
      contextId: newConversation ? undefined : this.contextIds.get(url),
      timeoutMs,
    });
    logger.debug(
      { url, status: outputs.status, dataParts: outputs.dataParts.length },
      "Agent responded"
    );
    if (outputs.status !== "completed") {
      throw new AgentRequestError(url, outputs.status, outputs.responseText);
    }
    this.contextIds.set(url, outputs.contextId);
    return outputs;
  }
}
