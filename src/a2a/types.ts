import crypto from "crypto";
import { z } from "zod";

/**
 * Agent-to-agent wire types: agent card discovery plus JSON-RPC `message/send`.
 * Shapes follow the public A2A protocol, trimmed to what the benchmark uses.
 */

export const textPartSchema = z.object({
  kind: z.literal("text"),
  text: z.string(),
});

export const dataPartSchema = z.object({
  kind: z.literal("data"),
  data: z.record(z.unknown()),
});

export const partSchema = z.discriminatedUnion("kind", [
  textPartSchema,
  dataPartSchema,
]);

export const messageSchema = z.object({
  kind: z.literal("message"),
  role: z.enum(["user", "agent"]),
  parts: z.array(partSchema),
  messageId: z.string().min(1),
  contextId: z.string().optional(),
  taskId: z.string().optional(),
});

export const taskStateSchema = z.enum([
  "submitted",
  "working",
  "completed",
  "rejected",
  "failed",
]);

export const artifactSchema = z.object({
  artifactId: z.string(),
  name: z.string(),
  parts: z.array(partSchema),
});

export const taskSchema = z.object({
  kind: z.literal("task"),
  id: z.string(),
  contextId: z.string(),
  status: z.object({
    state: taskStateSchema,
    message: messageSchema.optional(),
    timestamp: z.string(),
  }),
  artifacts: z.array(artifactSchema).default([]),
  history: z.array(messageSchema).default([]),
});

export const agentSkillSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  tags: z.array(z.string()).default([]),
  examples: z.array(z.string()).default([]),
});

export const agentCardSchema = z.object({
  name: z.string(),
  description: z.string(),
  url: z.string().url(),
  version: z.string(),
  defaultInputModes: z.array(z.string()).default(["text"]),
  defaultOutputModes: z.array(z.string()).default(["text"]),
  capabilities: z
    .object({ streaming: z.boolean().default(false) })
    .default({}),
  skills: z.array(agentSkillSchema).default([]),
});

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]),
  method: z.string(),
  params: z.unknown().optional(),
});

export const sendMessageParamsSchema = z.object({
  message: messageSchema,
});

export const jsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]),
    result: z.union([taskSchema, messageSchema]),
  }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]),
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
]);

export type TextPart = z.infer<typeof textPartSchema>;
type DataPart = z.infer<typeof dataPartSchema>;
export type Part = z.infer<typeof partSchema>;
export type Role = Message["role"];
export type Message = z.infer<typeof messageSchema>;
export type TaskState = z.infer<typeof taskStateSchema>;
export type Task = z.infer<typeof taskSchema>;
export type AgentCard = z.infer<typeof agentCardSchema>;
export type JsonRpcId = z.infer<typeof jsonRpcRequestSchema>["id"];

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  "completed",
  "rejected",
  "failed",
]);

export const AGENT_CARD_PATH = "/.well-known/agent-card.json";

export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export function newId(): string {
  return crypto.randomUUID().replace(/-/g, "");
}

export function createTextMessage(params: {
  text: string;
  role?: Role;
  contextId?: string;
}): Message {
  return {
    kind: "message",
    role: params.role ?? "user",
    parts: [{ kind: "text", text: params.text }],
    messageId: newId(),
    contextId: params.contextId,
  };
}

export function getMessageText(message: Message): string {
  return message.parts
    .filter((p): p is TextPart => p.kind === "text")
    .map((p) => p.text)
    .join("\n");
}

export function collectParts(parts: Part[]): {
  texts: string[];
  data: Array<Record<string, unknown>>;
} {
  const texts: string[] = [];
  const data: Array<Record<string, unknown>> = [];
  for (const part of parts) {
    if (part.kind === "text") texts.push(part.text);
    else data.push(part.data);
  }
  return { texts, data };
}

/**
 * Wraps a JSON-serialisable value as a data part. The value is round-tripped
 * through JSON so undefined fields are dropped, as they would be on the wire.
 */
export function toDataPart(value: object): DataPart {
  return {
    kind: "data",
    data: dataPartSchema.shape.data.parse(JSON.parse(JSON.stringify(value))),
  };
}
