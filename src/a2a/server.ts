import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import { getLogger } from "../util/logger";
import {
  AGENT_CARD_PATH,
  JsonRpcErrorCode,
  TERMINAL_STATES,
  createTextMessage,
  jsonRpcRequestSchema,
  newId,
  sendMessageParamsSchema,
  type AgentCard,
  type JsonRpcId,
  type Message,
  type Part,
  type Task,
  type TaskState,
} from "./types";

/**
 * Handle an executor uses to report progress and results for one task.
 */
export interface TaskUpdater {
  readonly taskId: string;
  readonly contextId: string;
  updateStatus(state: "working", text: string): Promise<void>;
  addArtifact(name: string, parts: Part[]): Promise<void>;
  complete(): Promise<void>;
  reject(text: string): Promise<void>;
  failed(text: string): Promise<void>;
}

export interface AgentExecutor {
  execute(message: Message, updater: TaskUpdater): Promise<void>;
}

/**
 * Accumulates the task an executor is building. Terminal states are final.
 */
export class InMemoryTaskUpdater implements TaskUpdater {
  readonly taskId: string;
  readonly contextId: string;
  private readonly task: Task;

  constructor(request: Message) {
    this.taskId = newId();
    this.contextId = request.contextId ?? newId();
    this.task = {
      kind: "task",
      id: this.taskId,
      contextId: this.contextId,
      status: { state: "submitted", timestamp: new Date().toISOString() },
      artifacts: [],
      history: [{ ...request, contextId: this.contextId }],
    };
  }

  get state(): TaskState {
    return this.task.status.state;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.task.status.state);
  }

  snapshot(): Task {
    return structuredClone(this.task);
  }

  async updateStatus(state: "working", text: string): Promise<void> {
    this.transition(state, text);
  }

  async addArtifact(name: string, parts: Part[]): Promise<void> {
    this.assertOpen();
    this.task.artifacts.push({ artifactId: newId(), name, parts });
  }

  async complete(): Promise<void> {
    this.transition("completed");
  }

  async reject(text: string): Promise<void> {
    this.transition("rejected", text);
  }

  async failed(text: string): Promise<void> {
    this.transition("failed", text);
  }

  private assertOpen(): void {
    if (this.isTerminal) {
      throw new Error(
        `Task ${this.taskId} is already ${this.task.status.state}`
      );
    }
  }

  private transition(state: TaskState, text?: string): void {
    this.assertOpen();
    const message =
      text === undefined
        ? undefined
        : {
            ...createTextMessage({
              text,
              role: "agent",
              contextId: this.contextId,
            }),
            taskId: this.taskId,
          };
    this.task.status = {
      state,
      message,
      timestamp: new Date().toISOString(),
    };
    if (message) this.task.history.push(message);
  }
}

function rpcError(id: JsonRpcId, code: number, message: string) {
  return { jsonrpc: "2.0" as const, id, error: { code, message } };
}

/**
 * Builds the HTTP surface of one agent: card discovery, health and JSON-RPC `message/send`.
 */
export function createAgentApp(params: {
  card: AgentCard;
  executor: AgentExecutor;
}): Hono {
  const { card, executor } = params;
  const logger = getLogger(`a2a/server/${card.name}`);
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));
  app.get(AGENT_CARD_PATH, (c) => c.json(card));

  app.post("/", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return c.json(rpcError(null, JsonRpcErrorCode.ParseError, "Parse error"));
    }

    const request = jsonRpcRequestSchema.safeParse(payload);
    if (!request.success) {
      return c.json(
        rpcError(null, JsonRpcErrorCode.InvalidRequest, "Invalid Request")
      );
    }
    const { id, method } = request.data;
    if (method !== "message/send") {
      return c.json(
        rpcError(
          id,
          JsonRpcErrorCode.MethodNotFound,
          `Method not found: ${method}`
        )
      );
    }

    const params = sendMessageParamsSchema.safeParse(request.data.params);
    if (!params.success) {
      return c.json(
        rpcError(id, JsonRpcErrorCode.InvalidParams, "Invalid params")
      );
    }

    const updater = new InMemoryTaskUpdater(params.data.message);
    const startedAt = Date.now();
    logger.info(
      { taskId: updater.taskId, contextId: updater.contextId },
      "Task received"
    );
    try {
      await executor.execute(params.data.message, updater);
      if (!updater.isTerminal) await updater.complete();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error({ taskId: updater.taskId, error: msg }, "Task failed");
      if (!updater.isTerminal) await updater.failed(msg);
    }
    logger.info(
      {
        taskId: updater.taskId,
        state: updater.state,
        elapsedMs: Date.now() - startedAt,
      },
      "Task finished"
    );

    return c.json({ jsonrpc: "2.0", id, result: updater.snapshot() });
  });

  return app;
}

export interface RunningAgent {
  url: string;
  close(): Promise<void>;
}

/**
 * Serves an agent app on a host/port with the Node HTTP adapter.
 */
export function serveAgent(params: {
  app: Hono;
  host: string;
  port: number;
}): Promise<RunningAgent> {
  const { app, host, port } = params;
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    const server: ServerType = serve(
      { fetch: app.fetch, hostname: host, port },
      (info) => {
        server.off("error", onError);
        resolve({
          url: `http://${host}:${info.port}/`,
          close: () =>
            new Promise<void>((done, fail) => {
              server.close((err) => (err ? fail(err) : done()));
            }),
        });
      }
    );
    server.once("error", onError);
  });
}
