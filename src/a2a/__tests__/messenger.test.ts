import { AgentRequestError, AgentUnreachableError } from "../../util/errors";
import { Messenger, fetchAgentCard, sendMessage } from "../messenger";
import { createAgentApp, type AgentExecutor } from "../server";
import { agentCardSchema, getMessageText } from "../types";
import { routeFetchToApps } from "./fetch_router";
import type { Hono } from "hono";

const ORIGIN = "http://agent.test";

function appWith(executor: AgentExecutor): Hono {
  return createAgentApp({
    card: agentCardSchema.parse({
      name: "test_agent",
      description: "Test agent",
      url: `${ORIGIN}/`,
      version: "1.0.0",
    }),
    executor,
  });
}

describe("messenger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("collects status text, artifact text and data parts", async () => {
    routeFetchToApps(
      new Map([
        [
          ORIGIN,
          appWith({
            async execute(message, updater) {
              await updater.addArtifact("Answer", [
                { kind: "text", text: `got ${getMessageText(message)}` },
                { kind: "data", data: { decisions: [] } },
              ]);
              await updater.reject("partial");
            },
          }),
        ],
      ])
    );

    const out = await sendMessage({ message: "ping", baseUrl: ORIGIN });
    expect(out.status).toBe("rejected");
    expect(out.responseText).toBe("partial\ngot ping");
    expect(out.dataParts).toEqual([{ decisions: [] }]);
    expect(out.contextId).toEqual(expect.any(String));
  });

  test("keeps one conversation per agent unless asked for a new one", async () => {
    const contexts: Array<string | undefined> = [];
    routeFetchToApps(
      new Map([
        [
          ORIGIN,
          appWith({
            async execute(message, updater) {
              contexts.push(message.contextId);
              await updater.complete();
            },
          }),
        ],
      ])
    );

    const messenger = new Messenger();
    const first = await messenger.talkToAgent({ message: "1", url: ORIGIN });
    await messenger.talkToAgent({ message: "2", url: ORIGIN });
    await messenger.talkToAgent({ message: "3", url: ORIGIN, newConversation: true });

    expect(contexts[0]).toBeUndefined();
    expect(contexts[1]).toBe(first.contextId);
    expect(contexts[2]).toBeUndefined();
  });

  test("raises AgentRequestError for a task that did not complete", async () => {
    routeFetchToApps(
      new Map([
        [
          ORIGIN,
          appWith({
            async execute(_message, updater) {
              await updater.failed("no luck");
            },
          }),
        ],
      ])
    );

    const err = await new Messenger()
      .talkToAgent({ message: "x", url: ORIGIN })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentRequestError);
    expect(err).toMatchObject({ state: "failed" });
  });

  test("raises AgentUnreachableError when nothing answers", async () => {
    routeFetchToApps(new Map());
    await expect(fetchAgentCard("http://down.test", 1000)).rejects.toThrow(
      new AgentUnreachableError(
        "http://down.test/.well-known/agent-card.json",
        "fetch failed"
      ).message
    );
  });

  test("rejects an invalid agent card", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(
        new Response(JSON.stringify({ name: "x" }), { status: 200 })
      );
    await expect(fetchAgentCard(ORIGIN)).rejects.toThrow("invalid agent card");
  });
});
