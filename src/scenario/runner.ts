import { spawn, type ChildProcess } from "child_process";
import { Messenger, fetchAgentCard } from "../a2a/messenger";
import { serveAgent } from "../a2a/server";
import {
  createInvestAgentApp,
  type AgentAppDeps,
  type AgentRole,
} from "../invest/application/agent_apps";
import {
  resultArtifactSchema,
  toScenarioConfigWire,
} from "../invest/domain/schema";
import type { ResultArtifact } from "../invest/domain/types";
import { AgentUnreachableError, errorMessage } from "../util/errors";
import { getLogger } from "../util/logger";
import type { AgentEndpoint, Scenario } from "./config";

const POLL_INTERVAL_MS = 250;
const PROBE_TIMEOUT_MS = 2_000;

export interface StartedAgent {
  role: string;
  url: string;
  origin: "in-process" | "spawned" | "external";
  /** Set for spawned agents once the child has exited */
  exitCode?: number | null;
  stop(): Promise<void>;
}

export interface RunOptions {
  serveOnly?: boolean;
  /** Stream spawned agents' output to this process */
  showLogs?: boolean;
  /** Resolves when a serve-only run should stop (e.g. on SIGINT) */
  untilStopped?: Promise<void>;
  /** Overrides for agents hosted in-process */
  deps?: AgentAppDeps;
}

export interface RunOutcome {
  artifact: ResultArtifact;
  summaryText: string;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function isResponding(url: string): Promise<boolean> {
  try {
    await fetchAgentCard(url, PROBE_TIMEOUT_MS);
    return true;
  } catch {
    return false;
  }
}

/**
 * Polls the agent card until it answers or the deadline passes.
 */
export async function waitForAgent(
  agent: Pick<StartedAgent, "url" | "exitCode">,
  timeoutMs: number
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  let lastError = "no response";
  while (Date.now() < deadline) {
    if (agent.exitCode !== undefined) {
      throw new AgentUnreachableError(
        agent.url,
        `process exited with code ${agent.exitCode} before becoming ready`
      );
    }
    try {
      await fetchAgentCard(agent.url, Math.min(PROBE_TIMEOUT_MS, timeoutMs));
      return;
    } catch (err) {
      lastError = errorMessage(err);
    }
    await sleep(POLL_INTERVAL_MS);
  }
  throw new AgentUnreachableError(
    agent.url,
    `not ready after ${timeoutMs}ms (${lastError})`
  );
}

function spawnAgent(
  endpoint: AgentEndpoint & { cmd: string },
  showLogs: boolean
): StartedAgent {
  const logger = getLogger("scenario/runner");
  const proc: ChildProcess = spawn(endpoint.cmd, {
    shell: true,
    stdio: showLogs ? "inherit" : "ignore",
    env: process.env,
  });
  const agent: StartedAgent = {
    role: endpoint.role,
    url: endpoint.endpoint,
    origin: "spawned",
    stop: () =>
      new Promise<void>((resolve) => {
        if (agent.exitCode !== undefined) return resolve();
        proc.once("close", () => resolve());
        proc.kill("SIGTERM");
      }),
  };
  proc.on("error", (err) => {
    logger.error(
      { role: endpoint.role, error: err.message },
      "Agent process error"
    );
  });
  proc.on("close", (code) => {
    agent.exitCode = code;
    logger.debug({ role: endpoint.role, code }, "Agent process exited");
  });
  logger.info(
    { role: endpoint.role, cmd: endpoint.cmd, pid: proc.pid },
    "Spawned agent"
  );
  return agent;
}

/** Port an endpoint URL names, or its protocol's default. */
export function listenPort(url: URL): number {
  if (url.port) return Number(url.port);
  return url.protocol === "https:" ? 443 : 80;
}

async function hostAgent(
  endpoint: AgentEndpoint,
  role: AgentRole,
  deps: AgentAppDeps | undefined
): Promise<StartedAgent> {
  const logger = getLogger("scenario/runner");
  const url = new URL(endpoint.endpoint);
  const running = await serveAgent({
    app: createInvestAgentApp(role, endpoint.endpoint, deps),
    host: url.hostname,
    port: listenPort(url),
  });
  logger.info(
    { role: endpoint.role, url: running.url },
    "Hosting agent in-process"
  );
  return {
    role: endpoint.role,
    url: endpoint.endpoint,
    origin: "in-process",
    stop: () => running.close(),
  };
}

/**
 * Spawns the agent when it has a command, reuses it when something already
 * answers at its endpoint, and otherwise hosts it in this process.
 */
export async function startAgent(
  endpoint: AgentEndpoint,
  role: AgentRole | undefined,
  options: Pick<RunOptions, "showLogs" | "deps"> = {}
): Promise<StartedAgent> {
  if (endpoint.cmd) {
    return spawnAgent(
      { ...endpoint, cmd: endpoint.cmd },
      options.showLogs ?? false
    );
  }
  if (role === undefined || (await isResponding(endpoint.endpoint))) {
    return {
      role: endpoint.role,
      url: endpoint.endpoint,
      origin: "external",
      stop: async () => undefined,
    };
  }
  return hostAgent(endpoint, role, options.deps);
}

function roleFor(participant: AgentEndpoint): AgentRole | undefined {
  return participant.role === "agent" ? "research" : undefined;
}

async function requestAssessment(scenario: Scenario): Promise<RunOutcome> {
  const participants = Object.fromEntries(
    scenario.participants.map((p) => [p.role, p.endpoint])
  );
  const outputs = await new Messenger().talkToAgent({
    message: JSON.stringify({
      participants,
      config: toScenarioConfigWire(scenario.config),
    }),
    url: scenario.evaluator.endpoint,
    newConversation: true,
  });

  for (const data of outputs.dataParts) {
    const parsed = resultArtifactSchema.safeParse(data);
    if (parsed.success) {
      return { artifact: parsed.data, summaryText: outputs.responseText };
    }
  }
  throw new AgentUnreachableError(
    scenario.evaluator.endpoint,
    "evaluator returned no result artifact"
  );
}

/**
 * Starts the scenario's agents, runs one assessment through the evaluator
 * and stops whatever it started. Returns undefined for serve-only runs.
 */
export async function runScenario(
  scenario: Scenario,
  options: RunOptions = {}
): Promise<RunOutcome | undefined> {
  const logger = getLogger("scenario/runner");
  const started: StartedAgent[] = [];
  try {
    for (const participant of scenario.participants) {
      started.push(
        await startAgent(participant, roleFor(participant), options)
      );
    }
    started.push(await startAgent(scenario.evaluator, "evaluator", options));

    await Promise.all(
      started.map((a) => waitForAgent(a, scenario.readinessTimeoutMs))
    );
    logger.info(
      {
        agents: started.map((a) => ({
          role: a.role,
          url: a.url,
          origin: a.origin,
        })),
      },
      "Agents ready"
    );

    if (options.serveOnly) {
      await (options.untilStopped ?? new Promise<void>(() => undefined));
      return undefined;
    }
    return await requestAssessment(scenario);
  } finally {
    const results = await Promise.allSettled(
      started.reverse().map((a) => a.stop())
    );
    for (const r of results) {
      if (r.status === "rejected") {
        logger.warn({ error: errorMessage(r.reason) }, "Failed to stop agent");
      }
    }
  }
}
