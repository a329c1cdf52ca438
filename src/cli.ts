#!/usr/bin/env node
/* eslint-disable no-console */
/**
 * invest-bench CLI
 *
 * Usage:
 *   invest-bench run <scenario.toml> [--show-logs] [--serve-only]
 *   invest-bench serve <research|evaluator> [--host H] [--port P] [--card-url U]
 *
 * Exit codes: 0 when the run completed, 1 on configuration errors,
 * unreachable agents or a failed task.
 */

import "dotenv/config";
import { serveAgent } from "./a2a/server";
import {
  DEFAULT_AGENT_ENDPOINTS,
  createInvestAgentApp,
  parseAgentRole,
  type AgentRole,
} from "./invest/application/agent_apps";
import { loadScenario } from "./scenario/config";
import { runScenario } from "./scenario/runner";
import { ConfigError, errorMessage } from "./util/errors";
import { getLogger, setLogLevel } from "./util/logger";

export type CliCommand =
  | {
      command: "run";
      scenarioPath: string;
      showLogs: boolean;
      serveOnly: boolean;
    }
  | {
      command: "serve";
      role: AgentRole;
      host: string;
      port: number;
      cardUrl?: string;
    }
  | { command: "help" };

export const USAGE = [
  "Usage:",
  "  invest-bench run <scenario.toml> [--show-logs] [--serve-only]",
  "  invest-bench serve <research|evaluator> [--host H] [--port P] [--card-url U]",
].join("\n");

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [command, target, ...rest] = argv;
  if (!command || command === "help" || command === "--help") {
    return { command: "help" };
  }
  if (!target) {
    throw new ConfigError(`Missing argument for ${command}\n${USAGE}`);
  }

  if (command === "run") {
    const unknown = rest.filter(
      (a) => a !== "--show-logs" && a !== "--serve-only"
    );
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown option: ${unknown.join(" ")}`);
    }
    return {
      command: "run",
      scenarioPath: target,
      showLogs: rest.includes("--show-logs"),
      serveOnly: rest.includes("--serve-only"),
    };
  }

  if (command === "serve") {
    let role: AgentRole;
    try {
      role = parseAgentRole(target);
    } catch (err) {
      throw new ConfigError(errorMessage(err));
    }
    const out: Extract<CliCommand, { command: "serve" }> = {
      command: "serve",
      role,
      ...DEFAULT_AGENT_ENDPOINTS[role],
    };
    for (let i = 0; i < rest.length; i += 2) {
      const flag = rest[i];
      const value = takeValue(rest, i, flag);
      if (flag === "--host") out.host = value;
      else if (flag === "--card-url") out.cardUrl = value;
      else if (flag === "--port") {
        const port = Number(value);
        if (!Number.isInteger(port) || port < 0 || port > 65_535) {
          throw new ConfigError(`Invalid port: ${value}`);
        }
        out.port = port;
      } else throw new ConfigError(`Unknown option: ${flag}`);
    }
    return out;
  }

  throw new ConfigError(`Unknown command: ${command}\n${USAGE}`);
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });
}

export async function main(argv: string[]): Promise<number> {
  const cmd = parseCliArgs(argv);
  if (cmd.command === "help") {
    console.log(USAGE);
    return 0;
  }

  if (cmd.command === "serve") {
    const logger = getLogger("cli");
    const cardUrl = cmd.cardUrl ?? `http://${cmd.host}:${cmd.port}/`;
    const running = await serveAgent({
      app: createInvestAgentApp(cmd.role, cardUrl),
      host: cmd.host,
      port: cmd.port,
    });
    logger.info(
      { role: cmd.role, url: running.url, cardUrl },
      "Agent listening"
    );
    await waitForSignal();
    await running.close();
    return 0;
  }

  if (cmd.showLogs) setLogLevel("debug");
  const scenario = await loadScenario(cmd.scenarioPath);
  const outcome = await runScenario(scenario, {
    serveOnly: cmd.serveOnly,
    showLogs: cmd.showLogs,
    untilStopped: cmd.serveOnly ? waitForSignal() : undefined,
  });
  if (outcome) {
    console.log(outcome.summaryText);
    console.log(JSON.stringify(outcome.artifact, null, 2));
  }
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      const logger = getLogger("cli");
      logger.error({ error: errorMessage(err) }, "Run failed");
      console.error(errorMessage(err));
      process.exit(1);
    });
}
