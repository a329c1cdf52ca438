import { parse as parseToml } from "@iarna/toml";
import { readFile } from "fs/promises";
import { z } from "zod";
import {
  formatIssues,
  scenarioFileConfigSchema,
} from "../invest/domain/schema";
import type { ScenarioConfig } from "../invest/domain/types";
import { ConfigError, errorMessage } from "../util/errors";

export const DEFAULT_READINESS_TIMEOUT_MS = 30_000;
export const REQUIRED_PARTICIPANT_ROLES = ["agent"] as const;

export interface AgentEndpoint {
  role: string;
  endpoint: string;
  /** When set, the runner spawns this command instead of hosting the agent in-process */
  cmd?: string;
}

export interface Scenario {
  evaluator: AgentEndpoint;
  participants: AgentEndpoint[];
  config: ScenarioConfig;
  readinessTimeoutMs: number;
}

const endpointShape = {
  endpoint: z.string().url(),
  cmd: z.string().trim().min(1).optional(),
};

const scenarioFileSchema = z
  .object({
    readiness_timeout_ms: z
      .preprocess(
        (v) => (typeof v === "bigint" ? Number(v) : v),
        z.number().int().positive()
      )
      .default(DEFAULT_READINESS_TIMEOUT_MS),
    green_agent: z.object(endpointShape),
    participants: z
      .array(z.object({ ...endpointShape, role: z.string().trim().min(1) }))
      .default([]),
    config: scenarioFileConfigSchema,
  })
  .superRefine((file, ctx) => {
    const roles = new Set(file.participants.map((p) => p.role));
    for (const role of REQUIRED_PARTICIPANT_ROLES) {
      if (!roles.has(role)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["participants"],
          message: `missing participant with role "${role}"`,
        });
      }
    }
  });

/**
 * Validates an already-parsed scenario document.
 */
export function parseScenario(doc: unknown, source = "scenario"): Scenario {
  const parsed = scenarioFileSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(
      `Invalid ${source}: ${issues.join("; ")}`,
      issues
    );
  }
  const file = parsed.data;
  return {
    evaluator: { role: "evaluator", ...file.green_agent },
    participants: file.participants,
    config: file.config,
    readinessTimeoutMs: file.readiness_timeout_ms,
  };
}

export function parseScenarioToml(text: string, source = "scenario"): Scenario {
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (err) {
    throw new ConfigError(`Invalid TOML in ${source}: ${errorMessage(err)}`);
  }
  return parseScenario(doc, source);
}

export async function loadScenario(path: string): Promise<Scenario> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read scenario file ${path}: ${errorMessage(err)}`
    );
  }
  return parseScenarioToml(text, path);
}
