import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger shared by both agents, the runner and the CLI.
 * - Local terminal: pretty-printed logs for readability
 * - CI/containers: JSON logs for collection and analysis
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "invest-bench",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: [
      "apiKey",
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "headers.authorization",
      "*.headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with the benchmark run context.
 * Use inside agent executors once the task and context ids are known.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: {
    runId?: string;
    taskId?: string;
    contextId?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    runId: run.runId,
    taskId: run.taskId,
    contextId: run.contextId,
  });
}

/**
 * Changes the level of the root logger and every child created afterwards.
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

export default rootLogger;
