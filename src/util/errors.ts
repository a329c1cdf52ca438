/**
 * Fatal error types. Per-ticker problems never surface as these; they are
 * reported as `Result` values and degrade a single ticker instead.
 */

/** Malformed or missing scenario configuration. Raised before any agent starts. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** An agent endpoint could not be reached (connection refused, timeout, bad card). */
export class AgentUnreachableError extends Error {
  constructor(
    public readonly url: string,
    message: string
  ) {
    super(`Agent at ${url} is unreachable: ${message}`);
    this.name = "AgentUnreachableError";
  }
}

/** An agent answered, but the task did not complete. */
export class AgentRequestError extends Error {
  constructor(
    public readonly url: string,
    public readonly state: string,
    detail: string
  ) {
    super(
      `${url} responded with non-completed status: ${state}${detail ? ` (${detail})` : ""}`
    );
    this.name = "AgentRequestError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
