export function defaultResearchQuery(ticker: string): string {
  return `${ticker} stock fundamentals outlook 2025 profitability backlog order intake`;
}

export function defaultVerifyQuery(ticker: string): string {
  return `${ticker} share price performance December 2025 30% increase`;
}

/**
 * Fills `{ticker}` in a custom template, or falls back to the default query.
 */
export function buildQuery(
  ticker: string,
  template: string | undefined,
  fallback: (ticker: string) => string
): string {
  return template ? template.split("{ticker}").join(ticker) : fallback(ticker);
}
