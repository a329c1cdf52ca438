import type { Hono } from "hono";

/**
 * Routes global fetch to in-process Hono apps keyed by origin
 * (e.g. "http://research.test"). Unknown origins fail like a refused connection.
 */
export function routeFetchToApps(apps: Map<string, Hono>) {
  return jest
    .spyOn(globalThis, "fetch")
    .mockImplementation(async (input, init) => {
      const request = new Request(input, init);
      const app = apps.get(new URL(request.url).origin);
      if (!app) throw new TypeError("fetch failed");
      return app.fetch(request);
    });
}
