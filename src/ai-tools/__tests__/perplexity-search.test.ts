import { createPerplexitySearchTool } from "../perplexity-search";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("PerplexitySearchTool", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it("sends windowed filters and maps results", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockResolvedValue(
      jsonResponse({
        id: "search-1",
        results: [
          {
            title: "RR order intake strong",
            url: "https://example.com/rr",
            snippet: "Record backlog",
            date: "2025-07-15",
            last_updated: "2025-07-16",
          },
          { title: "Untitled", url: null, snippet: "", date: null },
        ],
      })
    );

    const tool = createPerplexitySearchTool({
      apiKey: "test-secret",
      baseUrl: "https://search.test/",
    });
    const res = await tool.execute({
      query: "RR fundamentals",
      maxResults: 5,
      searchAfterDate: "06/01/2025",
      searchBeforeDate: "09/30/2025",
      country: "GB",
    });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.results).toEqual([
      {
        title: "RR order intake strong",
        url: "https://example.com/rr",
        snippet: "Record backlog",
        date: "2025-07-15",
        lastUpdated: "2025-07-16",
      },
      {
        title: "Untitled",
        url: undefined,
        snippet: undefined,
        date: undefined,
        lastUpdated: undefined,
      },
    ]);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://search.test/search");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual(
      expect.objectContaining({ Authorization: "Bearer test-secret" })
    );
    expect(JSON.parse(String(init?.body))).toEqual({
      query: "RR fundamentals",
      max_results: 5,
      max_tokens: 12000,
      max_tokens_per_page: 2048,
      search_after_date_filter: "06/01/2025",
      search_before_date_filter: "09/30/2025",
      country: "GB",
    });
  });

  it("returns an error result when the key is missing", async () => {
    delete process.env.PERPLEXITY_API_KEY;
    delete process.env.PERPLEXITY_API_KEY__dev;
    const fetchSpy = jest.spyOn(globalThis, "fetch");
    const res = await createPerplexitySearchTool().execute({ query: "RR" });
    expect(res).toEqual({ ok: false, error: "PERPLEXITY_API_KEY is not set" });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("reports HTTP failures without throwing", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValue(new Response("rate limited", { status: 429 }));
    const res = await createPerplexitySearchTool({
      apiKey: "test-secret",
    }).execute({ query: "RR" });
    expect(res).toEqual({
      ok: false,
      error: "Search API responded 429: rate limited",
    });
  });

  it("reports network errors without throwing", async () => {
    jest
      .spyOn(globalThis, "fetch")
      .mockRejectedValue(new Error("getaddrinfo ENOTFOUND"));
    const res = await createPerplexitySearchTool({
      apiKey: "test-secret",
    }).execute({ query: "RR" });
    expect(res).toEqual({ ok: false, error: "getaddrinfo ENOTFOUND" });
  });

  it("validates input before calling the API", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch");
    const res = await createPerplexitySearchTool({
      apiKey: "test-secret",
    }).execute({ query: "RR", searchAfterDate: "2025-06-01" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBe(
      "Invalid input for perplexity_search: searchAfterDate: expected MM/DD/YYYY"
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
