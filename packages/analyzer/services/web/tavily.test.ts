import { TavilySearchClient, createWebSearchClient } from "./tavily";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const jsonResponse = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

const RESULTS = [
  { title: "First", url: "https://example.com/1", content: "one" },
  { title: "Second", url: "https://example.com/2", content: "two" },
  { title: "Third", url: "https://example.com/3", content: "three" },
];

describe("TavilySearchClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("should post the query and return at most maxResults results", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: RESULTS }));
    const client = new TavilySearchClient("test-secret", { maxResults: 2 });

    const results = await client.search("dark mode competitors");

    expect(results.map(r => r.title)).toEqual(["First", "Second"]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.tavily.com/search");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(init?.body).toBe(JSON.stringify({ query: "dark mode competitors", max_results: 2, search_depth: "basic" }));
  });

  it("should fill in missing titles and content", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [{ url: "https://example.com/bare" }] }));
    const client = new TavilySearchClient("test-secret");

    expect(await client.search("q")).toEqual([{ title: "", url: "https://example.com/bare", content: "" }]);
  });

  it("should retry after a failed attempt", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503))
      .mockResolvedValueOnce(jsonResponse({ results: RESULTS.slice(0, 1) }));
    const client = new TavilySearchClient("test-secret", { retryDelayMs: 0 });

    const results = await client.search("q");

    expect(results).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith("Web search attempt 1/3 failed:", "HTTP 503");
  });

  it("should give up after maxRetries attempts", async () => {
    fetchMock.mockRejectedValue(new Error("network down"));
    const client = new TavilySearchClient("test-secret", { maxRetries: 2, retryDelayMs: 0 });

    await expect(client.search("q")).rejects.toThrow("Web search failed after 2 attempts: network down");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should abort a request that outlives the timeout", async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const client = new TavilySearchClient("test-secret", { maxRetries: 1, timeoutMs: 10 });

    await expect(client.search("q")).rejects.toThrow("Web search failed after 1 attempts: timed out after 10ms");
    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should reject a response without results", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ answer: "no results field" }));
    const client = new TavilySearchClient("test-secret", { maxRetries: 1 });

    await expect(client.search("q")).rejects.toThrow("Web search failed after 1 attempts");
  });
});

describe("createWebSearchClient", () => {
  it("should only create a client when a key is configured", () => {
    expect(createWebSearchClient({})).toBeUndefined();
    expect(createWebSearchClient({ TAVILY_API_KEY: "test-secret" })).toBeInstanceOf(TavilySearchClient);
  });
});
