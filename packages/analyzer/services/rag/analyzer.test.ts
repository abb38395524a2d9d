import { ScriptedChatModel, makeRecord } from "~~/test-utils/fakes";
import type { WebResult, WebSearchClient } from "../web/tavily";
import { APOLOGY_ANSWER, createFeedbackAnalyzer, parseRoute } from "./analyzer";
import type { Passage, RetrievalStrategy } from "./types";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const LONG_TEXT = "The dashboard takes forever to load. ".repeat(8).trim();

const RECORDS = [
  makeRecord("FB-0001", LONG_TEXT, { source: "App Store Review", date: "2024-03-02" }),
  makeRecord("FB-0002", "Export to CSV uses the wrong date format"),
];

const passage = (id: string, text: string, recordId: string): Passage => ({ id, text, recordIds: [recordId] });

const feedbackStrategy: RetrievalStrategy = {
  name: "naive",
  retrieve: async () => [passage("FB-0001#0", LONG_TEXT, "FB-0001"), passage("FB-0002#0", RECORDS[1].text, "FB-0002")],
};

class FakeWebSearch implements WebSearchClient {
  readonly queries: string[] = [];

  constructor(private readonly results: WebResult[]) {}

  async search(query: string): Promise<WebResult[]> {
    this.queries.push(query);
    return this.results;
  }
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseRoute", () => {
  it("should route to the web only on an unambiguous answer", () => {
    expect(parseRoute("web")).toBe("web");
    expect(parseRoute("Web.")).toBe("web");
    expect(parseRoute("feedback")).toBe("feedback");
    expect(parseRoute("web or feedback")).toBe("feedback");
    expect(parseRoute("not sure")).toBe("feedback");
  });
});

describe("createFeedbackAnalyzer", () => {
  it("should answer from feedback without a routing call when web search is off", async () => {
    const chat = new ScriptedChatModel([{ when: "Question:", reply: "  Users find the dashboard slow.  " }]);
    const analyzer = createFeedbackAnalyzer({ records: RECORDS, strategy: feedbackStrategy, chat, csvPath: "x.csv" });

    const output = await analyzer.analyze("  Why do users complain about the dashboard?  ");

    expect(output.tool).toBe("feedback_search");
    expect(output.answer).toBe("Users find the dashboard slow.");
    expect(chat.prompts).toHaveLength(1);
    expect(chat.prompts[0]).toContain("Question: Why do users complain about the dashboard?");
    expect(output.sources).toEqual([
      {
        kind: "feedback",
        recordIds: ["FB-0001"],
        source: "App Store Review",
        date: "2024-03-02",
        snippet: `${LONG_TEXT.slice(0, 200)}...`,
      },
      {
        kind: "feedback",
        recordIds: ["FB-0002"],
        source: "Support Ticket",
        date: "2024-05-01",
        snippet: "Export to CSV uses the wrong date format",
      },
    ]);
  });

  it("should answer from web results when the router picks the web", async () => {
    const chat = new ScriptedChatModel([
      { when: "route questions", reply: "web" },
      { when: "web search results", reply: "Competitors ship dark mode." },
    ]);
    const webSearch = new FakeWebSearch([
      { title: "Release notes", url: "https://example.com/notes", content: "Dark mode is now available." },
    ]);
    const analyzer = createFeedbackAnalyzer({
      records: RECORDS,
      strategy: feedbackStrategy,
      chat,
      webSearch,
      csvPath: "x.csv",
    });

    const output = await analyzer.analyze("What are competitors shipping?");

    expect(output).toEqual({
      answer: "Competitors ship dark mode.",
      tool: "web_search",
      sources: [
        {
          kind: "web",
          url: "https://example.com/notes",
          title: "Release notes",
          snippet: "Dark mode is now available.",
        },
      ],
    });
    expect(webSearch.queries).toEqual(["What are competitors shipping?"]);
    expect(chat.prompts[1]).toContain("[1] Release notes\nDark mode is now available.");
  });

  it("should answer from feedback when the router picks feedback", async () => {
    const chat = new ScriptedChatModel([
      { when: "route questions", reply: "feedback" },
      { when: "Question:", reply: "Export dates are wrong." },
    ]);
    const webSearch = new FakeWebSearch([]);
    const analyzer = createFeedbackAnalyzer({
      records: RECORDS,
      strategy: feedbackStrategy,
      chat,
      webSearch,
      csvPath: "x.csv",
    });

    const output = await analyzer.analyze("What is wrong with exports?");

    expect(output.tool).toBe("feedback_search");
    expect(webSearch.queries).toEqual([]);
  });

  it("should reject a blank query", async () => {
    const analyzer = createFeedbackAnalyzer({
      records: RECORDS,
      strategy: feedbackStrategy,
      chat: new ScriptedChatModel([]),
      csvPath: "x.csv",
    });

    await expect(analyzer.analyze("   ")).rejects.toThrow("query must not be empty");
  });

  it("should apologize when a provider fails", async () => {
    const chat = new ScriptedChatModel([{ when: "Question:", reply: new Error("rate limited") }]);
    const analyzer = createFeedbackAnalyzer({ records: RECORDS, strategy: feedbackStrategy, chat, csvPath: "x.csv" });

    const output = await analyzer.analyze("Why is the dashboard slow?");

    expect(output).toEqual({ answer: APOLOGY_ANSWER, tool: "none" });
    expect(console.error).toHaveBeenCalledWith("Error during analysis:", "rate limited");
  });

  it("should describe a missing corpus file as disconnected", async () => {
    const analyzer = createFeedbackAnalyzer({
      records: RECORDS,
      strategy: feedbackStrategy,
      chat: new ScriptedChatModel([]),
      csvPath: join("does-not-exist", "feedback.csv"),
    });

    expect(await analyzer.datasetInfo()).toEqual({
      filename: "feedback.csv",
      recordCount: 0,
      lastUpdated: "Not found",
      fileSize: "0 B",
      status: "Disconnected",
    });
  });
});
