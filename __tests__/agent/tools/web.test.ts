import axios, { AxiosError } from "axios";
import { MarketDataTool, WebSearchTool } from "../../../src/agent/tools/web";
import { ConfigSchema } from "../../../src/config/schema";
import { fakeAdapter, type RecordedRequest } from "../../helpers/fixtures";

const config = ConfigSchema.parse({ tools: { web_search: { api_url: "http://search.test/", timeout_ms: 2500 } } })
  .tools.web_search;

function toolAnswering(respond: Parameters<typeof fakeAdapter>[0], requests: RecordedRequest[] = []) {
  return new WebSearchTool(config, axios.create({ adapter: fakeAdapter(respond, requests) }));
}

describe("WebSearchTool", () => {
  test("queries the instant answer API as JSON without HTML", async () => {
    const requests: RecordedRequest[] = [];
    const tool = toolAnswering(() => ({ status: 200, data: {} }), requests);

    await tool.run({ query: "index funds" });

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("http://search.test/");
    expect(requests[0].params).toEqual({ q: "index funds", format: "json", no_html: 1, skip_disambig: 1 });
    expect(requests[0].timeout).toBe(2500);
  });

  test("combines summary, answer and the first three related topics", async () => {
    const tool = toolAnswering(() => ({
      status: 200,
      data: {
        AbstractText: "An index fund tracks a market index.",
        Answer: "Low cost",
        RelatedTopics: [
          { Text: "ETF" },
          { Name: "Grouped", Topics: [{ Text: "nested" }] },
          { Text: "Mutual fund" },
          { Text: "Not included" },
        ],
      },
    }));

    await expect(tool.run({ query: "index funds" })).resolves.toBe(
      "Summary: An index fund tracks a market index.\n\nAnswer: Low cost\n\nRelated: ETF | Mutual fund"
    );
  });

  test("says so when the response carries nothing useful", async () => {
    const tool = toolAnswering(() => ({ status: 200, data: { AbstractText: "", Answer: "", RelatedTopics: [] } }));

    await expect(tool.run({ query: "xyz" })).resolves.toBe(
      "Search completed but no detailed results found for: xyz. For real-time market data, please check financial websites like Yahoo Finance or Bloomberg."
    );
  });

  test("reports a non-200 status", async () => {
    const tool = toolAnswering(() => ({ status: 503, data: "" }));

    await expect(tool.run({ query: "rates" })).resolves.toBe(
      "Unable to fetch web results at this time. Status code: 503"
    );
  });

  test("reports a timeout", async () => {
    const tool = toolAnswering(() => {
      throw new AxiosError("timeout of 2500ms exceeded", "ECONNABORTED");
    });

    await expect(tool.run({ query: "rates" })).resolves.toBe(
      "Web search timed out. Please try again or rephrase your query."
    );
  });

  test("reports other failures without throwing", async () => {
    const tool = toolAnswering(() => {
      throw new Error("getaddrinfo ENOTFOUND search.test");
    });

    await expect(tool.run({ query: "rates" })).resolves.toBe(
      "Web search error: getaddrinfo ENOTFOUND search.test. For financial market data, please refer to official financial news sources."
    );
  });
});

describe("MarketDataTool", () => {
  test("returns the placeholder notice for the upper-cased symbol", async () => {
    const output = await new MarketDataTool().run({ symbol: " aapl " });

    expect(output.split("\n")[0]).toBe("Market data retrieval for AAPL:");
    expect(output).toContain("This is a demo environment.");
  });
});
