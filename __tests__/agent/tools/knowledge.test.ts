import { SearchKnowledgeBaseTool, NO_KNOWLEDGE_RESULTS } from "../../../src/agent/tools/knowledge";
import { KnowledgeBaseManager, buildDocument } from "../../../src/services/knowledge/service";
import { ConfigurationError } from "../../../src/errors";
import type { SearchResult } from "../../../src/services/knowledge/types";
import { StubEmbeddingProvider, makeTmpDir, removeDir } from "../../helpers/fixtures";

type Search = KnowledgeBaseManager["search"];

describe("SearchKnowledgeBaseTool", () => {
  test("formats each result with its rank and title", async () => {
    const results: SearchResult[] = [
      { ...buildDocument("Fees", "No hidden fees."), distance: 0 },
      { ...buildDocument("Support Hours", "24/7 chat support."), distance: 1.5 },
    ];
    const search = jest.fn<ReturnType<Search>, Parameters<Search>>(async () => results);
    const tool = new SearchKnowledgeBaseTool({ search });

    const output = await tool.run({ query: "fees" });

    expect(output).toBe("Result 1 - Fees:\nNo hidden fees.\n\nResult 2 - Support Hours:\n24/7 chat support.");
    expect(search).toHaveBeenCalledWith("fees", 3);
  });

  test("reports when nothing matches", async () => {
    const tool = new SearchKnowledgeBaseTool({ search: async () => [] });
    await expect(tool.run({ query: "unknown" })).resolves.toBe(NO_KNOWLEDGE_RESULTS);
  });

  test("turns knowledge base errors into a message", async () => {
    const tool = new SearchKnowledgeBaseTool({
      search: async () => {
        throw new ConfigurationError("OpenAI API key not configured. Please set OPENAI_API_KEY in environment.");
      },
    });

    await expect(tool.run({ query: "fees" })).resolves.toBe(
      "Error accessing knowledge base: OpenAI API key not configured. Please set OPENAI_API_KEY in environment.. Please ensure OPENAI_API_KEY is configured."
    );
  });

  test("rejects an empty query", async () => {
    const tool = new SearchKnowledgeBaseTool({ search: async () => [] });
    await expect(tool.run({ query: "" })).resolves.toBe(
      "Error: Invalid parameters for tool 'search_knowledge_base': query: String must contain at least 1 character(s)"
    );
  });

  test("searches a real knowledge base end to end", async () => {
    const dir = makeTmpDir("kb-tool");
    try {
      const provider = new StubEmbeddingProvider(2, {
        "Fees\nNo hidden fees.": [1, 0],
        "Hours\nOpen daily.": [0, 1],
        "what fees": [0.9, 0],
      });
      const kb = new KnowledgeBaseManager(
        { storagePath: dir, indexFile: "kb.index", documentsFile: "docs.json", dimension: 2, seedDocuments: [] },
        provider
      );
      await kb.addDocument("Fees", "No hidden fees.");
      await kb.addDocument("Hours", "Open daily.");

      const output = await new SearchKnowledgeBaseTool(kb, 1).run({ query: "what fees" });

      expect(output).toBe("Result 1 - Fees:\nNo hidden fees.");
    } finally {
      removeDir(dir);
    }
  });
});
