import { z } from 'zod';
import { Tool, ToolParameters } from './base';
import { KnowledgeBaseManager, DEFAULT_SEARCH_LIMIT } from '../../services/knowledge/service';
import { SearchResult } from '../../services/knowledge/types';
import { errorMessage } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools:search_knowledge_base' });

export const NO_KNOWLEDGE_RESULTS = 'No relevant information found in the knowledge base.';

const SearchKnowledgeArgs = z.object({
  query: z.string().min(1),
});

type SearchKnowledgeParams = z.infer<typeof SearchKnowledgeArgs>;

export class SearchKnowledgeBaseTool extends Tool<SearchKnowledgeParams> {
  constructor(
    private readonly knowledgeBase: Pick<KnowledgeBaseManager, 'search'>,
    private readonly limit: number = DEFAULT_SEARCH_LIMIT
  ) {
    super();
  }

  get name(): string {
    return 'search_knowledge_base';
  }

  get description(): string {
    return 'Search the internal knowledge base for company policies, procedures, FAQs, and support information. Use this first for any questions about account management, products, or services.';
  }

  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        query: { type: 'string', description: "The user's question or search query" },
      },
      required: ['query'],
    };
  }

  protected get argsSchema() {
    return SearchKnowledgeArgs;
  }

  async execute(params: SearchKnowledgeParams): Promise<string> {
    let results: SearchResult[];
    try {
      results = await this.knowledgeBase.search(params.query, this.limit);
    } catch (error) {
      log.error(`Knowledge base search failed: ${errorMessage(error)}`);
      return `Error accessing knowledge base: ${errorMessage(error)}. Please ensure OPENAI_API_KEY is configured.`;
    }

    if (results.length === 0) {
      return NO_KNOWLEDGE_RESULTS;
    }

    return results
      .map((doc, i) => `Result ${i + 1} - ${doc.title}:\n${doc.content}`)
      .join('\n\n');
  }
}
