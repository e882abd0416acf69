import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { Tool, ToolParameters } from './base';
import { WebSearchConfig } from '../../config/schema';
import { errorMessage } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools:search_web' });

// DuckDuckGo Instant Answer payload, only the fields we read
const InstantAnswerSchema = z.object({
  AbstractText: z.string().optional(),
  Answer: z.union([z.string(), z.number()]).optional(),
  RelatedTopics: z.array(z.unknown()).optional(),
});

const RelatedTopicSchema = z.object({ Text: z.string().min(1) });

const MAX_RELATED_TOPICS = 3;

function summarise(payload: unknown): string[] {
  const parsed = InstantAnswerSchema.safeParse(payload);
  if (!parsed.success) return [];

  const { AbstractText, Answer, RelatedTopics } = parsed.data;
  const parts: string[] = [];

  if (AbstractText) {
    parts.push(`Summary: ${AbstractText}`);
  }
  if (Answer !== undefined && Answer !== '') {
    parts.push(`Answer: ${Answer}`);
  }

  const topics = (RelatedTopics ?? [])
    .slice(0, MAX_RELATED_TOPICS)
    .map(topic => RelatedTopicSchema.safeParse(topic))
    .flatMap(result => (result.success ? [result.data.Text] : []));
  if (topics.length > 0) {
    parts.push(`Related: ${topics.join(' | ')}`);
  }

  return parts;
}

const SearchWebArgs = z.object({
  query: z.string().min(1),
});

type SearchWebParams = z.infer<typeof SearchWebArgs>;

export class WebSearchTool extends Tool<SearchWebParams> {
  get name() { return 'search_web'; }
  get description() {
    return 'Search the web for external information like current market data, news, or information not available in the internal knowledge base. Use this for real-time data or general information.';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The search query' },
      },
      required: ['query'],
    };
  }

  protected get argsSchema() {
    return SearchWebArgs;
  }

  constructor(private config: WebSearchConfig, private http: AxiosInstance = axios.create()) {
    super();
  }

  // Never throws: every failure becomes a message the agent can relay.
  async execute(params: SearchWebParams): Promise<string> {
    try {
      const response = await this.http.get(this.config.api_url, {
        params: { q: params.query, format: 'json', no_html: 1, skip_disambig: 1 },
        timeout: this.config.timeout_ms,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        log.warn(`Web search returned status ${response.status}`);
        return `Unable to fetch web results at this time. Status code: ${response.status}`;
      }

      const parts = summarise(response.data);
      if (parts.length > 0) {
        return parts.join('\n\n');
      }
      return `Search completed but no detailed results found for: ${params.query}. For real-time market data, please check financial websites like Yahoo Finance or Bloomberg.`;
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        log.warn(`Web search timed out for "${params.query}"`);
        return 'Web search timed out. Please try again or rephrase your query.';
      }
      log.error(`Web search error: ${errorMessage(err)}`);
      return `Web search error: ${errorMessage(err)}. For financial market data, please refer to official financial news sources.`;
    }
  }
}

const MarketDataArgs = z.object({
  symbol: z.string().min(1),
});

type MarketDataParams = z.infer<typeof MarketDataArgs>;

/** Placeholder until a market data feed is wired in. */
export class MarketDataTool extends Tool<MarketDataParams> {
  get name() { return 'get_market_data'; }
  get description() {
    return 'Get market data for a stock or cryptocurrency symbol. Live quotes are not available in this deployment.';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        symbol: { type: 'string', description: 'Ticker or crypto symbol, e.g. AAPL or BTC' },
      },
      required: ['symbol'],
    };
  }

  protected get argsSchema() {
    return MarketDataArgs;
  }

  async execute(params: MarketDataParams): Promise<string> {
    const symbol = params.symbol.trim().toUpperCase();
    return [
      `Market data retrieval for ${symbol}:`,
      '',
      'Note: This is a demo environment. For real-time market data, please:',
      '1. Visit financial websites like Yahoo Finance, Bloomberg, or MarketWatch',
      "2. Use your brokerage platform's market data tools",
      '3. Check cryptocurrency exchanges for crypto prices',
      '',
      'To enable live market data in this chatbot, configure a financial data API key in the settings.',
    ].join('\n');
  }
}
