import axios, { AxiosInstance } from 'axios';
import OpenAI from 'openai';
import { z } from 'zod';
import { ConfigurationError, ProviderError, errorMessage } from '../../errors';
import { KnowledgeBaseConfig } from '../../config/schema';
import logger from '../../utils/logger';
import { EmbeddingProvider } from './types';

const log = logger.child({ module: 'Embedding' });

/** The slice of the OpenAI client this provider talks to. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  dimension: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: EmbeddingsClient | null;

  constructor(private readonly options: OpenAIEmbeddingOptions, client?: EmbeddingsClient) {
    if (client) {
      this.client = client;
    } else if (options.apiKey) {
      this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
    } else {
      // Reported on first use so the rest of the service can still start
      this.client = null;
    }
  }

  async getEmbedding(text: string): Promise<number[]> {
    if (!this.client) {
      throw new ConfigurationError('OpenAI API key not configured. Please set OPENAI_API_KEY in environment.');
    }

    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await this.client.embeddings.create({ model: this.options.model, input: text });
    } catch (error) {
      log.error(`Failed to get embedding from OpenAI: ${errorMessage(error)}`);
      if (error instanceof OpenAI.APIError && (error.status === 401 || error.status === 403)) {
        throw new ConfigurationError(`OpenAI rejected the embedding credentials: ${error.message}`, { cause: error });
      }
      throw new ProviderError(`OpenAI embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    const embedding = response.data[0]?.embedding;
    if (!Array.isArray(embedding)) {
      throw new ProviderError('Invalid response format from OpenAI');
    }
    return embedding;
  }

  getDimension(): number {
    return this.options.dimension;
  }
}

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
  dimension: number;
  timeoutMs: number;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaEmbeddingOptions, private readonly http: AxiosInstance = axios.create()) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async getEmbedding(text: string): Promise<number[]> {
    let data: unknown;
    try {
      const response = await this.http.post(
        `${this.baseUrl}/api/embeddings`,
        { model: this.options.model, prompt: text },
        { timeout: this.options.timeoutMs }
      );
      data = response.data;
    } catch (error) {
      log.error(`Failed to get embedding from Ollama: ${errorMessage(error)}`);
      throw new ProviderError(`Ollama embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = OllamaEmbeddingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Invalid response format from Ollama');
    }
    return parsed.data.embedding;
  }

  getDimension(): number {
    return this.options.dimension;
  }
}

export function createEmbeddingProvider(config: KnowledgeBaseConfig): EmbeddingProvider {
  const embedding = config.embedding;
  switch (embedding.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider({
        apiKey: embedding.openai.api_key,
        model: embedding.openai.model,
        baseUrl: embedding.openai.base_url,
        dimension: config.dimension,
      });
    case 'ollama':
      return new OllamaEmbeddingProvider({
        baseUrl: embedding.ollama.base_url,
        model: embedding.ollama.model,
        dimension: config.dimension,
        timeoutMs: embedding.ollama.timeout_ms,
      });
  }
}
