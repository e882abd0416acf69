import path from 'path';
import { ConfigurationError, CorruptionError, ProviderError } from '../../errors';
import { KnowledgeBaseConfig } from '../../config/schema';
import { ReadWriteLock } from '../../utils/rwlock';
import { resolvePath } from '../../utils/paths';
import logger from '../../utils/logger';
import { FlatL2Index } from './flat_index';
import { DocumentStore } from './document_store';
import { KnowledgeBaseFiles } from './persistence';
import {
  EmbeddingProvider,
  IndexHit,
  KnowledgeBaseState,
  KnowledgeBaseStats,
  KnowledgeDocument,
  SearchResult,
  SeedDocument,
} from './types';
import defaultSeedDocuments from './seed_documents.json';

const log = logger.child({ module: 'Knowledge' });

export const DEFAULT_SEARCH_LIMIT = 3;

export interface KnowledgeBaseOptions {
  storagePath: string;
  indexFile: string;
  documentsFile: string;
  dimension: number;
  /** Documents added when no persisted knowledge base exists. Defaults to the bundled support articles. */
  seedDocuments?: readonly SeedDocument[];
}

export function buildDocument(title: string, content: string): KnowledgeDocument {
  return { title, content, full_text: `${title}\n${content}` };
}

/** Pairs index hits with their documents, dropping positions the store does not hold. */
export function resolveHits(hits: readonly IndexHit[], documents: DocumentStore): SearchResult[] {
  const results: SearchResult[] = [];
  for (const hit of hits) {
    if (!documents.has(hit.position)) {
      log.warn(`Index position ${hit.position} has no document (store size ${documents.count()}), skipping`);
      continue;
    }
    results.push({ ...documents.get(hit.position), distance: hit.distance });
  }
  return results;
}

/**
 * Owns the similarity index and the document store and keeps them paired:
 * vector `i` in the index is always the embedding of document `i`.
 *
 * Lifecycle is uninitialized -> initializing -> ready. `initialize()` runs
 * once per instance (concurrent callers share it) and every public operation
 * awaits it. Reads go through a shared lock, mutations and saves through an
 * exclusive one; embedding calls happen outside the lock.
 */
export class KnowledgeBaseManager {
  private index: FlatL2Index;
  private documents = new DocumentStore();
  private currentState: KnowledgeBaseState = 'uninitialized';
  private initialization: Promise<void> | null = null;
  private readonly lock = new ReadWriteLock();
  private readonly files: KnowledgeBaseFiles;
  private readonly seedDocuments: readonly SeedDocument[];

  constructor(
    private readonly options: KnowledgeBaseOptions,
    private readonly embeddingProvider: EmbeddingProvider
  ) {
    const providerDimension = embeddingProvider.getDimension();
    if (providerDimension !== options.dimension) {
      throw new ConfigurationError(
        `Embedding provider produces ${providerDimension} dimensions, knowledge base is configured for ${options.dimension}`
      );
    }
    this.index = FlatL2Index.create(options.dimension);
    this.files = new KnowledgeBaseFiles(options.storagePath, options.indexFile, options.documentsFile);
    this.seedDocuments = options.seedDocuments ?? defaultSeedDocuments;
  }

  static fromConfig(config: KnowledgeBaseConfig, embeddingProvider: EmbeddingProvider): KnowledgeBaseManager {
    return new KnowledgeBaseManager(
      {
        storagePath: resolvePath(config.storage_path),
        indexFile: config.index_file,
        documentsFile: config.documents_file,
        dimension: config.dimension,
        seedDocuments: config.seed_defaults ? undefined : [],
      },
      embeddingProvider
    );
  }

  get state(): KnowledgeBaseState {
    return this.currentState;
  }

  get dimension(): number {
    return this.options.dimension;
  }

  get storagePaths(): { index: string; documents: string } {
    return { index: this.files.indexPath, documents: this.files.documentsPath };
  }

  initialize(): Promise<void> {
    if (!this.initialization) {
      this.currentState = 'initializing';
      this.initialization = this.loadOrCreate().then(
        () => {
          this.currentState = 'ready';
        },
        (error: unknown) => {
          log.error(`Knowledge base initialization failed: ${error}`);
          this.index = FlatL2Index.create(this.options.dimension);
          this.documents = new DocumentStore();
          this.currentState = 'uninitialized';
          this.initialization = null;
          throw error;
        }
      );
    }
    return this.initialization;
  }

  /**
   * Embeds and stores a document. Returns its position. Nothing is written to
   * disk until `save()`.
   */
  async addDocument(title: string, content: string): Promise<number> {
    await this.initialize();
    const document = buildDocument(title, content);
    const vector = await this.embed(document.full_text);
    return this.lock.withWrite(() => this.appendPair(vector, document));
  }

  async search(query: string, k: number = DEFAULT_SEARCH_LIMIT): Promise<SearchResult[]> {
    await this.initialize();
    if (this.index.count() === 0) return [];

    const vector = await this.embed(query);

    return this.lock.withRead(() => {
      const limit = Math.min(k, this.index.count());
      return resolveHits(this.index.query(vector, limit), this.documents);
    });
  }

  async save(): Promise<void> {
    await this.initialize();
    await this.lock.withWrite(() => this.writeSnapshot());
  }

  async getStats(): Promise<KnowledgeBaseStats> {
    await this.initialize();
    return this.lock.withRead(() => ({
      total_documents: this.documents.count(),
      index_size: this.index.count(),
      dimension: this.index.dimension,
    }));
  }

  private async loadOrCreate(): Promise<void> {
    await this.files.ensureDirectory();
    await this.files.recover();

    const persisted = await this.files.read();
    if (persisted) {
      const index = FlatL2Index.deserialize(persisted.index);
      const documents = DocumentStore.fromJson(persisted.documents);

      if (index.dimension !== this.options.dimension) {
        throw new CorruptionError(
          `Persisted index has dimension ${index.dimension}, configured dimension is ${this.options.dimension}`
        );
      }
      if (index.count() !== documents.count()) {
        throw new CorruptionError(
          `Persisted index holds ${index.count()} vectors but documents file holds ${documents.count()} documents`
        );
      }

      this.index = index;
      this.documents = documents;
      log.info(`Loaded knowledge base with ${documents.count()} documents from ${this.files.directory}`);
      return;
    }

    this.index = FlatL2Index.create(this.options.dimension);
    this.documents = new DocumentStore();

    for (const seed of this.seedDocuments) {
      const document = buildDocument(seed.title, seed.content);
      this.appendPair(await this.embed(document.full_text), document);
    }

    await this.writeSnapshot();
    log.info(`Initialized knowledge base with ${this.seedDocuments.length} sample documents`);
  }

  private async embed(text: string): Promise<number[]> {
    const vector = await this.embeddingProvider.getEmbedding(text);
    if (vector.length !== this.options.dimension) {
      throw new ProviderError(
        `Embedding provider returned ${vector.length} dimensions, expected ${this.options.dimension}`
      );
    }
    return vector;
  }

  // Vector and document are appended in one synchronous step.
  private appendPair(vector: number[], document: KnowledgeDocument): number {
    const position = this.index.count();
    this.index.insert(vector);
    this.documents.append(document);
    return position;
  }

  private async writeSnapshot(): Promise<void> {
    await this.files.write({
      index: this.index.serialize(),
      documents: this.documents.toJson(),
    });
    log.debug(`Saved ${this.index.count()} vectors to ${path.basename(this.files.indexPath)}`);
  }
}
