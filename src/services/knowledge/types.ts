export interface KnowledgeDocument {
  title: string;
  content: string;
  /** Exact text that was embedded: `${title}\n${content}` */
  full_text: string;
}

export interface SearchResult extends KnowledgeDocument {
  /** Squared L2 distance between the query and document embeddings */
  distance: number;
}

export interface IndexHit {
  position: number;
  distance: number;
}

export interface KnowledgeBaseStats {
  total_documents: number;
  index_size: number;
  dimension: number;
}

export type KnowledgeBaseState = 'uninitialized' | 'initializing' | 'ready';

export interface SeedDocument {
  title: string;
  content: string;
}

export interface EmbeddingProvider {
  getEmbedding(text: string): Promise<number[]>;
  getDimension(): number;
}
