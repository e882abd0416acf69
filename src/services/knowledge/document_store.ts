import { z } from 'zod';
import { CorruptionError, OutOfRangeError } from '../../errors';
import { KnowledgeDocument } from './types';

const KnowledgeDocumentSchema = z.object({
  title: z.string(),
  content: z.string(),
  full_text: z.string(),
});

const DocumentListSchema = z.array(KnowledgeDocumentSchema);

/**
 * Ordered, append-only list of documents. Position `i` pairs with vector `i`
 * in the similarity index.
 */
export class DocumentStore {
  private documents: KnowledgeDocument[] = [];

  append(document: KnowledgeDocument): void {
    this.documents.push({ ...document });
  }

  get(position: number): KnowledgeDocument {
    if (!Number.isInteger(position) || position < 0 || position >= this.documents.length) {
      throw new OutOfRangeError(position, this.documents.length);
    }
    return { ...this.documents[position] };
  }

  has(position: number): boolean {
    return Number.isInteger(position) && position >= 0 && position < this.documents.length;
  }

  count(): number {
    return this.documents.length;
  }

  all(): readonly KnowledgeDocument[] {
    return this.documents.map(doc => ({ ...doc }));
  }

  toJson(): string {
    return JSON.stringify(this.documents, null, 2);
  }

  static fromJson(text: string): DocumentStore {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new CorruptionError('Documents file is not valid JSON', { cause: err });
    }

    const parsed = DocumentListSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CorruptionError(`Documents file has an invalid record at ${issue.path.join('.')}: ${issue.message}`);
    }

    const store = new DocumentStore();
    store.documents = parsed.data;
    return store;
  }
}
