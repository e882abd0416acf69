import fs from 'fs-extra';
import path from 'path';
import { CorruptionError } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:Files' });

const TMP_SUFFIX = '.tmp';

export interface PersistedKnowledgeBase {
  index: Buffer;
  documents: string;
}

/**
 * Index blob + documents file pair on disk.
 *
 * A save writes both temp files first and then renames the index followed by
 * the documents. If the process dies between the two renames, only the
 * documents temp file is left behind and `recover()` finishes the rename.
 */
export class KnowledgeBaseFiles {
  readonly indexPath: string;
  readonly documentsPath: string;

  constructor(readonly directory: string, indexFile: string, documentsFile: string) {
    this.indexPath = path.join(directory, indexFile);
    this.documentsPath = path.join(directory, documentsFile);
  }

  async ensureDirectory(): Promise<void> {
    await fs.ensureDir(this.directory);
  }

  async recover(): Promise<void> {
    const indexTmp = this.indexPath + TMP_SUFFIX;
    const documentsTmp = this.documentsPath + TMP_SUFFIX;
    const [hasIndexTmp, hasDocumentsTmp] = await Promise.all([
      fs.pathExists(indexTmp),
      fs.pathExists(documentsTmp),
    ]);

    if (hasDocumentsTmp && !hasIndexTmp) {
      log.warn(`Completing interrupted save: ${documentsTmp} -> ${this.documentsPath}`);
      await fs.rename(documentsTmp, this.documentsPath);
      return;
    }

    // Anything else means the save died before the first rename; the
    // committed pair is still intact.
    if (hasIndexTmp) {
      log.warn(`Discarding incomplete save file ${indexTmp}`);
      await fs.remove(indexTmp);
    }
    if (hasDocumentsTmp) {
      log.warn(`Discarding incomplete save file ${documentsTmp}`);
      await fs.remove(documentsTmp);
    }
  }

  /** Returns null when neither file exists. */
  async read(): Promise<PersistedKnowledgeBase | null> {
    const [hasIndex, hasDocuments] = await Promise.all([
      fs.pathExists(this.indexPath),
      fs.pathExists(this.documentsPath),
    ]);

    if (!hasIndex && !hasDocuments) return null;
    if (!hasIndex || !hasDocuments) {
      const missing = hasIndex ? this.documentsPath : this.indexPath;
      throw new CorruptionError(`Knowledge base is incomplete: ${missing} is missing`);
    }

    const [index, documents] = await Promise.all([
      fs.readFile(this.indexPath),
      fs.readFile(this.documentsPath, 'utf-8'),
    ]);
    return { index, documents };
  }

  async write(snapshot: PersistedKnowledgeBase): Promise<void> {
    await this.ensureDirectory();
    const indexTmp = this.indexPath + TMP_SUFFIX;
    const documentsTmp = this.documentsPath + TMP_SUFFIX;

    await fs.writeFile(indexTmp, snapshot.index);
    await fs.writeFile(documentsTmp, snapshot.documents, 'utf-8');

    await fs.rename(indexTmp, this.indexPath);
    await fs.rename(documentsTmp, this.documentsPath);
  }
}
