import { Injectable, Logger } from '@nestjs/common';
import { CallbackManager } from '../callbacks/callback-manager';
import { DocumentReaderService } from '../documents/document-reader.service';
import { DocumentRef } from '../documents/types';
import { GeminiService } from '../gemini/gemini.service';
import { ElasticStorageService } from './elastic-storage.service';
import { StorageContext } from './storage-context';
import { StorageContextCache } from './storage-context.cache';
import { IndexLoadError, StorageNotFoundError } from './types';
import { VectorIndex } from './vector-index';

@Injectable()
export class IndexStoreService {
  private readonly logger = new Logger(IndexStoreService.name);

  constructor(
    private readonly storage: ElasticStorageService,
    private readonly cache: StorageContextCache,
    private readonly documentReader: DocumentReaderService,
    private readonly geminiService: GeminiService,
  ) {}

  /**
   * Returns one index per document, keyed by document id. When the persisted
   * indices cannot all be loaded, every document is re-read and re-indexed.
   * Concurrent calls for the same documents are not deduplicated.
   */
  async loadOrBuild(
    documents: DocumentRef[],
    namespace: string,
    callbacks?: CallbackManager,
  ): Promise<Map<string, VectorIndex>> {
    const indexIds = documents.map(document => document.id);
    try {
      const context = await this.getStorageContext(namespace);
      const indices = await this.storage.loadIndices(context, indexIds);
      this.logger.debug('Loaded indices from storage.');
      return new Map(indexIds.map((id, i) => [id, indices[i]]));
    } catch (error) {
      if (!(error instanceof IndexLoadError)) {
        throw error;
      }
      this.logger.error(`${error.message}. Creating new indices for ${documents.length} documents.`);
      return this.rebuild(documents, namespace, callbacks);
    }
  }

  private async getStorageContext(namespace: string): Promise<StorageContext> {
    try {
      return await this.cache.get(() => this.storage.load(namespace));
    } catch (error) {
      if (!(error instanceof StorageNotFoundError)) {
        throw error;
      }
      this.logger.log(`Could not find storage context ${namespace}. Creating new storage context.`);
      return this.createStorageContext(namespace);
    }
  }

  private async createStorageContext(namespace: string): Promise<StorageContext> {
    const context = this.storage.fromDefaults(namespace);
    await this.storage.persist(context);
    return context;
  }

  private async rebuild(
    documents: DocumentRef[],
    namespace: string,
    callbacks?: CallbackManager,
  ): Promise<Map<string, VectorIndex>> {
    // bypass the cache: the cached context is what failed to provide the indices
    let context: StorageContext;
    try {
      context = await this.storage.load(namespace);
    } catch (error) {
      if (!(error instanceof StorageNotFoundError)) {
        throw error;
      }
      context = await this.createStorageContext(namespace);
    }

    const docIdToIndex = new Map<string, VectorIndex>();
    for (const document of documents) {
      const nodes = await this.documentReader.fetchAndReadDocument(document);
      const removed = await context.removeDocumentNodes(document.id);
      if (removed > 0) {
        this.logger.log(`Replacing ${removed} stored vectors of document ${document.id}`);
      }
      const index = await VectorIndex.fromDocuments(document.id, nodes, context, this.geminiService, callbacks);
      await this.storage.persist(context);
      docIdToIndex.set(document.id, index);
    }
    this.cache.invalidate();
    return docIdToIndex;
  }
}
