import { DocumentStore, IndexStruct, VectorStore } from './types';

/**
 * Everything persisted under one namespace: node docstore, vector store and
 * the registry of index structs (one per document id). The registry is held
 * in memory and written back by `ElasticStorageService.persist`.
 */
export class StorageContext {
  private readonly indexStructs: Map<string, IndexStruct>;

  constructor(
    readonly namespace: string,
    readonly docstore: DocumentStore,
    readonly vectorStore: VectorStore,
    indexStructs: Iterable<IndexStruct> = [],
  ) {
    this.indexStructs = new Map(Array.from(indexStructs, struct => [struct.indexId, struct]));
  }

  getIndexStruct(indexId: string): IndexStruct | undefined {
    return this.indexStructs.get(indexId);
  }

  addIndexStruct(struct: IndexStruct): void {
    this.indexStructs.set(struct.indexId, struct);
  }

  /** Drops the nodes a previous build wrote for `documentId` from both stores. */
  async removeDocumentNodes(documentId: string): Promise<number> {
    const [, vectors] = await Promise.all([
      this.docstore.deleteDocumentNodes(documentId),
      this.vectorStore.deleteDocumentNodes(documentId),
    ]);
    return vectors;
  }

  listIndexStructs(): IndexStruct[] {
    return Array.from(this.indexStructs.values());
  }
}
