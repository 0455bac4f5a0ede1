import { NodeWithScore, TextNode } from '../documents/types';

export interface EmbeddedNode extends TextNode {
  embedding: number[];
}

/** Exact-match filters on node metadata, all of which must hold. */
export type MetadataFilters = Record<string, string>;

export interface VectorStoreQuery {
  embedding: number[];
  similarityTopK: number;
  filters?: MetadataFilters;
}

export interface VectorStore {
  add(nodes: EmbeddedNode[]): Promise<void>;
  /** Removes every node whose metadata names `documentId`; resolves to the number removed. */
  deleteDocumentNodes(documentId: string): Promise<number>;
  query(query: VectorStoreQuery): Promise<NodeWithScore[]>;
}

export interface DocumentStore {
  addDocuments(nodes: TextNode[]): Promise<void>;
  deleteDocumentNodes(documentId: string): Promise<number>;
}

export interface IndexStruct {
  indexId: string;
  nodeIds: string[];
  createdAt: string;
}

export class StorageNotFoundError extends Error {
  constructor(readonly namespace: string) {
    super(`No persisted storage context found under namespace "${namespace}"`);
    this.name = 'StorageNotFoundError';
  }
}

export class IndexLoadError extends Error {
  constructor(readonly missingIds: string[]) {
    super(`Failed to load indices from storage: ${missingIds.join(', ')}`);
    this.name = 'IndexLoadError';
  }
}
