import { DB_DOC_ID_KEY, NodeWithScore, PAGE_LABEL_KEY, TextNode } from '../documents/types';
import { ElasticService } from '../elastic/elastic.service';
import { DocumentStore, EmbeddedNode, VectorStore, VectorStoreQuery } from './types';

interface KnnSearchResponse {
  hits: {
    hits: Array<{
      _id: string;
      _score: number;
      _source?: { text?: string; metadata?: Record<string, string> };
    }>;
  };
}

const NODE_METADATA_MAPPING = {
  type: 'object',
  properties: {
    [DB_DOC_ID_KEY]: { type: 'keyword' },
    [PAGE_LABEL_KEY]: { type: 'keyword' },
  },
};

function documentNodesQuery(documentId: string): Record<string, unknown> {
  return { term: { [`metadata.${DB_DOC_ID_KEY}`]: documentId } };
}

export const VECTOR_INDEX_MAPPINGS = {
  properties: {
    text: { type: 'text' },
    metadata: NODE_METADATA_MAPPING,
    embedding: { type: 'dense_vector', index: true, similarity: 'cosine' },
  },
};

export const DOCSTORE_MAPPINGS = {
  properties: {
    text: { type: 'text' },
    metadata: NODE_METADATA_MAPPING,
  },
};

export class ElasticVectorStore implements VectorStore {
  constructor(private readonly elastic: ElasticService, private readonly index: string) {}

  async add(nodes: EmbeddedNode[]): Promise<void> {
    if (nodes.length === 0) {
      return;
    }
    const lines = nodes.flatMap(node => [
      { index: { _index: this.index, _id: node.id } },
      { text: node.text, metadata: node.metadata, embedding: node.embedding },
    ]);
    await this.elastic.elasticBulkSave(lines);
  }

  async deleteDocumentNodes(documentId: string): Promise<number> {
    return this.elastic.elasticDeleteByQuery(this.index, documentNodesQuery(documentId));
  }

  async query(query: VectorStoreQuery): Promise<NodeWithScore[]> {
    const filter = Object.entries(query.filters ?? {}).map(([key, value]) => ({ term: { [`metadata.${key}`]: value } }));
    const knn = await this.elastic.elasticPost<KnnSearchResponse>(`/${this.index}/_search`, {
      knn: {
        field: 'embedding',
        query_vector: query.embedding,
        k: query.similarityTopK,
        num_candidates: Math.max(100, query.similarityTopK * 10),
        ...(filter.length > 0 ? { filter: { bool: { filter } } } : {}),
      },
      size: query.similarityTopK,
      _source: ['text', 'metadata'],
    });
    return knn.hits.hits.map(hit => ({
      node: { id: hit._id, text: hit._source?.text ?? '', metadata: hit._source?.metadata ?? {} },
      score: hit._score,
    }));
  }
}

export class ElasticDocumentStore implements DocumentStore {
  constructor(private readonly elastic: ElasticService, private readonly index: string) {}

  async addDocuments(nodes: TextNode[]): Promise<void> {
    if (nodes.length === 0) {
      return;
    }
    const lines = nodes.flatMap(node => [
      { index: { _index: this.index, _id: node.id } },
      { text: node.text, metadata: node.metadata },
    ]);
    await this.elastic.elasticBulkSave(lines);
  }

  async deleteDocumentNodes(documentId: string): Promise<number> {
    return this.elastic.elasticDeleteByQuery(this.index, documentNodesQuery(documentId));
  }
}
