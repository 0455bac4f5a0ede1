import { NodeWithScore, TextNode } from '../documents/types';
import { EmbeddingModel } from '../gemini/types';
import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { splitIntoChunks } from '../../utils/textNormalizer';
import { StorageContext } from './storage-context';
import { EmbeddedNode, MetadataFilters } from './types';

export interface RetrieverOptions {
  similarityTopK: number;
  filters?: MetadataFilters;
}

export interface Retriever {
  retrieve(queryStr: string): Promise<NodeWithScore[]>;
}

/** A queryable vector index over one document's nodes, living in a shared storage context. */
export class VectorIndex {
  constructor(
    readonly indexId: string,
    readonly storageContext: StorageContext,
    private readonly embedder: EmbeddingModel,
  ) {}

  /**
   * Splits `documents` into chunks (each keeps its page's metadata), embeds
   * them, writes docstore + vectors and registers the index struct. Chunk ids
   * derive from the page id and chunk position, so rewriting the same pages
   * overwrites instead of duplicating. The caller persists the storage context.
   */
  static async fromDocuments(
    indexId: string,
    documents: TextNode[],
    storageContext: StorageContext,
    embedder: EmbeddingModel,
    callbacks?: CallbackManager,
  ): Promise<VectorIndex> {
    const chunks: TextNode[] = documents.flatMap(document =>
      splitIntoChunks(document.text).map(chunk => ({
        id: `${document.id}-chunk-${chunk.chunkIndex}`,
        text: chunk.text,
        metadata: { ...document.metadata },
      })),
    );

    const embeddings = callbacks
      ? await callbacks.withEvent(
          CBEventType.EMBEDDING,
          { chunks: chunks.map(chunk => chunk.text) },
          () => embedder.embedTexts(chunks.map(chunk => chunk.text)),
        )
      : await embedder.embedTexts(chunks.map(chunk => chunk.text));

    const embedded: EmbeddedNode[] = chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));

    await storageContext.docstore.addDocuments(documents);
    await storageContext.vectorStore.add(embedded);
    storageContext.addIndexStruct({
      indexId,
      nodeIds: embedded.map(node => node.id),
      createdAt: new Date().toISOString(),
    });
    return new VectorIndex(indexId, storageContext, embedder);
  }

  asRetriever(options: RetrieverOptions): Retriever {
    return {
      retrieve: async (queryStr: string) => {
        const [embedding] = await this.embedder.embedTexts([queryStr]);
        return this.storageContext.vectorStore.query({
          embedding,
          similarityTopK: options.similarityTopK,
          filters: options.filters,
        });
      },
    };
  }
}
