import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { ElasticRequestError, ElasticService } from '../elastic/elastic.service';
import { GeminiService } from '../gemini/gemini.service';
import { DOCSTORE_MAPPINGS, ElasticDocumentStore, ElasticVectorStore, VECTOR_INDEX_MAPPINGS } from './elastic-stores';
import { StorageContext } from './storage-context';
import { IndexLoadError, IndexStruct, StorageNotFoundError } from './types';
import { VectorIndex } from './vector-index';

const INDEX_STORE_DOC_ID = 'index_store';

const persistedIndexStoreSchema = z.object({
  index_structs: z.array(z.object({
    indexId: z.string(),
    nodeIds: z.array(z.string()),
    createdAt: z.string(),
  })),
  persisted_at: z.string(),
});

interface GetDocResponse {
  _source?: unknown;
}

/**
 * Durable storage for storage contexts. A namespace maps onto three
 * Elasticsearch indices: `<ns>-storage` (index struct registry),
 * `<ns>-docstore` and `<ns>-vectors`.
 */
@Injectable()
export class ElasticStorageService {
  private readonly logger = new Logger(ElasticStorageService.name);

  constructor(
    private readonly elasticService: ElasticService,
    private readonly geminiService: GeminiService,
  ) {}

  async load(namespace: string): Promise<StorageContext> {
    let doc: GetDocResponse;
    try {
      doc = await this.elasticService.elasticGet<GetDocResponse>(`/${namespace}-storage/_doc/${INDEX_STORE_DOC_ID}`);
    } catch (error) {
      if (error instanceof ElasticRequestError && error.status === 404) {
        throw new StorageNotFoundError(namespace);
      }
      throw error;
    }
    const persisted = persistedIndexStoreSchema.parse(doc._source);
    this.logger.log(`Loaded storage context ${namespace} with ${persisted.index_structs.length} indices`);
    return this.fromDefaults(namespace, persisted.index_structs);
  }

  fromDefaults(namespace: string, indexStructs: IndexStruct[] = []): StorageContext {
    return new StorageContext(
      namespace,
      new ElasticDocumentStore(this.elasticService, `${namespace}-docstore`),
      new ElasticVectorStore(this.elasticService, `${namespace}-vectors`),
      indexStructs,
    );
  }

  async persist(context: StorageContext): Promise<void> {
    const { namespace } = context;
    await this.elasticService.ensureIndex(`${namespace}-storage`, { properties: { index_structs: { type: 'object', enabled: false } } });
    await this.elasticService.ensureIndex(`${namespace}-docstore`, DOCSTORE_MAPPINGS);
    await this.elasticService.ensureIndex(`${namespace}-vectors`, VECTOR_INDEX_MAPPINGS);
    await this.elasticService.elasticPut(`/${namespace}-storage/_doc/${INDEX_STORE_DOC_ID}?refresh=wait_for`, {
      index_structs: context.listIndexStructs(),
      persisted_at: new Date().toISOString(),
    });
  }

  /** All-or-nothing: any id without a registered index struct fails the whole load. */
  async loadIndices(context: StorageContext, indexIds: string[]): Promise<VectorIndex[]> {
    const missing = indexIds.filter(id => !context.getIndexStruct(id));
    if (missing.length > 0) {
      throw new IndexLoadError(missing);
    }
    return indexIds.map(id => new VectorIndex(id, context, this.geminiService));
  }
}
