import { v4 as uuidv4 } from 'uuid';
import { CallbackManager, CBEventType } from '../callbacks/callback-manager';
import { NodeWithScore } from '../documents/types';
import { CompletionModel } from '../gemini/types';
import { Retriever } from '../index-store/vector-index';
import { splitIntoChunks } from '../../utils/textNormalizer';
import { CITATION_QA_PROMPT } from './prompts';
import { QueryEngine, QueryResponse } from './types';

export const CITATION_CHUNK_SIZE = 512;
export const CITATION_CHUNK_OVERLAP = 20;

/**
 * Retrieves nodes, re-splits them into numbered "Source N" chunks that keep
 * their page metadata, and asks the model to answer citing those numbers.
 * The numbered chunks are the response's source nodes.
 */
export class CitationQueryEngine implements QueryEngine {
  constructor(
    private readonly retriever: Retriever,
    private readonly llm: CompletionModel,
    private readonly callbacks: CallbackManager,
    private readonly citationChunkSize = CITATION_CHUNK_SIZE,
  ) {}

  async query(queryStr: string): Promise<QueryResponse> {
    return this.callbacks.withEvent(
      CBEventType.QUERY,
      { queryStr },
      async () => {
        const retrieved = await this.callbacks.withEvent(
          CBEventType.RETRIEVE,
          { queryStr },
          () => this.retriever.retrieve(queryStr),
          nodes => ({ nodes }),
        );
        const citationNodes = this.createCitationNodes(retrieved);

        const response = await this.callbacks.withEvent(CBEventType.SYNTHESIZE, { queryStr }, async () => {
          if (citationNodes.length === 0) {
            return 'Empty Response';
          }
          const prompt = CITATION_QA_PROMPT(citationNodes.map(({ node }) => node.text).join('\n'), queryStr);
          return this.callbacks.withEvent(
            CBEventType.LLM,
            { queryStr: prompt },
            () => this.llm.complete(prompt),
            text => ({ response: text }),
          );
        });

        return { response: response.trim(), sourceNodes: citationNodes };
      },
      response => ({ response }),
    );
  }

  createCitationNodes(nodes: NodeWithScore[]): NodeWithScore[] {
    const citationNodes: NodeWithScore[] = [];
    for (const { node, score } of nodes) {
      for (const chunk of splitIntoChunks(node.text, { chunkSize: this.citationChunkSize, overlap: CITATION_CHUNK_OVERLAP })) {
        citationNodes.push({
          node: {
            id: uuidv4(),
            text: `Source ${citationNodes.length + 1}:\n${chunk.text}\n`,
            metadata: { ...node.metadata },
          },
          score,
        });
      }
    }
    return citationNodes;
  }
}
