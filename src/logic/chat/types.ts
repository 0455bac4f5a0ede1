import { CBEventType } from '../callbacks/callback-manager';

/** Where a sub-process event came from: a pipeline event kind, or the engine-ready marker. */
export enum MessageSubProcessSource {
  CHUNKING = 'chunking',
  NODE_PARSING = 'node_parsing',
  EMBEDDING = 'embedding',
  LLM = 'llm',
  QUERY = 'query',
  RETRIEVE = 'retrieve',
  SYNTHESIZE = 'synthesize',
  TREE = 'tree',
  SUB_QUESTION = 'sub_question',
  TEMPLATING = 'templating',
  FUNCTION_CALL = 'function_call',
  RERANKING = 'reranking',
  EXCEPTION = 'exception',
  AGENT_STEP = 'agent_step',
  CONSTRUCTED_QUERY_ENGINE = 'constructed_query_engine',
}

export const SOURCE_BY_EVENT_TYPE: Record<CBEventType, MessageSubProcessSource> = {
  [CBEventType.CHUNKING]: MessageSubProcessSource.CHUNKING,
  [CBEventType.NODE_PARSING]: MessageSubProcessSource.NODE_PARSING,
  [CBEventType.EMBEDDING]: MessageSubProcessSource.EMBEDDING,
  [CBEventType.LLM]: MessageSubProcessSource.LLM,
  [CBEventType.QUERY]: MessageSubProcessSource.QUERY,
  [CBEventType.RETRIEVE]: MessageSubProcessSource.RETRIEVE,
  [CBEventType.SYNTHESIZE]: MessageSubProcessSource.SYNTHESIZE,
  [CBEventType.TREE]: MessageSubProcessSource.TREE,
  [CBEventType.SUB_QUESTION]: MessageSubProcessSource.SUB_QUESTION,
  [CBEventType.TEMPLATING]: MessageSubProcessSource.TEMPLATING,
  [CBEventType.FUNCTION_CALL]: MessageSubProcessSource.FUNCTION_CALL,
  [CBEventType.RERANKING]: MessageSubProcessSource.RERANKING,
  [CBEventType.EXCEPTION]: MessageSubProcessSource.EXCEPTION,
  [CBEventType.AGENT_STEP]: MessageSubProcessSource.AGENT_STEP,
};

export interface Citation {
  document_id: string;
  page_number: number;
  text: string;
}

export interface QuestionAnswerPair {
  question: string;
  answer: string | null;
  citations: Citation[];
}

export type SubProcessMetadataMap =
  | { sub_questions: QuestionAnswerPair[] }
  | { sub_question: QuestionAnswerPair };

/** Wire shape of a sub-process event. */
export interface SubProcessEvent {
  source: MessageSubProcessSource;
  event_id: string;
  has_ended: boolean;
  metadata_map?: SubProcessMetadataMap;
}

/** Wire shape of a streamed assistant message: the full text so far. */
export interface StreamedMessage {
  content: string;
}

export type ChatStreamEvent =
  | { kind: 'message'; payload: StreamedMessage }
  | { kind: 'sub_process'; payload: SubProcessEvent };
