import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { NodeWithScore } from '../documents/types';
import { QueryResponse, SubQuestionAnswerPair, ToolMetadata } from '../query-engines/types';

export enum CBEventType {
  CHUNKING = 'CHUNKING',
  NODE_PARSING = 'NODE_PARSING',
  EMBEDDING = 'EMBEDDING',
  LLM = 'LLM',
  QUERY = 'QUERY',
  RETRIEVE = 'RETRIEVE',
  SYNTHESIZE = 'SYNTHESIZE',
  TREE = 'TREE',
  SUB_QUESTION = 'SUB_QUESTION',
  TEMPLATING = 'TEMPLATING',
  FUNCTION_CALL = 'FUNCTION_CALL',
  RERANKING = 'RERANKING',
  EXCEPTION = 'EXCEPTION',
  AGENT_STEP = 'AGENT_STEP',
}

/** What pipeline components report; loosely shaped, classified before it reaches handlers. */
export interface RawEventPayload {
  queryStr?: string;
  response?: QueryResponse | string;
  nodes?: NodeWithScore[];
  chunks?: string[];
  subQuestion?: SubQuestionAnswerPair;
  functionCall?: string;
  tool?: ToolMetadata;
  functionOutput?: string;
  exception?: unknown;
}

export type ClassifiedPayload =
  | { kind: 'response'; response: QueryResponse }
  | { kind: 'sub_question'; pair: SubQuestionAnswerPair }
  | { kind: 'function_output'; output: string }
  | { kind: 'none' };

export type EventPhase = 'start' | 'end';

export interface CallbackEvent {
  type: CBEventType;
  eventId: string;
  phase: EventPhase;
  payload: ClassifiedPayload;
}

export interface CallbackHandler {
  readonly ignoredEvents?: ReadonlySet<CBEventType>;
  /** Must not block: called synchronously from inside the pipeline. */
  onEvent(event: CallbackEvent): void;
}

/**
 * Precedence: a response exposing source nodes wins over a sub-question
 * payload, which wins over a function output. Only the first match is kept.
 */
export function classifyEventPayload(type: CBEventType, raw: RawEventPayload | undefined): ClassifiedPayload {
  if (!raw) {
    return { kind: 'none' };
  }
  if (raw.response !== undefined && typeof raw.response !== 'string' && Array.isArray(raw.response.sourceNodes)) {
    return { kind: 'response', response: raw.response };
  }
  if (type === CBEventType.SUB_QUESTION && raw.subQuestion) {
    return { kind: 'sub_question', pair: raw.subQuestion };
  }
  if (type === CBEventType.FUNCTION_CALL && typeof raw.functionOutput === 'string') {
    return { kind: 'function_output', output: raw.functionOutput };
  }
  return { kind: 'none' };
}

export class CallbackManager {
  private readonly logger = new Logger(CallbackManager.name);

  constructor(private readonly handlers: CallbackHandler[] = []) {}

  onEventStart(type: CBEventType, payload?: RawEventPayload, eventId: string = uuidv4()): string {
    this.dispatch({ type, eventId, phase: 'start', payload: classifyEventPayload(type, payload) });
    return eventId;
  }

  onEventEnd(type: CBEventType, payload: RawEventPayload | undefined, eventId: string): void {
    this.dispatch({ type, eventId, phase: 'end', payload: classifyEventPayload(type, payload) });
  }

  /**
   * Wraps `run` in a start/end pair. The end event is emitted on failure too
   * (carrying the exception) before the error is rethrown.
   */
  async withEvent<T>(
    type: CBEventType,
    startPayload: RawEventPayload | undefined,
    run: (eventId: string) => Promise<T>,
    endPayload: (result: T) => RawEventPayload | undefined = () => undefined,
  ): Promise<T> {
    const eventId = this.onEventStart(type, startPayload);
    let result: T;
    try {
      result = await run(eventId);
    } catch (error) {
      this.onEventEnd(type, { exception: error }, eventId);
      throw error;
    }
    this.onEventEnd(type, endPayload(result), eventId);
    return result;
  }

  private dispatch(event: CallbackEvent): void {
    for (const handler of this.handlers) {
      if (handler.ignoredEvents?.has(event.type)) {
        continue;
      }
      try {
        handler.onEvent(event);
      } catch (error) {
        this.logger.error(`Callback handler failed on ${event.type} ${event.phase}`, error instanceof Error ? error.stack : String(error));
      }
    }
  }
}
