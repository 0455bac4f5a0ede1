import { Logger } from '@nestjs/common';
import { MessageChannel } from '../../utils/messageChannel';
import { CallbackEvent, CallbackHandler, CBEventType, ClassifiedPayload } from '../callbacks/callback-manager';
import { DB_DOC_ID_KEY, NodeWithScore, PAGE_LABEL_KEY } from '../documents/types';
import { ChatStreamEvent, Citation, SOURCE_BY_EVENT_TYPE, SubProcessEvent, SubProcessMetadataMap } from './types';

/** Question attached to answers that did not come from a generated sub question. */
export const PLACEHOLDER_QUESTION = 'What are the main business focus areas?';
export const CITATION_TEXT_LENGTH = 200;

/** Nodes without a document id or a numeric page label are skipped. */
export function extractCitations(nodes: NodeWithScore[]): Citation[] {
  const citations: Citation[] = [];
  for (const { node } of nodes) {
    const documentId = node.metadata[DB_DOC_ID_KEY];
    const pageLabel = node.metadata[PAGE_LABEL_KEY];
    if (!documentId || pageLabel === undefined || !/^\d+$/.test(pageLabel)) {
      continue;
    }
    citations.push({
      document_id: documentId,
      page_number: Number.parseInt(pageLabel, 10),
      text: node.text.slice(0, CITATION_TEXT_LENGTH),
    });
  }
  return citations;
}

export function buildMetadataMap(payload: ClassifiedPayload): SubProcessMetadataMap | undefined {
  switch (payload.kind) {
    case 'response': {
      const citations = extractCitations(payload.response.sourceNodes);
      if (citations.length === 0) {
        return undefined;
      }
      return { sub_questions: [{ question: PLACEHOLDER_QUESTION, answer: payload.response.response, citations }] };
    }
    case 'sub_question':
      return {
        sub_question: {
          question: payload.pair.subQ.subQuestion,
          answer: payload.pair.answer,
          citations: extractCitations(payload.pair.sources),
        },
      };
    case 'function_output':
      return { sub_questions: [{ question: PLACEHOLDER_QUESTION, answer: payload.output, citations: [] }] };
    case 'none':
      return undefined;
  }
}

export function toSubProcessEvent(event: CallbackEvent): SubProcessEvent {
  const subProcess: SubProcessEvent = {
    source: SOURCE_BY_EVENT_TYPE[event.type],
    event_id: event.eventId,
    has_ended: event.phase === 'end',
  };
  const metadataMap = buildMetadataMap(event.payload);
  if (metadataMap) {
    subProcess.metadata_map = metadataMap;
  }
  return subProcess;
}

/**
 * Translates pipeline events into sub-process events on a chat channel.
 *
 * `onEvent` only enqueues; a single drain loop sends in arrival order, so the
 * pipeline never waits on a slow consumer. Await `drain()` before closing the
 * channel.
 */
export class ChatCallbackHandler implements CallbackHandler {
  readonly ignoredEvents: ReadonlySet<CBEventType> = new Set([CBEventType.CHUNKING, CBEventType.NODE_PARSING]);

  private readonly logger = new Logger(ChatCallbackHandler.name);
  private readonly queue: CallbackEvent[] = [];
  private draining: Promise<void> | null = null;

  constructor(private readonly channel: MessageChannel<ChatStreamEvent>) {}

  onEvent(event: CallbackEvent): void {
    this.queue.push(event);
    if (!this.draining) {
      this.draining = this.drainQueue();
    }
  }

  async drain(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drainQueue(): Promise<void> {
    for (let event = this.queue.shift(); event; event = this.queue.shift()) {
      await this.dispatch(event);
    }
    this.draining = null;
  }

  private async dispatch(event: CallbackEvent): Promise<void> {
    let payload: SubProcessEvent;
    try {
      payload = toSubProcessEvent(event);
    } catch (error) {
      this.logger.error(
        `Could not translate ${event.type} ${event.phase} event ${event.eventId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return;
    }

    const result = await this.channel.send({ kind: 'sub_process', payload });
    if (result === 'sent') {
      return;
    }
    if (event.phase === 'start') {
      this.logger.debug(`Channel closed, dropping ${event.type} start event ${event.eventId}`);
    } else {
      this.logger.warn(`Received ${event.type} end event ${event.eventId} after the channel closed`);
    }
  }
}
