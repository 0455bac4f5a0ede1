import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { MessageStatus } from '../../entities';
import { MessageChannel } from '../../utils/messageChannel';
import { AgentBuilderService } from '../agent/agent-builder.service';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { FinancialsService } from '../financials/financials.service';
import { GeminiService } from '../gemini/gemini.service';
import { ModelStreamChunk } from '../gemini/types';
import { IndexStoreService } from '../index-store/index-store.service';
import { FakeGemini } from '../testing/fakes';
import { ToolComposerService } from '../tool-composer/tool-composer.service';
import { ChatService, FALLBACK_ANSWER } from './chat.service';
import { ChatStreamEvent, MessageSubProcessSource, SubProcessEvent } from './types';

const conversation = { documents: [], messages: [] };
const text = (value: string): ModelStreamChunk => ({ kind: 'text', text: value });

async function collect(channel: MessageChannel<ChatStreamEvent>): Promise<ChatStreamEvent[]> {
  const events: ChatStreamEvent[] = [];
  for await (const event of channel) {
    events.push(event);
  }
  return events;
}

const messagesOf = (events: ChatStreamEvent[]) =>
  events.flatMap(event => (event.kind === 'message' ? [event.payload.content] : []));

describe('ChatService', () => {
  let gemini: FakeGemini;
  let loadOrBuild: jest.Mock;
  let completeAssistantMessage: jest.Mock;

  async function createService(steps: Array<ModelStreamChunk[] | Error>): Promise<ChatService> {
    gemini = new FakeGemini(steps);
    loadOrBuild = jest.fn().mockResolvedValue(new Map());
    completeAssistantMessage = jest.fn().mockResolvedValue(undefined);
    const config: Record<string, unknown> = { STORAGE_NAMESPACE: 'test-ns', VERBOSE: false };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        ToolComposerService,
        AgentBuilderService,
        { provide: GeminiService, useValue: gemini },
        { provide: FinancialsService, useValue: { getStatementsForFiling: async () => [] } },
        { provide: IndexStoreService, useValue: { loadOrBuild } },
        { provide: ConfigService, useValue: { get: (key: string) => config[key] } },
        {
          provide: ChatMemoryService,
          useValue: {
            getConversation: jest.fn().mockResolvedValue({ id: 'conv-1', ...conversation }),
            addUserMessage: jest.fn().mockResolvedValue({ id: 'user-1' }),
            createPendingAssistantMessage: jest.fn().mockResolvedValue({ id: 'assistant-1' }),
            completeAssistantMessage,
          },
        },
      ],
    }).compile();

    return module.get<ChatService>(ChatService);
  }

  describe('handleChatMessage', () => {
    it('announces the engine, then streams growing snapshots of the answer', async () => {
      const service = await createService([[text('Rev'), text('enue'), text(' grew.')]]);
      const channel = new MessageChannel<ChatStreamEvent>();

      const [events] = await Promise.all([collect(channel), service.handleChatMessage(conversation, 'Revenue?', channel)]);

      expect(events[0]).toEqual({
        kind: 'sub_process',
        payload: { source: MessageSubProcessSource.CONSTRUCTED_QUERY_ENGINE, event_id: expect.any(String), has_ended: true },
      });
      expect(messagesOf(events)).toEqual(['Rev', 'Revenue', 'Revenue grew.']);
      expect(channel.closed).toBe(true);
    });

    it('sends the templated message to the model with both top-level tools', async () => {
      const service = await createService([[text('ok')]]);
      const channel = new MessageChannel<ChatStreamEvent>();

      await Promise.all([collect(channel), service.handleChatMessage(conversation, 'Revenue?', channel)]);

      expect(loadOrBuild).toHaveBeenCalledWith([], 'test-ns', expect.anything());
      const [request] = gemini.chatRequests;
      expect(request.turns).toEqual([
        { kind: 'message', role: 'user', content: 'Remember - if I have asked a relevant financial question, use your tools.\n\nRevenue?' },
      ]);
      expect(request.tools.map(tool => tool.name)).toEqual(['qualitative_question_engine', 'quantitative_question_engine']);
      expect(request.system).toContain('No documents selected.');
    });

    it('sends the fallback answer once when nothing was generated', async () => {
      const service = await createService([[]]);
      const channel = new MessageChannel<ChatStreamEvent>();

      const [events] = await Promise.all([collect(channel), service.handleChatMessage(conversation, '   ', channel)]);

      expect(messagesOf(events)).toEqual([FALLBACK_ANSWER]);
    });

    it('returns cleanly when the consumer closes the channel mid-stream', async () => {
      const service = await createService([[text('a'), text('b'), text('c')]]);
      const channel = new MessageChannel<ChatStreamEvent>();
      const received: string[] = [];

      const turn = service.handleChatMessage(conversation, 'Hi', channel);
      for await (const event of channel) {
        if (event.kind === 'message') {
          received.push(event.payload.content);
          break;
        }
      }

      await expect(turn).resolves.toBeUndefined();
      expect(received).toEqual(['a']);
      expect(channel.closed).toBe(true);
    });

    it('closes the channel and rethrows when the indices cannot be built', async () => {
      const service = await createService([]);
      loadOrBuild.mockRejectedValue(new Error('document fetch failed'));
      const channel = new MessageChannel<ChatStreamEvent>();

      await expect(service.handleChatMessage(conversation, 'Hi', channel)).rejects.toThrow('document fetch failed');
      expect(channel.closed).toBe(true);
    });
  });

  describe('streamReply', () => {
    it('stores the final answer and the sub-processes seen', async () => {
      const service = await createService([[text('Hello'), text('!')]]);

      const events: ChatStreamEvent[] = [];
      for await (const event of service.streamReply('conv-1', 'Hi')) {
        events.push(event);
      }

      expect(messagesOf(events)).toEqual(['Hello', 'Hello!']);
      const subProcesses = events.flatMap(event => (event.kind === 'sub_process' ? [event.payload] : []));
      expect(completeAssistantMessage).toHaveBeenCalledWith('assistant-1', 'Hello!', MessageStatus.SUCCESS, subProcesses);
      expect(subProcesses.map((event: SubProcessEvent) => event.source)).toContain(
        MessageSubProcessSource.CONSTRUCTED_QUERY_ENGINE,
      );
    });

    it('marks the answer as failed and rethrows when the turn fails', async () => {
      const service = await createService([new Error('model unavailable')]);

      const consume = async () => {
        for await (const event of service.streamReply('conv-1', 'Hi')) {
          expect(event).toBeDefined();
        }
      };

      await expect(consume()).rejects.toThrow('model unavailable');
      expect(completeAssistantMessage).toHaveBeenCalledWith('assistant-1', '', MessageStatus.ERROR, expect.any(Array));
    });
  });
});
