import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { MessageRole, MessageStatus } from '../../entities';
import { CallbackManager } from '../callbacks/callback-manager';
import { GeminiService } from '../gemini/gemini.service';
import { FakeGemini, secDocument } from '../testing/fakes';
import { AgentBuilderService, formatCurrentDate } from './agent-builder.service';

describe('AgentBuilderService', () => {
  let service: AgentBuilderService;
  const now = new Date(Date.UTC(2024, 2, 5, 23, 30));

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AgentBuilderService,
        { provide: GeminiService, useValue: new FakeGemini() },
        { provide: ConfigService, useValue: { get: () => false } },
      ],
    }).compile();

    service = module.get<AgentBuilderService>(AgentBuilderService);
  });

  it('says no documents are selected for an empty conversation', () => {
    const agent = service.build([], { documents: [], messages: [] }, new CallbackManager(), now);

    expect(agent.options.systemPrompt).toContain('discuss with you:\nNo documents selected.\n\nThe current date is: 2024-03-05');
    expect(agent.tools).toEqual([]);
  });

  it('lists document titles and carries the successful history', () => {
    const agent = service.build(
      [],
      {
        documents: [secDocument('doc-acme', 'ACME', 2023, 1)],
        messages: [
          { role: MessageRole.USER, content: 'Hi', status: MessageStatus.SUCCESS, createdAt: new Date(1) },
          { role: MessageRole.ASSISTANT, content: '', status: MessageStatus.ERROR, createdAt: new Date(2) },
        ],
      },
      new CallbackManager(),
      now,
    );

    expect(agent.options.systemPrompt).toContain('- ACME Inc (ACME) 10-Q (2023 Q1)');
    expect(agent.options.chatHistory).toEqual([{ role: 'user', content: 'Hi' }]);
    expect(agent.options.maxFunctionCalls).toBe(3);
  });

  it('formats the date in UTC', () => {
    expect(formatCurrentDate(new Date(Date.UTC(2023, 11, 31, 23, 59)))).toBe('2023-12-31');
  });
});
