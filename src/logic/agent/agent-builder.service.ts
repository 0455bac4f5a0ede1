import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';
import { CallbackManager } from '../callbacks/callback-manager';
import { getChatHistory, HistorySource } from '../chat-memory/chat-history';
import { buildDocTitles } from '../documents/document-metadata';
import { DocumentRef } from '../documents/types';
import { GeminiService } from '../gemini/gemini.service';
import { QueryEngineTool } from '../query-engines/types';
import { DEFAULT_MAX_FUNCTION_CALLS, FilingsAgent } from './filings-agent';
import { SYSTEM_MESSAGE } from './prompts';

export interface AgentConversation {
  documents: DocumentRef[];
  messages: HistorySource[];
}

/** UTC calendar date as YYYY-MM-DD. */
export function formatCurrentDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

@Injectable()
export class AgentBuilderService {
  private readonly logger = new Logger(AgentBuilderService.name);

  constructor(
    private readonly geminiService: GeminiService,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  build(
    tools: QueryEngineTool[],
    conversation: AgentConversation,
    callbacks: CallbackManager,
    now: Date = new Date(),
  ): FilingsAgent {
    const chatHistory = getChatHistory(conversation.messages);
    this.logger.debug(`Chat history: ${chatHistory.length} messages`);

    const agent = new FilingsAgent(this.geminiService, tools, callbacks, {
      systemPrompt: SYSTEM_MESSAGE(buildDocTitles(conversation.documents), formatCurrentDate(now)),
      chatHistory,
      maxFunctionCalls: DEFAULT_MAX_FUNCTION_CALLS,
      temperature: 0,
      verbose: this.configService.get('VERBOSE', { infer: true }),
    });
    this.logger.debug(`Chat engine created with ${tools.length} tools`);
    return agent;
  }
}
