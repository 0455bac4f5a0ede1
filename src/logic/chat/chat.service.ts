import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { Environment } from '../../config/configuration';
import { MessageStatus } from '../../entities';
import { MessageChannel } from '../../utils/messageChannel';
import { AgentBuilderService, AgentConversation } from '../agent/agent-builder.service';
import { FilingsAgent } from '../agent/filings-agent';
import { USER_MESSAGE_TEMPLATE } from '../agent/prompts';
import { CallbackManager } from '../callbacks/callback-manager';
import { ChatMemoryService } from '../chat-memory/chat-memory.service';
import { IndexStoreService } from '../index-store/index-store.service';
import { ToolComposerService } from '../tool-composer/tool-composer.service';
import { ChatCallbackHandler } from './chat-callback.handler';
import { ChatStreamEvent, MessageSubProcessSource, SubProcessEvent } from './types';

export const FALLBACK_ANSWER = "Sorry, I either wasn't able to understand your question or I don't have an answer for it.";

@Injectable()
export class ChatService {
    private readonly logger = new Logger(ChatService.name);

    constructor(
        private readonly chatMemoryService: ChatMemoryService,
        private readonly indexStoreService: IndexStoreService,
        private readonly toolComposerService: ToolComposerService,
        private readonly agentBuilderService: AgentBuilderService,
        private readonly configService: ConfigService<Environment, true>,
    ) {}

    /**
     * Answers one user message, streaming snapshots of the answer and
     * sub-process events to `channel`. Returns once generation is done or the
     * consumer closed the channel; the channel is always closed on return.
     */
    async handleChatMessage(
        conversation: AgentConversation,
        userMessage: string,
        channel: MessageChannel<ChatStreamEvent>,
    ): Promise<void> {
        const handler = new ChatCallbackHandler(channel);
        const callbacks = new CallbackManager([handler]);
        try {
            const agent = await this.buildChatEngine(conversation, callbacks);
            await channel.send({
                kind: 'sub_process',
                payload: {
                    source: MessageSubProcessSource.CONSTRUCTED_QUERY_ENGINE,
                    event_id: uuidv4(),
                    has_ended: true,
                },
            });

            let content = '';
            for await (const token of agent.streamChat(USER_MESSAGE_TEMPLATE(userMessage))) {
                content += token;
                if ((await channel.send({ kind: 'message', payload: { content } })) === 'closed') {
                    this.logger.debug('Channel closed by the consumer, stopping generation');
                    return;
                }
            }
            if (!content.trim()) {
                await channel.send({ kind: 'message', payload: { content: FALLBACK_ANSWER } });
            }
        } finally {
            await handler.drain();
            channel.close();
        }
    }

    /**
     * Stores the user message, answers it and yields every event for the
     * transport. The assistant message is stored with the last snapshot and
     * the sub-processes seen, as ERROR when the turn failed. Aborting `signal`
     * closes the channel, which stops generation at its next send.
     */
    async *streamReply(conversationId: string, userMessage: string, signal?: AbortSignal): AsyncGenerator<ChatStreamEvent> {
        const conversation = await this.chatMemoryService.getConversation(conversationId);
        await this.chatMemoryService.addUserMessage(conversationId, userMessage);
        const assistantMessage = await this.chatMemoryService.createPendingAssistantMessage(conversationId);

        const channel = new MessageChannel<ChatStreamEvent>();
        signal?.addEventListener('abort', () => channel.cancel(), { once: true });
        if (signal?.aborted) {
            channel.cancel();
        }
        const turn = this.handleChatMessage(conversation, userMessage, channel).then(
            () => null,
            (error: unknown) => ({ error }),
        );

        const subProcesses: SubProcessEvent[] = [];
        let content = '';
        let outcome: { error: unknown } | null = null;
        try {
            for await (const event of channel) {
                if (event.kind === 'message') {
                    content = event.payload.content;
                } else {
                    subProcesses.push(event.payload);
                }
                yield event;
            }
        } finally {
            channel.cancel();
            outcome = await turn;
            if (outcome) {
                this.logger.error(
                    `Chat turn failed for conversation ${conversationId}`,
                    outcome.error instanceof Error ? outcome.error.stack : String(outcome.error),
                );
            }
            await this.chatMemoryService.completeAssistantMessage(
                assistantMessage.id,
                content,
                outcome ? MessageStatus.ERROR : MessageStatus.SUCCESS,
                subProcesses,
            );
        }
        if (outcome) {
            throw outcome.error;
        }
    }

    getConversation(conversationId: string) {
        return this.chatMemoryService.getConversation(conversationId);
    }

    private async buildChatEngine(conversation: AgentConversation, callbacks: CallbackManager): Promise<FilingsAgent> {
        const namespace = this.configService.get('STORAGE_NAMESPACE', { infer: true });
        const docIdToIndex = await this.indexStoreService.loadOrBuild(conversation.documents, namespace, callbacks);
        const { topLevelTools } = this.toolComposerService.buildTools(docIdToIndex, conversation.documents, callbacks);
        return this.agentBuilderService.build(topLevelTools, conversation, callbacks);
    }
}
