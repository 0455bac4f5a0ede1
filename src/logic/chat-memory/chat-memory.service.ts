import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Conversation, Message, MessageRole, MessageStatus, MessageSubProcess } from '../../entities';
import { SubProcessEvent } from '../chat/types';

@Injectable()
export class ChatMemoryService {
  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepository: Repository<Conversation>,
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
    @InjectRepository(MessageSubProcess)
    private readonly subProcessRepository: Repository<MessageSubProcess>,
  ) { }

  /** Conversation with its documents and full message list. */
  async getConversation(conversationId: string): Promise<Conversation> {
    const conversation = await this.conversationRepository.findOne({
      where: { id: conversationId },
      relations: { documents: true, messages: true },
      order: { messages: { createdAt: 'ASC' } },
    });
    if (!conversation) {
      throw new NotFoundException(`Conversation ${conversationId} not found`);
    }
    return conversation;
  }

  async addUserMessage(conversationId: string, content: string): Promise<Message> {
    return this.messageRepository.save(
      this.messageRepository.create({
        conversationId,
        role: MessageRole.USER,
        content,
        status: MessageStatus.SUCCESS,
      }),
    );
  }

  async createPendingAssistantMessage(conversationId: string): Promise<Message> {
    return this.messageRepository.save(
      this.messageRepository.create({
        conversationId,
        role: MessageRole.ASSISTANT,
        content: '',
        status: MessageStatus.PENDING,
      }),
    );
  }

  /**
   * Stores the final assistant text and status, plus one row per sub-process
   * event id holding its latest state.
   */
  async completeAssistantMessage(
    messageId: string,
    content: string,
    status: MessageStatus.SUCCESS | MessageStatus.ERROR,
    subProcesses: SubProcessEvent[],
  ): Promise<void> {
    await this.messageRepository.update({ id: messageId }, { content, status });

    const latestByEventId = new Map<string, SubProcessEvent>();
    for (const event of subProcesses) {
      const previous = latestByEventId.get(event.event_id);
      latestByEventId.set(event.event_id, {
        ...event,
        has_ended: event.has_ended || (previous?.has_ended ?? false),
        metadata_map: event.metadata_map ?? previous?.metadata_map,
      });
    }
    if (latestByEventId.size === 0) {
      return;
    }
    await this.subProcessRepository.save(
      [...latestByEventId.values()].map(event =>
        this.subProcessRepository.create({
          messageId,
          source: event.source,
          eventId: event.event_id,
          hasEnded: event.has_ended,
          metadataMap: event.metadata_map ?? null,
        }),
      ),
    );
  }
}
