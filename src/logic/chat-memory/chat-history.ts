import { Message, MessageRole, MessageStatus } from '../../entities/message.entity';
import { ChatMessage } from '../gemini/types';

export type HistorySource = Pick<Message, 'role' | 'content' | 'status' | 'createdAt'>;

/**
 * The transcript an agent is rebuilt from: successful, non-blank messages in
 * creation order (stable for equal timestamps), every non-assistant role
 * sent as the user.
 */
export function getChatHistory(messages: readonly HistorySource[]): ChatMessage[] {
  return messages
    .filter(message => message.content.trim() !== '' && message.status === MessageStatus.SUCCESS)
    .map((message, position) => ({ message, position }))
    .sort((a, b) => a.message.createdAt.getTime() - b.message.createdAt.getTime() || a.position - b.position)
    .map(({ message }): ChatMessage => ({
      role: message.role === MessageRole.ASSISTANT ? 'assistant' : 'user',
      content: message.content,
    }));
}
