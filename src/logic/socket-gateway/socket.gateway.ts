import { Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { z } from 'zod';
import { corsOrigins } from '../../config/configuration';
import { ChatService } from '../chat/chat.service';

const chatMessageBodySchema = z.object({
  conversationId: z.string().uuid(),
  userMessage: z.string(),
});

@WebSocketGateway({
  cors: {
    origin: corsOrigins(process.env.CORS_ORIGINS),
    credentials: false,
  },
})
export class ChatGateway implements OnGatewayDisconnect {
  private readonly logger = new Logger(ChatGateway.name);
  private readonly activeTurns: Map<string, Set<AbortController>> = new Map(); // socketId -> running turns

  constructor(private readonly chatService: ChatService) {}

  @SubscribeMessage('conversations.message')
  async handleChatMessage(@ConnectedSocket() client: Socket, @MessageBody() body: unknown): Promise<void> {
    const parsed = chatMessageBodySchema.safeParse(body);
    if (!parsed.success) {
      client.emit('chat.error', { message: `Invalid message: ${parsed.error.issues.map(issue => issue.message).join(', ')}` });
      return;
    }
    const { conversationId, userMessage } = parsed.data;

    const abort = new AbortController();
    const turns = this.activeTurns.get(client.id) ?? new Set<AbortController>();
    turns.add(abort);
    this.activeTurns.set(client.id, turns);

    try {
      for await (const event of this.chatService.streamReply(conversationId, userMessage, abort.signal)) {
        client.emit(event.kind === 'message' ? 'chat.message' : 'chat.sub_process', { conversationId, ...event.payload });
      }
      client.emit('chat.done', { conversationId });
    } catch (error) {
      this.logger.error(
        `Chat turn for ${conversationId} failed`,
        error instanceof Error ? error.stack : String(error),
      );
      client.emit('chat.error', { conversationId, message: error instanceof Error ? error.message : 'Chat failed' });
    } finally {
      turns.delete(abort);
      if (turns.size === 0) {
        this.activeTurns.delete(client.id);
      }
    }
  }

  handleDisconnect(client: Socket) {
    for (const abort of this.activeTurns.get(client.id) ?? []) {
      abort.abort();
    }
    this.activeTurns.delete(client.id);
  }
}
