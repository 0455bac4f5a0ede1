import { Controller, Get, Logger, MessageEvent, Param, ParseUUIDPipe, Query, Sse } from '@nestjs/common';
import { Observable } from 'rxjs';
import { ChatService } from './chat.service';

@Controller('conversations')
export class ChatController {
    private readonly logger = new Logger(ChatController.name);

    constructor(private readonly chatService: ChatService) {}

    @Get(':conversationId')
    async getConversation(@Param('conversationId', ParseUUIDPipe) conversationId: string) {
        return this.chatService.getConversation(conversationId);
    }

    /**
     * Server-sent events: `message` carries the answer so far, `sub_process`
     * a pipeline step, `error` a failed turn. Closing the connection cancels
     * the turn.
     */
    @Sse(':conversationId/message')
    message(
        @Param('conversationId', ParseUUIDPipe) conversationId: string,
        @Query('user_message') userMessage = '',
    ): Observable<MessageEvent> {
        return new Observable<MessageEvent>(subscriber => {
            const abort = new AbortController();
            const forward = async () => {
                for await (const event of this.chatService.streamReply(conversationId, userMessage, abort.signal)) {
                    subscriber.next({ type: event.kind, data: event.payload });
                }
            };
            void forward()
                .catch((error: unknown) => {
                    this.logger.error(
                        `Streaming reply for ${conversationId} failed`,
                        error instanceof Error ? error.stack : String(error),
                    );
                    subscriber.next({
                        type: 'error',
                        data: { message: error instanceof Error ? error.message : 'Chat failed' },
                    });
                })
                .finally(() => subscriber.complete());
            return () => abort.abort();
        });
    }
}
