import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { AgentModule } from '../agent/agent.module';
import { ChatMemoryModule } from '../chat-memory/chat-memory.module';
import { IndexStoreModule } from '../index-store/index-store.module';
import { ToolComposerModule } from '../tool-composer/tool-composer.module';

@Module({
    imports: [
        ChatMemoryModule,
        IndexStoreModule,
        ToolComposerModule,
        AgentModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
