import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatMemoryService } from './chat-memory.service';
import { Conversation, Message, MessageSubProcess } from '../../entities';

@Module({
    imports: [TypeOrmModule.forFeature([Conversation, Message, MessageSubProcess])],
    exports: [ChatMemoryService],
    providers: [ChatMemoryService],
})
export class ChatMemoryModule {}
