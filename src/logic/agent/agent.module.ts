import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { AgentBuilderService } from './agent-builder.service';

@Module({
  imports: [GeminiModule],
  providers: [AgentBuilderService],
  exports: [AgentBuilderService],
})
export class AgentModule {}
