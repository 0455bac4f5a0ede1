import { Module } from '@nestjs/common';
import { FinancialsModule } from '../financials/financials.module';
import { GeminiModule } from '../gemini/gemini.module';
import { ToolComposerService } from './tool-composer.service';

@Module({
  imports: [GeminiModule, FinancialsModule],
  providers: [ToolComposerService],
  exports: [ToolComposerService],
})
export class ToolComposerModule {}
