import { Module } from '@nestjs/common';
import { FinancialsService } from './financials.service';

@Module({
  providers: [FinancialsService],
  exports: [FinancialsService],
})
export class FinancialsModule {}
