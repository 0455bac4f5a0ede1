import { Module } from '@nestjs/common';
import { DocumentsModule } from '../documents/documents.module';
import { ElasticModule } from '../elastic/elastic.module';
import { GeminiModule } from '../gemini/gemini.module';
import { ElasticStorageService } from './elastic-storage.service';
import { IndexStoreService } from './index-store.service';
import { StorageContextCache } from './storage-context.cache';

@Module({
  imports: [ElasticModule, GeminiModule, DocumentsModule],
  providers: [ElasticStorageService, StorageContextCache, IndexStoreService],
  exports: [IndexStoreService, StorageContextCache],
})
export class IndexStoreModule {}
