import { Injectable, Logger } from '@nestjs/common';
import { StorageContext } from './storage-context';

export const STORAGE_CONTEXT_TTL_MS = 5 * 60 * 1000;

/**
 * Process-wide single slot for the shared storage context. The slot holds the
 * pending load itself, so concurrent callers inside one TTL window share a
 * single construction. Failed loads are not kept.
 */
@Injectable()
export class StorageContextCache {
  private readonly logger = new Logger(StorageContextCache.name);
  private slot: { context: Promise<StorageContext>; storedAt: number } | null = null;

  async get(load: () => Promise<StorageContext>): Promise<StorageContext> {
    if (this.slot && Date.now() - this.slot.storedAt < STORAGE_CONTEXT_TTL_MS) {
      return this.slot.context;
    }

    this.logger.log('Creating new storage context.');
    const context = load();
    const slot = { context, storedAt: Date.now() };
    this.slot = slot;
    try {
      return await context;
    } catch (error) {
      if (this.slot === slot) {
        this.slot = null;
      }
      throw error;
    }
  }

  invalidate(): void {
    this.slot = null;
  }
}
