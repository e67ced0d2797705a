import { config } from '@/config/env';
import { Stores } from '@/repositories/types';
import { createMemoryStores, MemoryStores } from '@/repositories/memory.repository';
import { createMongoStores } from '@/repositories/mongo.repository';

const memoryStores: MemoryStores | null = config.storageDriver === 'memory' ? createMemoryStores() : null;

export const stores: Stores = memoryStores ?? createMongoStores();

/**
 * Empties the in-process stores. No-op under the mongo driver.
 */
export const clearMemoryStores = (): void => {
  memoryStores?.clear();
};
