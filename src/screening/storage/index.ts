export type { ScreeningStore } from './interface';
export { MemoryScreeningStore } from './memoryStore';
export { SqliteScreeningStore } from './sqliteStore';
export type { SqliteScreeningStoreOptions } from './sqliteStore';
