import { FSConversationStore } from './fs-adapter.js';
import { SQLiteConversationStore } from './sqlite-adapter.js';
import type { ConversationStore } from './interface.js';

export type { ConversationStore } from './interface.js';
export { toSummary, byMostRecent } from './interface.js';
export { FSConversationStore } from './fs-adapter.js';
export { SQLiteConversationStore } from './sqlite-adapter.js';

export interface StorageConfig {
  type: 'sqlite' | 'fs';
  root: string;
  database?: string;
}

function buildStore(config: StorageConfig): ConversationStore {
  switch (config.type) {
    case 'sqlite':
      return new SQLiteConversationStore({ type: 'sqlite', root: config.root, database: config.database });
    case 'fs':
      return new FSConversationStore({ type: 'fs', root: config.root });
  }
}

/**
 * Create and initialize the configured conversation store.
 */
export async function createConversationStore(config: StorageConfig): Promise<ConversationStore> {
  const store = buildStore(config);
  await store.initialize();
  return store;
}
