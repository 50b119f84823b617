import type { Conversation, ConversationSummary } from '@relay-agent/shared';

/**
 * Conversation store interface
 * All storage adapters must implement this interface
 */
export interface ConversationStore {
  initialize(): Promise<void>;

  /**
   * Create and persist an empty conversation.
   */
  create(title: string): Promise<Conversation>;

  get(id: string): Promise<Conversation | null>;

  /**
   * Summaries, most recently updated first.
   */
  list(): Promise<ConversationSummary[]>;

  /**
   * Insert or replace the whole conversation.
   */
  save(conversation: Conversation): Promise<void>;

  /**
   * Returns false when there was nothing to delete.
   */
  delete(id: string): Promise<boolean>;

  close(): Promise<void>;
}

export function toSummary(conversation: Conversation): ConversationSummary {
  return {
    id: conversation.id,
    title: conversation.title,
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt,
    messageCount: conversation.messages.length,
  };
}

/**
 * Newest `updatedAt` first; ISO-8601 strings compare in time order.
 */
export function byMostRecent(a: ConversationSummary, b: ConversationSummary): number {
  if (a.updatedAt === b.updatedAt) {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  }
  return a.updatedAt < b.updatedAt ? 1 : -1;
}
