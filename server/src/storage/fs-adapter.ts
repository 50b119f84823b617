import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ConversationSchema, type Conversation, type ConversationSummary } from '@relay-agent/shared';
import { byMostRecent, toSummary, type ConversationStore } from './interface.js';

export interface FSStoreConfig {
  type: 'fs';
  root: string;
}

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem conversation store
 * One JSON file per conversation under `<root>/conversations`.
 */
export class FSConversationStore implements ConversationStore {
  private readonly dir: string;

  constructor(config: FSStoreConfig) {
    this.dir = path.join(path.resolve(config.root), 'conversations');
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  private filePath(id: string): string | null {
    return SAFE_ID.test(id) ? path.join(this.dir, `${id}.json`) : null;
  }

  async create(title: string): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = { id: uuidv4(), title, messages: [], createdAt: now, updatedAt: now };
    await this.save(conversation);
    return conversation;
  }

  async get(id: string): Promise<Conversation | null> {
    const file = this.filePath(id);
    if (!file) {
      return null;
    }

    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
    return ConversationSchema.parse(JSON.parse(content));
  }

  async list(): Promise<ConversationSummary[]> {
    const files = (await fs.readdir(this.dir)).filter((file) => file.endsWith('.json'));
    const summaries: ConversationSummary[] = [];

    for (const file of files) {
      const conversation = await this.get(path.basename(file, '.json'));
      if (conversation) {
        summaries.push(toSummary(conversation));
      }
    }

    return summaries.sort(byMostRecent);
  }

  async save(conversation: Conversation): Promise<void> {
    const file = this.filePath(conversation.id);
    if (!file) {
      throw new Error(`Invalid conversation id: ${conversation.id}`);
    }

    // Write then rename so a reader never sees a half-written file
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(conversation, null, 2), 'utf-8');
    await fs.rename(tmp, file);
  }

  async delete(id: string): Promise<boolean> {
    const file = this.filePath(id);
    if (!file) {
      return false;
    }
    try {
      await fs.unlink(file);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }
}
