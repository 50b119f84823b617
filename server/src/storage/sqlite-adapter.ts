import Database from 'better-sqlite3';
import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { MessageSchema, type Conversation, type ConversationSummary } from '@relay-agent/shared';
import type { ConversationStore } from './interface.js';

export interface SQLiteStoreConfig {
  type: 'sqlite';
  root: string;
  database?: string;
}

const ConversationRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  messages: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const SummaryRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  message_count: z.number().int(),
});

const MessagesJsonSchema = z.array(MessageSchema);

/**
 * SQLite conversation store
 * One row per conversation; the message list is stored as JSON.
 */
export class SQLiteConversationStore implements ConversationStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly root: string;

  constructor(config: SQLiteStoreConfig) {
    this.root = config.root;
    this.dbPath = config.database || path.join(config.root, 'conversations.db');
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    if (this.dbPath !== ':memory:') {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        messages TEXT NOT NULL,
        message_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_updated ON conversations(updated_at);
    `);
    this.db = db;
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new Error(`SQLite store at ${this.root} is not initialized`);
    }
    return this.db;
  }

  async create(title: string): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = {
      id: uuidv4(),
      title,
      messages: [],
      createdAt: now,
      updatedAt: now,
    };
    await this.save(conversation);
    return conversation;
  }

  async get(id: string): Promise<Conversation | null> {
    const row = this.getDb()
      .prepare('SELECT id, title, messages, created_at, updated_at FROM conversations WHERE id = ?')
      .get(id);
    if (row === undefined) {
      return null;
    }

    const parsed = ConversationRowSchema.parse(row);
    return {
      id: parsed.id,
      title: parsed.title,
      messages: MessagesJsonSchema.parse(JSON.parse(parsed.messages)),
      createdAt: parsed.created_at,
      updatedAt: parsed.updated_at,
    };
  }

  async list(): Promise<ConversationSummary[]> {
    const rows = this.getDb()
      .prepare(
        'SELECT id, title, created_at, updated_at, message_count FROM conversations ORDER BY updated_at DESC, id ASC',
      )
      .all();

    return rows.map((row) => {
      const parsed = SummaryRowSchema.parse(row);
      return {
        id: parsed.id,
        title: parsed.title,
        createdAt: parsed.created_at,
        updatedAt: parsed.updated_at,
        messageCount: parsed.message_count,
      };
    });
  }

  async save(conversation: Conversation): Promise<void> {
    this.getDb()
      .prepare(
        `INSERT INTO conversations (id, title, messages, message_count, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           title = excluded.title,
           messages = excluded.messages,
           message_count = excluded.message_count,
           updated_at = excluded.updated_at`,
      )
      .run(
        conversation.id,
        conversation.title,
        JSON.stringify(conversation.messages),
        conversation.messages.length,
        conversation.createdAt,
        conversation.updatedAt,
      );
  }

  async delete(id: string): Promise<boolean> {
    const result = this.getDb().prepare('DELETE FROM conversations WHERE id = ?').run(id);
    return result.changes > 0;
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
