import type { Low } from 'lowdb';
import { JSONFilePreset } from 'lowdb/node';
import { dirname } from 'path';
import { mkdir } from 'fs/promises';
import type { ConversationLogStore, ConversationTurn } from '../types/engine';

export interface LoggedTurn {
  id: string;
  userText: string;
  assistantText: string;
  timestamp: string;
}

export interface ConversationLogData {
  turns: LoggedTurn[];
}

export type ConversationLogDb = Low<ConversationLogData>;

/**
 * Append-only JSON log of completed exchanges. The engine writes to it but
 * never reads it back into ConversationMemory.
 */
export class ConversationLog implements ConversationLogStore {
  private db: ConversationLogDb | null = null;
  private opening: Promise<ConversationLogDb> | null = null;
  private writes: Promise<void> = Promise.resolve();
  private sequence = 0;

  constructor(
    private readonly open: () => Promise<ConversationLogDb>,
    private readonly maxTurns: number = 100
  ) {}

  static atPath(dbPath: string, maxTurns?: number): ConversationLog {
    return new ConversationLog(async () => {
      await mkdir(dirname(dbPath), { recursive: true });
      const db = await JSONFilePreset<ConversationLogData>(dbPath, { turns: [] });
      console.log('[ConversationLog] Database initialized:', dbPath);
      return db;
    }, maxTurns);
  }

  appendTurn(turn: ConversationTurn): Promise<void> {
    // Serialize writes so lowdb never interleaves two of them
    const write = this.writes.then(() => this.write(turn));
    this.writes = write.catch(() => undefined);
    return write;
  }

  async getAll(): Promise<LoggedTurn[]> {
    const database = await this.getDb();
    return [...database.data.turns];
  }

  private async write(turn: ConversationTurn) {
    const database = await this.getDb();

    database.data.turns.push({
      id: `turn-${turn.timestamp}-${++this.sequence}`,
      userText: turn.userText,
      assistantText: turn.assistantText,
      timestamp: new Date(turn.timestamp).toISOString()
    });

    // Keep only the last maxTurns
    if (database.data.turns.length > this.maxTurns) {
      database.data.turns = database.data.turns.slice(-this.maxTurns);
    }

    await database.write();
  }

  private async getDb(): Promise<ConversationLogDb> {
    if (this.db) return this.db;
    if (!this.opening) {
      this.opening = this.open().then(
        (db) => {
          this.db = db;
          return db;
        },
        (error: unknown) => {
          this.opening = null;
          console.error('[ConversationLog] Failed to initialize database:', error);
          throw error;
        }
      );
    }
    return this.opening;
  }
}
