/**
 * Finished game archive
 */

import { FinishedGameRecord } from '../game/types';

export interface GameArchive {
  save(record: FinishedGameRecord): Promise<void>;
  findByGameId(gameId: string): Promise<FinishedGameRecord | null>;
  count(): Promise<number>;
}

/**
 * Keeps finished games in process. Used when no database is configured, and in tests.
 */
export class InMemoryGameArchive implements GameArchive {
  private records: Map<string, FinishedGameRecord> = new Map();

  async save(record: FinishedGameRecord): Promise<void> {
    this.records.set(record.gameId, record);
  }

  async findByGameId(gameId: string): Promise<FinishedGameRecord | null> {
    return this.records.get(gameId) ?? null;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
