/**
 * MongoDB archive of finished games
 */

import mongoose, { Schema } from 'mongoose';
import { CaseFile, Room, Suspect, Weapon } from '../game/cards';
import { FinishedGameRecord, GameOutcome } from '../game/types';
import { storageLogger } from '../utils/logger';
import { GameArchive } from './archive';

export interface FinishedGameDocument {
  gameId: string;
  outcome: 'WINNER' | 'TIE';
  winner: string | null;
  caseFile: { suspect: string; weapon: string; room: string };
  players: { identity: string; character: string; eliminated: boolean }[];
  history: { at: Date; text: string }[];
  endedAt: Date;
}

const playerSchema = new Schema(
  {
    identity: { type: String, required: true },
    character: { type: String, required: true },
    eliminated: { type: Boolean, required: true },
  },
  { _id: false }
);

const historySchema = new Schema(
  {
    at: { type: Date, required: true },
    text: { type: String, required: true },
  },
  { _id: false }
);

const finishedGameSchema = new Schema<FinishedGameDocument>({
  gameId: { type: String, required: true, unique: true, index: true },
  outcome: { type: String, enum: ['WINNER', 'TIE'], required: true },
  winner: { type: String, default: null },
  caseFile: {
    suspect: { type: String, required: true },
    weapon: { type: String, required: true },
    room: { type: String, required: true },
  },
  players: [playerSchema],
  history: [historySchema],
  endedAt: { type: Date, default: Date.now },
});

export const FinishedGame = mongoose.model<FinishedGameDocument>('FinishedGame', finishedGameSchema);

export function toFinishedGameDocument(record: FinishedGameRecord): FinishedGameDocument {
  return {
    gameId: record.gameId,
    outcome: record.outcome.kind,
    winner: record.outcome.kind === 'WINNER' ? record.outcome.winner : null,
    caseFile: { ...record.caseFile },
    players: record.players.map((p) => ({ ...p })),
    history: record.history.map((entry) => ({ at: new Date(entry.at), text: entry.text })),
    endedAt: new Date(record.endedAt),
  };
}

function isEnumValue<T extends string>(values: Record<string, T>, value: string): value is T {
  const known: string[] = Object.values(values);
  return known.includes(value);
}

/**
 * Map a stored document back to a record. Null when it names a card this
 * build does not know.
 */
export function fromFinishedGameDocument(doc: FinishedGameDocument): FinishedGameRecord | null {
  const { suspect, weapon, room } = doc.caseFile;
  if (!isEnumValue(Suspect, suspect) || !isEnumValue(Weapon, weapon) || !isEnumValue(Room, room)) {
    return null;
  }
  const caseFile: CaseFile = { suspect, weapon, room };

  const players: FinishedGameRecord['players'] = [];
  for (const p of doc.players) {
    if (!isEnumValue(Suspect, p.character)) return null;
    players.push({ identity: p.identity, character: p.character, eliminated: p.eliminated });
  }

  const outcome: GameOutcome =
    doc.outcome === 'WINNER' && doc.winner !== null ? { kind: 'WINNER', winner: doc.winner } : { kind: 'TIE' };

  return {
    gameId: doc.gameId,
    outcome,
    caseFile,
    players,
    history: doc.history.map((entry) => ({ at: entry.at.getTime(), text: entry.text })),
    endedAt: doc.endedAt.getTime(),
  };
}

export class MongoGameArchive implements GameArchive {
  async save(record: FinishedGameRecord): Promise<void> {
    const doc = toFinishedGameDocument(record);
    await FinishedGame.updateOne({ gameId: doc.gameId }, { $set: doc }, { upsert: true });
    storageLogger.info({ gameId: doc.gameId, outcome: doc.outcome }, 'Finished game archived');
  }

  async findByGameId(gameId: string): Promise<FinishedGameRecord | null> {
    const doc = await FinishedGame.findOne({ gameId }).lean<FinishedGameDocument>().exec();
    return doc ? fromFinishedGameDocument(doc) : null;
  }

  async count(): Promise<number> {
    return FinishedGame.countDocuments().exec();
  }
}
