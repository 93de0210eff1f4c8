/**
 * Unit Tests for the Finished Game Archive
 */

import { Room, Suspect, Weapon } from '../../src/game/cards';
import { FinishedGameRecord } from '../../src/game/types';
import { InMemoryGameArchive } from '../../src/storage/archive';
import { fromFinishedGameDocument, toFinishedGameDocument } from '../../src/storage/mongo.archive';

const RECORD: FinishedGameRecord = {
  gameId: 'game-1',
  outcome: { kind: 'WINNER', winner: 'a' },
  caseFile: { suspect: Suspect.SCARLET, weapon: Weapon.ROPE, room: Room.STUDY },
  players: [
    { identity: 'a', character: Suspect.SCARLET, eliminated: false },
    { identity: 'b', character: Suspect.PLUM, eliminated: true },
  ],
  history: [{ at: 1_000, text: 'a (Miss Scarlet) solved the case: Miss Scarlet with the Rope in the Study' }],
  endedAt: 2_000,
};

describe('InMemoryGameArchive', () => {
  it('should store and find records by game id', async () => {
    const archive = new InMemoryGameArchive();
    await archive.save(RECORD);

    expect(await archive.findByGameId('game-1')).toEqual(RECORD);
    expect(await archive.findByGameId('other')).toBeNull();
    expect(await archive.count()).toBe(1);
  });

  it('should overwrite a record saved twice', async () => {
    const archive = new InMemoryGameArchive();
    await archive.save(RECORD);
    await archive.save({ ...RECORD, endedAt: 3_000 });

    expect(await archive.count()).toBe(1);
    expect((await archive.findByGameId('game-1'))?.endedAt).toBe(3_000);
  });
});

describe('Finished game documents', () => {
  it('should flatten the outcome and convert timestamps to dates', () => {
    const doc = toFinishedGameDocument(RECORD);

    expect(doc.outcome).toBe('WINNER');
    expect(doc.winner).toBe('a');
    expect(doc.endedAt).toEqual(new Date(2_000));
    expect(doc.history[0].at).toEqual(new Date(1_000));
    expect(fromFinishedGameDocument(doc)).toEqual(RECORD);
  });

  it('should store a tie without a winner', () => {
    const doc = toFinishedGameDocument({ ...RECORD, outcome: { kind: 'TIE' } });
    expect(doc.outcome).toBe('TIE');
    expect(doc.winner).toBeNull();
  });

  it('should refuse documents naming unknown cards', () => {
    const doc = toFinishedGameDocument(RECORD);
    expect(fromFinishedGameDocument({ ...doc, caseFile: { ...doc.caseFile, weapon: 'Poison' } })).toBeNull();
  });
});
