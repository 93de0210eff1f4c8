/**
 * Unit Tests for the Accusation Resolver
 */

import { Hallway } from '../../src/game/board';
import { Room, Suspect, Weapon } from '../../src/game/cards';
import { isCorrectAccusation, makeAccusation } from '../../src/game/accusation';
import { GameErrorKind, SessionPhase, SessionState, Standing } from '../../src/game/types';
import { CASE_FILE, NOW, errorKind, inProgress } from '../helpers/fixtures';

function accuseWrongly(state: SessionState, identity: string): SessionState {
  const result = makeAccusation(state, identity, Suspect.PLUM, Weapon.ROPE, Room.STUDY, NOW);
  if (!result.ok) throw new Error(result.error.message);
  return result.value.state;
}

describe('Accusation', () => {
  let state: SessionState;

  beforeEach(() => {
    // Case file: Miss Scarlet, Rope, Study
    state = inProgress(['a', 'b', 'c'], { hands: [[], [], []] });
  });

  it('should compare all three parts of the case file', () => {
    expect(isCorrectAccusation(CASE_FILE, Suspect.SCARLET, Weapon.ROPE, Room.STUDY)).toBe(true);
    expect(isCorrectAccusation(CASE_FILE, Suspect.SCARLET, Weapon.ROPE, Room.HALL)).toBe(false);
  });

  it('should end the game with a winner on a correct accusation, from anywhere', () => {
    const result = makeAccusation(state, 'a', Suspect.SCARLET, Weapon.ROPE, Room.STUDY, NOW);
    if (!result.ok) throw new Error(result.error.message);

    expect(result.value.verdict).toEqual({ kind: 'WIN', caseFile: CASE_FILE });
    expect(result.value.state.status).toEqual({
      phase: SessionPhase.ENDED,
      caseFile: CASE_FILE,
      outcome: { kind: 'WINNER', winner: 'a' },
    });
    expect(result.value.state.history.map((h) => h.text)).toEqual([
      'a (Miss Scarlet) solved the case: Miss Scarlet with the Rope in the Study',
    ]);
  });

  it('should eliminate a wrong accuser and pass the turn', () => {
    const result = makeAccusation(state, 'a', Suspect.PLUM, Weapon.ROPE, Room.STUDY, NOW);
    if (!result.ok) throw new Error(result.error.message);

    expect(result.value.verdict.kind).toBe('ELIMINATED');
    expect(result.value.accuser.standing).toBe(Standing.ELIMINATED);
    const next = result.value.state;
    expect(next.players[0].standing).toBe(Standing.ELIMINATED);
    expect(next.status.phase === SessionPhase.IN_PROGRESS && next.status.turnIndex).toBe(1);
    expect(next.history.map((h) => h.text)).toEqual([
      'a (Miss Scarlet) made a wrong accusation and is eliminated',
      "It is now b (Prof. Plum)'s turn",
    ]);
  });

  it('should leave an eliminated player\'s token where it was', () => {
    const next = accuseWrongly(state, 'a');
    expect(next.tokens[Suspect.SCARLET]).toBe(Hallway.H2);
  });

  it('should skip eliminated players when passing the turn', () => {
    const afterA = accuseWrongly(state, 'a');
    const afterB = accuseWrongly(afterA, 'b');
    expect(afterB.status.phase === SessionPhase.IN_PROGRESS && afterB.status.turnIndex).toBe(2);
  });

  it('should end in a tie when everybody is eliminated', () => {
    const afterA = accuseWrongly(state, 'a');
    const afterB = accuseWrongly(afterA, 'b');
    const result = makeAccusation(afterB, 'c', Suspect.PLUM, Weapon.ROPE, Room.STUDY, NOW);
    if (!result.ok) throw new Error(result.error.message);

    expect(result.value.verdict).toEqual({ kind: 'TIE', caseFile: CASE_FILE });
    expect(result.value.state.status).toEqual({
      phase: SessionPhase.ENDED,
      caseFile: CASE_FILE,
      outcome: { kind: 'TIE' },
    });
    expect(result.value.state.history.slice(-2).map((h) => h.text)).toEqual([
      'c (Mrs. Peacock) made a wrong accusation and is eliminated',
      'Every player has been eliminated. The game ends in a tie',
    ]);
  });

  it('should tell an eliminated accuser it is not their turn', () => {
    const afterA = accuseWrongly(state, 'a');
    expect(errorKind(makeAccusation(afterA, 'a', Suspect.SCARLET, Weapon.ROPE, Room.STUDY, NOW))).toBe(
      GameErrorKind.NOT_YOUR_TURN
    );
  });

  it('should refuse accusations out of turn', () => {
    expect(errorKind(makeAccusation(state, 'b', Suspect.SCARLET, Weapon.ROPE, Room.STUDY, NOW))).toBe(
      GameErrorKind.NOT_YOUR_TURN
    );
  });

  it('should refuse everything after the game is over', () => {
    const won = makeAccusation(state, 'a', Suspect.SCARLET, Weapon.ROPE, Room.STUDY, NOW);
    if (!won.ok) throw new Error(won.error.message);
    expect(errorKind(makeAccusation(won.value.state, 'b', Suspect.SCARLET, Weapon.ROPE, Room.STUDY, NOW))).toBe(
      GameErrorKind.GAME_OVER
    );
  });
});
