/**
 * Unit Tests for the Movement Validator
 */

import { Hallway } from '../../src/game/board';
import { Room, Suspect, Weapon } from '../../src/game/cards';
import { disconnectPlayer } from '../../src/game/lobby';
import { movePlayer } from '../../src/game/movement';
import { updatePlayer } from '../../src/game/session';
import { GameErrorKind, SessionState, Standing } from '../../src/game/types';
import { NOW, errorKind, inProgress, lobbyWith } from '../helpers/fixtures';

// a: Miss Scarlet (Hallway2), b: Prof. Plum (Hallway3), c: Mrs. Peacock (Hallway8)
function game(tokens: Partial<Record<Suspect, Room | Hallway>> = {}): SessionState {
  return inProgress(['a', 'b', 'c'], { hands: [[], [], []], tokens });
}

describe('Movement', () => {
  it('should move the acting player to an adjacent room', () => {
    const result = movePlayer(game(), 'a', Room.HALL, NOW);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.from).toBe(Hallway.H2);
    expect(result.value.to).toBe(Room.HALL);
    expect(result.value.state.tokens[Suspect.SCARLET]).toBe(Room.HALL);
    expect(result.value.state.history).toEqual([{ at: NOW, text: 'a (Miss Scarlet) moved from Hallway2 to Hall' }]);
  });

  it('should move from a room into a free hallway', () => {
    const result = movePlayer(game({ [Suspect.SCARLET]: Room.HALL }), 'a', Hallway.H4, NOW);
    expect(result.ok && result.value.state.tokens[Suspect.SCARLET]).toBe(Hallway.H4);
  });

  it('should take a secret passage', () => {
    const result = movePlayer(game({ [Suspect.SCARLET]: Room.STUDY }), 'a', Room.KITCHEN, NOW);
    expect(result.ok && result.value.state.tokens[Suspect.SCARLET]).toBe(Room.KITCHEN);
  });

  it('should let rooms hold several tokens', () => {
    const result = movePlayer(game({ [Suspect.PLUM]: Room.HALL }), 'a', Room.HALL, NOW);
    expect(result.ok).toBe(true);
  });

  it('should reject staying put', () => {
    expect(errorKind(movePlayer(game({ [Suspect.SCARLET]: Room.HALL }), 'a', Room.HALL, NOW))).toBe(
      GameErrorKind.SAME_LOCATION
    );
  });

  it('should reject non-adjacent targets', () => {
    expect(errorKind(movePlayer(game(), 'a', Room.STUDY, NOW))).toBe(GameErrorKind.INVALID_MOVE);
    expect(errorKind(movePlayer(game({ [Suspect.SCARLET]: Room.STUDY }), 'a', Room.HALL, NOW))).toBe(
      GameErrorKind.INVALID_MOVE
    );
  });

  it('should reject a hallway held by another player', () => {
    const state = game({ [Suspect.SCARLET]: Room.STUDY, [Suspect.PLUM]: Hallway.H1 });
    const result = movePlayer(state, 'a', Hallway.H1, NOW);
    expect(result).toEqual({
      ok: false,
      error: { kind: GameErrorKind.HALLWAY_OCCUPIED, message: 'Hallway1 is occupied by b' },
    });
  });

  it('should still block a hallway held by a disconnected player', () => {
    const left = disconnectPlayer(game({ [Suspect.SCARLET]: Room.STUDY, [Suspect.PLUM]: Hallway.H1 }), 'b', NOW);
    if (!left.ok) throw new Error('disconnect failed');
    expect(errorKind(movePlayer(left.value.state, 'a', Hallway.H1, NOW))).toBe(GameErrorKind.HALLWAY_OCCUPIED);
  });

  it('should ignore tokens of characters nobody plays', () => {
    // Mr. Green starts on Hallway11 and is unplayed at a three-player table.
    const result = movePlayer(game({ [Suspect.SCARLET]: Room.CONSERVATORY }), 'a', Hallway.H11, NOW);
    expect(result.ok).toBe(true);
  });

  it('should only let the turn holder move', () => {
    expect(errorKind(movePlayer(game(), 'b', Room.STUDY, NOW))).toBe(GameErrorKind.NOT_YOUR_TURN);
  });

  it('should report turn order before elimination', () => {
    const state = updatePlayer(game(), 'b', (p) => ({ ...p, standing: Standing.ELIMINATED }));
    expect(errorKind(movePlayer(state, 'b', Room.STUDY, NOW))).toBe(GameErrorKind.NOT_YOUR_TURN);
  });

  it('should still refuse an eliminated player holding the turn', () => {
    const state = updatePlayer(game(), 'a', (p) => ({ ...p, standing: Standing.ELIMINATED }));
    expect(errorKind(movePlayer(state, 'a', Room.HALL, NOW))).toBe(GameErrorKind.ELIMINATED);
  });

  it('should report unknown players', () => {
    expect(errorKind(movePlayer(game(), 'zed', Room.HALL, NOW))).toBe(GameErrorKind.PLAYER_NOT_FOUND);
  });

  it('should wait for a pending disprove choice', () => {
    const state = inProgress(['a', 'b', 'c'], {
      hands: [[], [], []],
      pendingDisprove: {
        suggester: 'a',
        disprover: 'b',
        suggestion: { suspect: Suspect.GREEN, weapon: Weapon.KNIFE, room: Room.HALL },
        options: [],
        deadline: NOW,
      },
    });
    expect(errorKind(movePlayer(state, 'a', Room.HALL, NOW))).toBe(GameErrorKind.AWAITING_DISPROVE);
  });

  describe('before the game starts', () => {
    it('should refuse movement by default', () => {
      expect(errorKind(movePlayer(lobbyWith(['a', 'b', 'c']), 'b', Room.STUDY, NOW))).toBe(GameErrorKind.NOT_STARTED);
    });

    it('should allow free movement with legacy lobby movement enabled', () => {
      const lobby = lobbyWith(['a', 'b', 'c']);
      const legacy: SessionState = { ...lobby, settings: { ...lobby.settings, legacyLobbyMovement: true } };
      const result = movePlayer(legacy, 'b', Room.STUDY, NOW);
      expect(result.ok && result.value.state.tokens[Suspect.PLUM]).toBe(Room.STUDY);
    });

    it('should still enforce adjacency with legacy lobby movement', () => {
      const lobby = lobbyWith(['a', 'b', 'c']);
      const legacy: SessionState = { ...lobby, settings: { ...lobby.settings, legacyLobbyMovement: true } };
      expect(errorKind(movePlayer(legacy, 'b', Room.KITCHEN, NOW))).toBe(GameErrorKind.INVALID_MOVE);
    });
  });
});
