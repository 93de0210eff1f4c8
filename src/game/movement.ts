/**
 * Movement Validator
 */

import { BoardLocation, areAdjacent, isHallway } from './board';
import { appendHistory, describePlayer, findPlayer, locationOf, requireTurn } from './session';
import { GameErrorKind, RuleResult, SessionPhase, SessionPlayer, SessionState, violation } from './types';

export interface MoveOutcome {
  state: SessionState;
  player: SessionPlayer;
  from: BoardLocation;
  to: BoardLocation;
}

/**
 * Hallways hold one token at a time. Only tokens of seated players count;
 * an unplayed character's token never blocks a hallway.
 */
export function hallwayOccupant(
  state: SessionState,
  hallway: BoardLocation,
  except: string
): SessionPlayer | undefined {
  if (!isHallway(hallway)) return undefined;
  return state.players.find((p) => p.identity !== except && locationOf(state, p) === hallway);
}

function actingPlayer(state: SessionState, identity: string): RuleResult<SessionPlayer> {
  // Deprecated free movement before start; turn rules do not apply.
  if (state.status.phase === SessionPhase.LOBBY && state.settings.legacyLobbyMovement) {
    const player = findPlayer(state, identity);
    if (!player) {
      return violation(GameErrorKind.PLAYER_NOT_FOUND, `${identity} is not seated in this game`);
    }
    return { ok: true, value: player };
  }

  const guard = requireTurn(state, identity);
  if (!guard.ok) return guard;
  return { ok: true, value: guard.value.player };
}

export function movePlayer(
  state: SessionState,
  identity: string,
  target: BoardLocation,
  now: number = Date.now()
): RuleResult<MoveOutcome> {
  const acting = actingPlayer(state, identity);
  if (!acting.ok) return acting;

  const player = acting.value;
  const from = locationOf(state, player);

  if (target === from) {
    return violation(GameErrorKind.SAME_LOCATION, `You are already in ${target}`);
  }
  if (!areAdjacent(from, target)) {
    return violation(GameErrorKind.INVALID_MOVE, `${target} is not adjacent to ${from}`);
  }
  const occupant = hallwayOccupant(state, target, identity);
  if (occupant) {
    return violation(GameErrorKind.HALLWAY_OCCUPIED, `${target} is occupied by ${occupant.identity}`);
  }

  const moved: SessionState = {
    ...state,
    tokens: { ...state.tokens, [player.character]: target },
  };

  return {
    ok: true,
    value: {
      state: appendHistory(moved, `${describePlayer(player)} moved from ${from} to ${target}`, now),
      player,
      from,
      to: target,
    },
  };
}
