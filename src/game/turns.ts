/**
 * Turn Scheduler
 */

import { appendHistory, describePlayer, isEliminated, requireTurn } from './session';
import { RuleResult, SessionPhase, SessionPlayer, SessionState } from './types';

export interface TurnHandover {
  state: SessionState;
  from: SessionPlayer;
  to: SessionPlayer;
}

/**
 * Next seat after `fromIndex` held by a player still in play, wrapping around
 * the table. The starting seat itself is considered last, so a sole survivor
 * keeps the turn. Null when everyone is eliminated.
 */
export function nextTurnIndex(players: readonly SessionPlayer[], fromIndex: number): number | null {
  const count = players.length;
  for (let step = 1; step <= count; step++) {
    const index = (fromIndex + step) % count;
    if (!isEliminated(players[index])) {
      return index;
    }
  }
  return null;
}

/**
 * Hand the turn to the next player in play. Callers must have checked that
 * somebody remains.
 */
export function advanceTurn(state: SessionState, fromIndex: number): SessionState {
  if (state.status.phase !== SessionPhase.IN_PROGRESS) return state;

  const next = nextTurnIndex(state.players, fromIndex);
  if (next === null) return state;

  return {
    ...state,
    status: {
      ...state.status,
      turnIndex: next,
      turn: { suggested: false },
      pendingDisprove: null,
    },
  };
}

export function endTurn(state: SessionState, identity: string, now: number = Date.now()): RuleResult<TurnHandover> {
  const guard = requireTurn(state, identity);
  if (!guard.ok) return guard;

  const { player, index } = guard.value;
  const advanced = advanceTurn(state, index);
  const to = advanced.status.phase === SessionPhase.IN_PROGRESS ? advanced.players[advanced.status.turnIndex] : player;

  const text =
    to.identity === player.identity
      ? `${describePlayer(player)} ended their turn and plays again`
      : `${describePlayer(player)} ended their turn. It is now ${describePlayer(to)}'s turn`;

  return { ok: true, value: { state: appendHistory(advanced, text, now), from: player, to } };
}
