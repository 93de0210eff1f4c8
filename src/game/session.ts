/**
 * Helpers shared by the rule modules: lookups, immutable updates, the common
 * turn guard, the public view and invariant checks.
 */

import { BoardLocation } from './board';
import { findConservationProblems } from './cards';
import {
  ConnectionState,
  GameErrorKind,
  InProgressStatus,
  InvariantViolationError,
  PublicSessionView,
  RuleResult,
  SessionPhase,
  SessionPlayer,
  SessionState,
  Standing,
  violation,
} from './types';

export interface TurnContext {
  player: SessionPlayer;
  index: number;
  status: InProgressStatus;
}

export function findPlayer(state: SessionState, identity: string): SessionPlayer | undefined {
  return state.players.find((p) => p.identity === identity);
}

export function locationOf(state: SessionState, player: SessionPlayer): BoardLocation {
  return state.tokens[player.character];
}

export function isEliminated(player: SessionPlayer): boolean {
  return player.standing === Standing.ELIMINATED;
}

export function isConnected(player: SessionPlayer): boolean {
  return player.connection === ConnectionState.CONNECTED;
}

export function describePlayer(player: SessionPlayer): string {
  return `${player.identity} (${player.character})`;
}

export function remainingPlayers(state: SessionState): SessionPlayer[] {
  return state.players.filter((p) => !isEliminated(p));
}

export function updatePlayer(
  state: SessionState,
  identity: string,
  update: (player: SessionPlayer) => SessionPlayer
): SessionState {
  return {
    ...state,
    players: state.players.map((p) => (p.identity === identity ? update(p) : p)),
  };
}

export function appendHistory(state: SessionState, text: string, at: number = Date.now()): SessionState {
  return { ...state, history: [...state.history, { at, text }] };
}

/**
 * The player whose turn it is, or null outside of play.
 */
export function currentTurnHolder(state: SessionState): SessionPlayer | null {
  if (state.status.phase !== SessionPhase.IN_PROGRESS) return null;
  return state.players[state.status.turnIndex] ?? null;
}

/**
 * Common preconditions of move, suggest, accuse and end_turn while a game is
 * running, checked in order.
 */
export function requireTurn(state: SessionState, identity: string): RuleResult<TurnContext> {
  const status = state.status;
  if (status.phase === SessionPhase.ENDED) {
    return violation(GameErrorKind.GAME_OVER, 'The game is over');
  }
  if (status.phase === SessionPhase.LOBBY) {
    return violation(GameErrorKind.NOT_STARTED, 'The game has not started yet');
  }

  const index = state.players.findIndex((p) => p.identity === identity);
  const player = state.players[index];
  if (!player) {
    return violation(GameErrorKind.PLAYER_NOT_FOUND, `${identity} is not seated in this game`);
  }
  if (status.turnIndex !== index) {
    return violation(GameErrorKind.NOT_YOUR_TURN, 'It is not your turn');
  }
  // Unreachable while the turn invariant holds: eliminated players never hold the turn.
  if (isEliminated(player)) {
    return violation(GameErrorKind.ELIMINATED, 'Eliminated players can no longer move, suggest or accuse');
  }
  if (status.pendingDisprove) {
    return violation(
      GameErrorKind.AWAITING_DISPROVE,
      `Waiting for ${status.pendingDisprove.disprover} to choose a card`
    );
  }

  return { ok: true, value: { player, index, status } };
}

/**
 * What every client may see. The case file is only included once a correct
 * accusation has revealed it.
 */
export function toPublicView(state: SessionState): PublicSessionView {
  const holder = currentTurnHolder(state);
  const status = state.status;

  return {
    gameId: state.gameId,
    phase: status.phase,
    players: state.players.map((p) => ({
      identity: p.identity,
      character: p.character,
      location: locationOf(state, p),
      connected: isConnected(p),
      eliminated: isEliminated(p),
      isHost: state.host?.identity === p.identity,
      isTurn: holder?.identity === p.identity,
    })),
    tokens: { ...state.tokens },
    turn: holder?.identity ?? null,
    awaitingDisproveFrom:
      status.phase === SessionPhase.IN_PROGRESS ? (status.pendingDisprove?.disprover ?? null) : null,
    outcome: status.phase === SessionPhase.ENDED ? status.outcome : null,
    caseFile:
      status.phase === SessionPhase.ENDED && status.outcome.kind === 'WINNER' ? status.caseFile : null,
  };
}

/**
 * Throws when the state breaks card conservation or the turn rules. These
 * are defects, never player mistakes.
 */
export function assertSessionInvariants(state: SessionState): void {
  const status = state.status;
  if (status.phase === SessionPhase.LOBBY) return;

  const problems = findConservationProblems(
    status.caseFile,
    state.players.map((p) => p.hand)
  );

  if (status.phase === SessionPhase.IN_PROGRESS) {
    const holder = state.players[status.turnIndex];
    if (!holder) {
      problems.push(`turn index ${status.turnIndex} is out of range`);
    } else if (isEliminated(holder)) {
      problems.push(`turn is held by eliminated player ${holder.identity}`);
    }
  }

  if (problems.length > 0) {
    throw new InvariantViolationError(state.gameId, problems);
  }
}
