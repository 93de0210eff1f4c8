/**
 * Suggestion Resolver: relocate the named suspect, then walk the table from
 * the suggester's left looking for the first player able to disprove.
 *
 * Only the suggester ever learns the outcome. The table sees the suggestion
 * and the token move, never who refuted it or whether anyone could.
 */

import { BoardLocation } from './board';
import { Card, Room, Suspect, Weapon, isRoom, matchingCards, sameCard } from './cards';
import { appendHistory, describePlayer, isConnected, locationOf, requireTurn } from './session';
import {
  GameErrorKind,
  PendingDisprove,
  RuleResult,
  SessionPhase,
  SessionPlayer,
  SessionState,
  Suggestion,
  violation,
} from './types';

export type DisproveResolution =
  | { kind: 'DISPROVED'; disprover: SessionPlayer; card: Card }
  | { kind: 'NO_REFUTE' }
  | { kind: 'PENDING'; pending: PendingDisprove };

export interface SuggestionOutcome {
  state: SessionState;
  suggester: SessionPlayer;
  suggestion: Suggestion;
  relocated: { suspect: Suspect; from: BoardLocation } | null;
  resolution: DisproveResolution;
}

export interface ResolvedDisprove {
  state: SessionState;
  pending: PendingDisprove;
  card: Card;
}

/**
 * First player after `suggesterIndex` in turn order holding a matching card,
 * with the cards they could show. Eliminated players still disprove.
 */
export function findDisprover(
  players: readonly SessionPlayer[],
  suggesterIndex: number,
  suggestion: Suggestion
): { player: SessionPlayer; matches: Card[] } | null {
  for (let step = 1; step < players.length; step++) {
    const player = players[(suggesterIndex + step) % players.length];
    const matches = matchingCards(player.hand, suggestion.suspect, suggestion.weapon, suggestion.room);
    if (matches.length > 0) {
      return { player, matches };
    }
  }
  return null;
}

export function makeSuggestion(
  state: SessionState,
  identity: string,
  suspect: Suspect,
  weapon: Weapon,
  now: number = Date.now()
): RuleResult<SuggestionOutcome> {
  const guard = requireTurn(state, identity);
  if (!guard.ok) return guard;

  const { player, index, status } = guard.value;
  const location = locationOf(state, player);
  if (!isRoom(location)) {
    return violation(GameErrorKind.NOT_IN_ROOM, 'You must be in a room to make a suggestion');
  }
  if (status.turn.suggested) {
    return violation(GameErrorKind.ALREADY_SUGGESTED, 'You have already made a suggestion this turn');
  }

  const room: Room = location;
  const suggestion: Suggestion = { suspect, weapon, room };
  const previous = state.tokens[suspect];
  const relocated = previous === room ? null : { suspect, from: previous };

  const found = findDisprover(state.players, index, suggestion);
  let resolution: DisproveResolution;
  if (!found) {
    resolution = { kind: 'NO_REFUTE' };
  } else if (found.matches.length === 1 || !isConnected(found.player)) {
    // Nothing to choose, or nobody there to choose: show the first match.
    resolution = { kind: 'DISPROVED', disprover: found.player, card: found.matches[0] };
  } else {
    resolution = {
      kind: 'PENDING',
      pending: {
        suggester: player.identity,
        disprover: found.player.identity,
        suggestion,
        options: found.matches,
        deadline: now + state.settings.disproveTimeoutSeconds * 1000,
      },
    };
  }

  let next: SessionState = {
    ...state,
    tokens: { ...state.tokens, [suspect]: room },
    status: {
      ...status,
      turn: { ...status.turn, suggested: true },
      pendingDisprove: resolution.kind === 'PENDING' ? resolution.pending : null,
    },
  };
  next = appendHistory(next, `${describePlayer(player)} suggested ${suspect} with the ${weapon} in the ${room}`, now);
  if (relocated) {
    next = appendHistory(next, `${suspect} was moved from ${relocated.from} to the ${room}`, now);
  }

  return { ok: true, value: { state: next, suggester: player, suggestion, relocated, resolution } };
}

export function respondToDisprove(
  state: SessionState,
  identity: string,
  card: Card
): RuleResult<ResolvedDisprove> {
  const status = state.status;
  if (status.phase === SessionPhase.ENDED) {
    return violation(GameErrorKind.GAME_OVER, 'The game is over');
  }
  if (status.phase !== SessionPhase.IN_PROGRESS || !status.pendingDisprove) {
    return violation(GameErrorKind.NOT_DISPROVER, 'No card choice is pending');
  }

  const pending = status.pendingDisprove;
  if (pending.disprover !== identity) {
    return violation(GameErrorKind.NOT_DISPROVER, `Waiting for ${pending.disprover} to choose a card`);
  }
  const chosen = pending.options.find((option) => sameCard(option, card));
  if (!chosen) {
    return violation(GameErrorKind.INVALID_CARD, `${card.name} does not disprove this suggestion`);
  }

  return {
    ok: true,
    value: {
      state: { ...state, status: { ...status, pendingDisprove: null } },
      pending,
      card: chosen,
    },
  };
}

/**
 * Resolve an unanswered choice with the first matching card, in suspect,
 * weapon, room order. Null when nothing is pending.
 */
export function expireDisprove(state: SessionState): ResolvedDisprove | null {
  const status = state.status;
  if (status.phase !== SessionPhase.IN_PROGRESS || !status.pendingDisprove) return null;

  const pending = status.pendingDisprove;
  return {
    state: { ...state, status: { ...status, pendingDisprove: null } },
    pending,
    card: pending.options[0],
  };
}
