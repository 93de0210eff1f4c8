/**
 * Pure State Machine: one authoritative transition per action, with the
 * messages and timers it implies as side effects.
 */

import { Card, RandomSource } from './cards';
import { makeAccusation } from './accusation';
import { disconnectPlayer, joinPlayer, startSession } from './lobby';
import { movePlayer } from './movement';
import { ResolvedDisprove, expireDisprove, makeSuggestion, respondToDisprove } from './suggestion';
import { endTurn } from './turns';
import {
  FinishedGameRecord,
  GameAction,
  PendingDisprove,
  RuleViolation,
  SessionPhase,
  SessionPlayer,
  SessionState,
  SideEffect,
  Standing,
  TransitionResult,
} from './types';

export function transition(
  state: SessionState,
  action: GameAction,
  random: RandomSource = Math.random,
  now: number = Date.now()
): TransitionResult {
  switch (action.type) {
    case 'PLAYER_JOIN':
      return handlePlayerJoin(state, action.identity, random, now);
    case 'PLAYER_DISCONNECT':
      return handlePlayerDisconnect(state, action.identity, now);
    case 'START_GAME':
      return handleStartGame(state, action.identity, random, now);
    case 'MOVE':
      return settle(state, action.identity, movePlayer(state, action.identity, action.target, now));
    case 'SUGGEST':
      return handleSuggest(state, action.identity, action, now);
    case 'RESPOND_DISPROVE':
      return handleRespondDisprove(state, action.identity, action.card);
    case 'DISPROVE_TIMEOUT':
      return handleDisproveTimeout(state);
    case 'ACCUSE':
      return handleAccuse(state, action, now);
    case 'END_TURN':
      return settle(state, action.identity, endTurn(state, action.identity, now));
    default: {
      const unhandled: never = action;
      throw new Error(`Unhandled action ${JSON.stringify(unhandled)}`);
    }
  }
}

function rejected(state: SessionState, identity: string, error: RuleViolation): TransitionResult {
  return {
    state,
    sideEffects: [{ type: 'UNICAST', identity, message: { type: 'error', kind: error.kind, message: error.message } }],
    error,
  };
}

/**
 * Every history line a transition added, announced to the table.
 */
function announceHistory(before: SessionState, after: SessionState): SideEffect[] {
  return after.history
    .slice(before.history.length)
    .map((entry): SideEffect => ({ type: 'BROADCAST', message: { type: 'player_action', message: entry.text } }));
}

/**
 * Accept or reject a plain rule result: public log lines and a fresh state
 * broadcast on success.
 */
function settle(
  state: SessionState,
  identity: string,
  result: { ok: true; value: { state: SessionState } } | { ok: false; error: RuleViolation }
): TransitionResult {
  if (!result.ok) return rejected(state, identity, result.error);
  const next = result.value.state;
  return { state: next, sideEffects: [...announceHistory(state, next), { type: 'BROADCAST_STATE' }] };
}

export function handSummary(player: SessionPlayer): SideEffect {
  return { type: 'UNICAST', identity: player.identity, message: { type: 'hand', cards: player.hand.map((c) => c.name) } };
}

function disproveRequest(pending: PendingDisprove): SideEffect {
  return {
    type: 'UNICAST',
    identity: pending.disprover,
    message: {
      type: 'disprove_request',
      suggester: pending.suggester,
      ...pending.suggestion,
      options: pending.options.map((c) => c.name),
      deadline: pending.deadline,
    },
  };
}

/**
 * Private messages a player needs to pick the game back up: their hand and
 * any card choice they owe.
 */
export function privateCatchUp(state: SessionState, player: SessionPlayer): SideEffect[] {
  const effects: SideEffect[] = [];
  if (state.status.phase !== SessionPhase.LOBBY) {
    effects.push(handSummary(player));
  }
  if (state.status.phase === SessionPhase.IN_PROGRESS) {
    const pending = state.status.pendingDisprove;
    if (pending && pending.disprover === player.identity) {
      effects.push(disproveRequest(pending));
    }
  }
  return effects;
}

export function toFinishedGameRecord(state: SessionState, now: number = Date.now()): FinishedGameRecord | null {
  if (state.status.phase !== SessionPhase.ENDED) return null;
  return {
    gameId: state.gameId,
    outcome: state.status.outcome,
    caseFile: state.status.caseFile,
    players: state.players.map((p) => ({
      identity: p.identity,
      character: p.character,
      eliminated: p.standing === Standing.ELIMINATED,
    })),
    history: state.history,
    endedAt: now,
  };
}

function handlePlayerJoin(state: SessionState, identity: string, random: RandomSource, now: number): TransitionResult {
  const result = joinPlayer(state, identity, random, now);
  if (!result.ok) return rejected(state, identity, result.error);

  const next = result.value.state;
  return {
    state: next,
    sideEffects: [
      ...announceHistory(state, next),
      { type: 'BROADCAST_STATE' },
      ...(result.value.reconnected ? privateCatchUp(next, result.value.player) : []),
    ],
  };
}

function handlePlayerDisconnect(state: SessionState, identity: string, now: number): TransitionResult {
  const result = disconnectPlayer(state, identity, now);
  if (!result.ok) {
    // Nobody left to tell.
    return { state, sideEffects: [], error: result.error };
  }
  const next = result.value.state;
  if (next === state) return { state, sideEffects: [] };

  const announced = announceHistory(state, next);
  const pending = next.status.phase === SessionPhase.IN_PROGRESS ? next.status.pendingDisprove : null;
  if (pending?.disprover === identity) {
    // Nobody left to choose: show the default card now.
    const expired = expireDisprove(next);
    if (expired) {
      const resolved = disproveResolved(expired);
      return { state: resolved.state, sideEffects: [...announced, ...resolved.sideEffects] };
    }
  }
  return { state: next, sideEffects: [...announced, { type: 'BROADCAST_STATE' }] };
}

function handleStartGame(state: SessionState, identity: string, random: RandomSource, now: number): TransitionResult {
  const result = startSession(state, identity, random, now);
  if (!result.ok) return rejected(state, identity, result.error);

  const next = result.value;
  return {
    state: next,
    sideEffects: [...announceHistory(state, next), { type: 'BROADCAST_STATE' }, ...next.players.map(handSummary)],
  };
}

function handleSuggest(
  state: SessionState,
  identity: string,
  action: Extract<GameAction, { type: 'SUGGEST' }>,
  now: number
): TransitionResult {
  const result = makeSuggestion(state, identity, action.suspect, action.weapon, now);
  if (!result.ok) return rejected(state, identity, result.error);

  const { state: next, suggester, suggestion, resolution } = result.value;
  const sideEffects: SideEffect[] = [
    { type: 'BROADCAST', message: { type: 'suggestion_made', suggester: suggester.identity, ...suggestion } },
    ...announceHistory(state, next),
    { type: 'BROADCAST_STATE' },
  ];

  switch (resolution.kind) {
    case 'DISPROVED':
      sideEffects.push(...revealCard(suggester.identity, resolution.disprover.identity, resolution.card));
      break;
    case 'NO_REFUTE':
      sideEffects.push({
        type: 'UNICAST',
        identity: suggester.identity,
        message: { type: 'suggestion_result', outcome: 'NO_REFUTE' },
      });
      break;
    case 'PENDING':
      sideEffects.push(disproveRequest(resolution.pending), {
        type: 'SET_DISPROVE_TIMER',
        durationSeconds: next.settings.disproveTimeoutSeconds,
      });
      break;
  }

  return { state: next, sideEffects };
}

function revealCard(suggester: string, disprover: string, card: Card): SideEffect[] {
  return [
    {
      type: 'UNICAST',
      identity: suggester,
      message: { type: 'suggestion_result', outcome: 'DISPROVED', disprover, card: card.name },
    },
    { type: 'UNICAST', identity: disprover, message: { type: 'disprove_sent', suggester, card: card.name } },
  ];
}

function disproveResolved(resolved: ResolvedDisprove): TransitionResult {
  return {
    state: resolved.state,
    sideEffects: [
      { type: 'CLEAR_TIMER' },
      ...revealCard(resolved.pending.suggester, resolved.pending.disprover, resolved.card),
      { type: 'BROADCAST_STATE' },
    ],
  };
}

function handleRespondDisprove(state: SessionState, identity: string, card: Card): TransitionResult {
  const result = respondToDisprove(state, identity, card);
  if (!result.ok) return rejected(state, identity, result.error);
  return disproveResolved(result.value);
}

function handleDisproveTimeout(state: SessionState): TransitionResult {
  const expired = expireDisprove(state);
  if (!expired) return { state, sideEffects: [] };
  return disproveResolved(expired);
}

function handleAccuse(
  state: SessionState,
  action: Extract<GameAction, { type: 'ACCUSE' }>,
  now: number
): TransitionResult {
  const result = makeAccusation(state, action.identity, action.suspect, action.weapon, action.room, now);
  if (!result.ok) return rejected(state, action.identity, result.error);

  const { state: next, accuser, verdict } = result.value;
  const sideEffects: SideEffect[] = [];

  if (verdict.kind === 'WIN') {
    sideEffects.push({
      type: 'BROADCAST',
      message: { type: 'game_over', outcome: 'WINNER', winner: accuser.identity, caseFile: verdict.caseFile },
    });
  } else {
    sideEffects.push(
      {
        type: 'UNICAST',
        identity: accuser.identity,
        message: {
          type: 'accusation_failed',
          message:
            'Your accusation was incorrect. You can no longer move, suggest or accuse, but you still show cards to disprove suggestions.',
        },
      },
      { type: 'BROADCAST', message: { type: 'player_eliminated', identity: accuser.identity, character: accuser.character } }
    );
    if (verdict.kind === 'TIE') {
      sideEffects.push({ type: 'BROADCAST', message: { type: 'game_over', outcome: 'TIE' } });
    }
  }

  sideEffects.push(...announceHistory(state, next), { type: 'BROADCAST_STATE' });

  const record = toFinishedGameRecord(next, now);
  if (record) {
    sideEffects.push({ type: 'CLEAR_TIMER' }, { type: 'ARCHIVE_GAME', record });
  }

  return { state: next, sideEffects };
}
