/**
 * Lobby / Dealer: seats players, assigns characters and the host, deals the
 * cards and opens play.
 */

import { FIRST_SUSPECT, RandomSource, SUSPECTS, dealHands, drawCaseFile, pickOne } from './cards';
import { appendHistory, describePlayer, findPlayer, isConnected, updatePlayer } from './session';
import {
  ConnectionState,
  GameErrorKind,
  HostAssignment,
  MAX_PLAYERS,
  MIN_PLAYERS,
  RuleResult,
  SessionPhase,
  SessionPlayer,
  SessionState,
  Standing,
  violation,
} from './types';

export interface JoinOutcome {
  state: SessionState;
  player: SessionPlayer;
  reconnected: boolean;
}

export interface DisconnectOutcome {
  state: SessionState;
  player: SessionPlayer;
  newHost: SessionPlayer | null;
}

function assignHost(current: HostAssignment | null, joiner: SessionPlayer): HostAssignment | null {
  const holdsFirstSuspect = joiner.character === FIRST_SUSPECT;
  if (!current) {
    return { identity: joiner.identity, settled: holdsFirstSuspect };
  }
  if (!current.settled && holdsFirstSuspect) {
    return { identity: joiner.identity, settled: true };
  }
  return current;
}

export function joinPlayer(
  state: SessionState,
  identity: string,
  random: RandomSource = Math.random,
  now: number = Date.now()
): RuleResult<JoinOutcome> {
  const existing = findPlayer(state, identity);
  if (existing) {
    if (isConnected(existing)) {
      return { ok: true, value: { state, player: existing, reconnected: true } };
    }
    const reconnected = { ...existing, connection: ConnectionState.CONNECTED };
    const next = appendHistory(
      updatePlayer(state, identity, () => reconnected),
      `${describePlayer(reconnected)} reconnected`,
      now
    );
    return { ok: true, value: { state: next, player: reconnected, reconnected: true } };
  }

  if (state.status.phase === SessionPhase.ENDED) {
    return violation(GameErrorKind.GAME_OVER, 'This game is over');
  }
  if (state.status.phase === SessionPhase.IN_PROGRESS) {
    return violation(GameErrorKind.ALREADY_STARTED, 'This game has already started');
  }
  if (state.players.length >= MAX_PLAYERS) {
    return violation(GameErrorKind.CAPACITY_EXCEEDED, `This game already has ${MAX_PLAYERS} players`);
  }

  const taken = new Set(state.players.map((p) => p.character));
  const character = pickOne(
    SUSPECTS.filter((s) => !taken.has(s)),
    random
  );

  const player: SessionPlayer = {
    identity,
    character,
    hand: [],
    connection: ConnectionState.CONNECTED,
    standing: Standing.IN_PLAY,
    joinedAt: now,
  };

  const next = appendHistory(
    {
      ...state,
      players: [...state.players, player],
      host: assignHost(state.host, player),
    },
    `${describePlayer(player)} joined the game`,
    now
  );

  return { ok: true, value: { state: next, player, reconnected: false } };
}

/**
 * Mark a player as gone. The record, hand and token stay. A host leaving the
 * lobby hands the role to the earliest-joined connected player.
 */
export function disconnectPlayer(
  state: SessionState,
  identity: string,
  now: number = Date.now()
): RuleResult<DisconnectOutcome> {
  const existing = findPlayer(state, identity);
  if (!existing) {
    return violation(GameErrorKind.PLAYER_NOT_FOUND, `${identity} is not seated in this game`);
  }
  if (!isConnected(existing)) {
    return { ok: true, value: { state, player: existing, newHost: null } };
  }

  const player = { ...existing, connection: ConnectionState.DISCONNECTED };
  let next = appendHistory(
    updatePlayer(state, identity, () => player),
    `${describePlayer(player)} disconnected`,
    now
  );

  let newHost: SessionPlayer | null = null;
  if (next.status.phase === SessionPhase.LOBBY && next.host?.identity === identity) {
    newHost = next.players.find((p) => p.identity !== identity && isConnected(p)) ?? null;
    if (newHost) {
      next = appendHistory(
        { ...next, host: { identity: newHost.identity, settled: true } },
        `${describePlayer(newHost)} is now the host`,
        now
      );
    }
  }

  return { ok: true, value: { state: next, player, newHost } };
}

export function startSession(
  state: SessionState,
  requester: string,
  random: RandomSource = Math.random,
  now: number = Date.now()
): RuleResult<SessionState> {
  if (state.status.phase === SessionPhase.ENDED) {
    return violation(GameErrorKind.GAME_OVER, 'This game is over');
  }
  if (state.status.phase === SessionPhase.IN_PROGRESS) {
    return violation(GameErrorKind.ALREADY_STARTED, 'The game has already started');
  }
  if (state.host?.identity !== requester) {
    return violation(GameErrorKind.NOT_HOST, 'Only the host can start the game');
  }
  if (state.players.length < MIN_PLAYERS) {
    return violation(
      GameErrorKind.INSUFFICIENT_PLAYERS,
      `At least ${MIN_PLAYERS} players are required (${state.players.length} joined)`
    );
  }

  const caseFile = drawCaseFile(random);
  const hands = dealHands(caseFile, state.players.length, random);
  const players = state.players.map((p, seat) => ({ ...p, hand: hands[seat] }));

  const next: SessionState = {
    ...state,
    players,
    status: {
      phase: SessionPhase.IN_PROGRESS,
      caseFile,
      turnIndex: 0,
      turn: { suggested: false },
      pendingDisprove: null,
    },
  };

  return {
    ok: true,
    value: appendHistory(next, `The game has started. ${describePlayer(players[0])} goes first`, now),
  };
}
