/**
 * Shared builders for rule and controller tests
 */

import { BoardLocation } from '../../src/game/board';
import {
  ALL_CARDS,
  Card,
  CaseFile,
  RandomSource,
  Room,
  Suspect,
  Weapon,
  caseFileCards,
  roomCard,
  sameCard,
  suspectCard,
  weaponCard,
} from '../../src/game/cards';
import { joinPlayer } from '../../src/game/lobby';
import {
  GameErrorKind,
  PendingDisprove,
  RuleResult,
  SessionPhase,
  SessionState,
  createInitialState,
} from '../../src/game/types';

export const NOW = 1_000;

/** Always the lowest index: seats take suspects in declaration order. */
export const firstPick: RandomSource = () => 0;

export const CASE_FILE: CaseFile = {
  suspect: Suspect.SCARLET,
  weapon: Weapon.ROPE,
  room: Room.STUDY,
};

export const S = suspectCard;
export const W = weaponCard;
export const R = roomCard;

/**
 * Lobby with the given identities seated in order.
 */
export function lobbyWith(identities: string[], gameId: string = 'game-1'): SessionState {
  let state = createInitialState(gameId);
  for (const identity of identities) {
    const result = joinPlayer(state, identity, firstPick, NOW);
    if (!result.ok) {
      throw new Error(`fixture join failed: ${result.error.message}`);
    }
    state = result.value.state;
  }
  return state;
}

/**
 * Deal every card outside the case file and the fixed hands round-robin,
 * so the result always partitions the deck.
 */
export function completeHands(caseFile: CaseFile, fixed: Card[][]): Card[][] {
  const used = [...caseFileCards(caseFile), ...fixed.flat()];
  const rest = ALL_CARDS.filter((card) => !used.some((u) => sameCard(u, card)));
  const hands = fixed.map((hand) => [...hand]);
  rest.forEach((card, index) => {
    hands[index % hands.length].push(card);
  });
  return hands;
}

export interface GameSetup {
  caseFile?: CaseFile;
  hands: Card[][];
  tokens?: Partial<Record<Suspect, BoardLocation>>;
  turnIndex?: number;
  pendingDisprove?: PendingDisprove | null;
}

/**
 * A running game with exact hands, skipping the random deal.
 */
export function inProgress(identities: string[], setup: GameSetup): SessionState {
  const lobby = lobbyWith(identities);
  return {
    ...lobby,
    players: lobby.players.map((p, seat) => ({ ...p, hand: setup.hands[seat] ?? [] })),
    tokens: { ...lobby.tokens, ...setup.tokens },
    status: {
      phase: SessionPhase.IN_PROGRESS,
      caseFile: setup.caseFile ?? CASE_FILE,
      turnIndex: setup.turnIndex ?? 0,
      turn: { suggested: false },
      pendingDisprove: setup.pendingDisprove ?? null,
    },
    history: [],
  };
}

/** Kind of a failed rule result, or null when it succeeded. */
export function errorKind<T>(result: RuleResult<T>): GameErrorKind | null {
  return result.ok ? null : result.error.kind;
}
