/**
 * Session Types for the deduction game server
 */

import { BoardLocation, STARTING_LOCATIONS } from './board';
import { Card, CaseFile, Room, Suspect, Weapon } from './cards';

export const MIN_PLAYERS = 3;
export const MAX_PLAYERS = 6;

/**
 * Session phases following the state machine pattern
 */
export enum SessionPhase {
  LOBBY = 'LOBBY',
  IN_PROGRESS = 'IN_PROGRESS',
  ENDED = 'ENDED',
}

export enum ConnectionState {
  CONNECTED = 'CONNECTED',
  DISCONNECTED = 'DISCONNECTED',
}

export enum Standing {
  IN_PLAY = 'IN_PLAY',
  ELIMINATED = 'ELIMINATED',
}

/**
 * Player seated in a session. Join order is turn order.
 */
export interface SessionPlayer {
  identity: string;
  character: Suspect;
  hand: Card[];
  connection: ConnectionState;
  standing: Standing;
  joinedAt: number;
}

/**
 * Host role. `settled` is set once the role can no longer move to the
 * holder of the first suspect.
 */
export interface HostAssignment {
  identity: string;
  settled: boolean;
}

export interface Suggestion {
  suspect: Suspect;
  weapon: Weapon;
  room: Room;
}

/**
 * A disprover holding several matching cards owes the suggester a choice.
 */
export interface PendingDisprove {
  suggester: string;
  disprover: string;
  suggestion: Suggestion;
  options: Card[];
  deadline: number;
}

export interface TurnProgress {
  suggested: boolean;
}

export type GameOutcome = { kind: 'WINNER'; winner: string } | { kind: 'TIE' };

export type SessionStatus =
  | { phase: SessionPhase.LOBBY }
  | {
      phase: SessionPhase.IN_PROGRESS;
      caseFile: CaseFile;
      turnIndex: number;
      turn: TurnProgress;
      pendingDisprove: PendingDisprove | null;
    }
  | { phase: SessionPhase.ENDED; caseFile: CaseFile; outcome: GameOutcome };

export type InProgressStatus = Extract<SessionStatus, { phase: SessionPhase.IN_PROGRESS }>;

export interface HistoryEntry {
  at: number;
  text: string;
}

/**
 * Configurable session settings
 */
export interface SessionSettings {
  disproveTimeoutSeconds: number;
  legacyLobbyMovement: boolean;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  disproveTimeoutSeconds: 60,
  legacyLobbyMovement: false,
};

/**
 * Complete authoritative state of one game
 */
export interface SessionState {
  gameId: string;
  players: SessionPlayer[];
  tokens: Record<Suspect, BoardLocation>;
  host: HostAssignment | null;
  status: SessionStatus;
  history: HistoryEntry[];
  settings: SessionSettings;
}

/**
 * Rule violations reported to the acting client only
 */
export enum GameErrorKind {
  NOT_YOUR_TURN = 'NotYourTurn',
  ELIMINATED = 'Eliminated',
  GAME_OVER = 'GameOver',
  SAME_LOCATION = 'SameLocation',
  INVALID_MOVE = 'InvalidMove',
  HALLWAY_OCCUPIED = 'HallwayOccupied',
  NOT_IN_ROOM = 'NotInRoom',
  NOT_HOST = 'NotHost',
  INSUFFICIENT_PLAYERS = 'InsufficientPlayers',
  CAPACITY_EXCEEDED = 'CapacityExceeded',
  ALREADY_STARTED = 'AlreadyStarted',
  SESSION_NOT_FOUND = 'SessionNotFound',
  NOT_STARTED = 'NotStarted',
  AWAITING_DISPROVE = 'AwaitingDisprove',
  NOT_DISPROVER = 'NotDisprover',
  ALREADY_SUGGESTED = 'AlreadySuggested',
  INVALID_CARD = 'InvalidCard',
  INVALID_MESSAGE = 'InvalidMessage',
  PLAYER_NOT_FOUND = 'PlayerNotFound',
}

export interface RuleViolation {
  kind: GameErrorKind;
  message: string;
}

export type RuleResult<T> = { ok: true; value: T } | { ok: false; error: RuleViolation };

export function violation(kind: GameErrorKind, message: string): { ok: false; error: RuleViolation } {
  return { ok: false, error: { kind, message } };
}

/**
 * Raised when authoritative state breaks a structural invariant. Not a rule
 * violation: the session cannot continue.
 */
export class InvariantViolationError extends Error {
  constructor(
    readonly gameId: string,
    readonly problems: string[]
  ) {
    super(`Session ${gameId} violated an invariant: ${problems.join('; ')}`);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Actions that can modify session state
 */
export type GameAction =
  | { type: 'PLAYER_JOIN'; identity: string }
  | { type: 'PLAYER_DISCONNECT'; identity: string }
  | { type: 'START_GAME'; identity: string }
  | { type: 'MOVE'; identity: string; target: BoardLocation }
  | { type: 'SUGGEST'; identity: string; suspect: Suspect; weapon: Weapon }
  | { type: 'RESPOND_DISPROVE'; identity: string; card: Card }
  | { type: 'DISPROVE_TIMEOUT' }
  | { type: 'ACCUSE'; identity: string; suspect: Suspect; weapon: Weapon; room: Room }
  | { type: 'END_TURN'; identity: string };

/**
 * Public view of a player; never carries the hand
 */
export interface PublicPlayerView {
  identity: string;
  character: Suspect;
  location: BoardLocation;
  connected: boolean;
  eliminated: boolean;
  isHost: boolean;
  isTurn: boolean;
}

export interface PublicSessionView {
  gameId: string;
  phase: SessionPhase;
  players: PublicPlayerView[];
  tokens: Record<Suspect, BoardLocation>;
  turn: string | null;
  awaitingDisproveFrom: string | null;
  outcome: GameOutcome | null;
  caseFile: CaseFile | null;
}

/**
 * Messages delivered to clients. Cards travel by name.
 */
export type OutboundMessage =
  | { type: 'game_update'; state: PublicSessionView }
  | { type: 'hand'; cards: string[] }
  | { type: 'error'; kind: GameErrorKind; message: string }
  | { type: 'player_action'; message: string }
  | { type: 'suggestion_made'; suggester: string; suspect: Suspect; weapon: Weapon; room: Room }
  | {
      type: 'disprove_request';
      suggester: string;
      suspect: Suspect;
      weapon: Weapon;
      room: Room;
      options: string[];
      deadline: number;
    }
  | { type: 'suggestion_result'; outcome: 'DISPROVED'; disprover: string; card: string }
  | { type: 'suggestion_result'; outcome: 'NO_REFUTE' }
  | { type: 'disprove_sent'; suggester: string; card: string }
  | { type: 'accusation_failed'; message: string }
  | { type: 'player_eliminated'; identity: string; character: Suspect }
  | { type: 'game_over'; outcome: 'WINNER'; winner: string; caseFile: CaseFile }
  | { type: 'game_over'; outcome: 'TIE' }
  | { type: 'history'; entries: HistoryEntry[] }
  | { type: 'session_aborted'; reason: string };

export interface FinishedGameRecord {
  gameId: string;
  outcome: GameOutcome;
  caseFile: CaseFile;
  players: { identity: string; character: Suspect; eliminated: boolean }[];
  history: HistoryEntry[];
  endedAt: number;
}

/**
 * Side effects to execute after state transition
 */
export type SideEffect =
  | { type: 'BROADCAST'; message: OutboundMessage }
  | { type: 'UNICAST'; identity: string; message: OutboundMessage }
  | { type: 'BROADCAST_STATE' }
  | { type: 'SET_DISPROVE_TIMER'; durationSeconds: number }
  | { type: 'CLEAR_TIMER' }
  | { type: 'ARCHIVE_GAME'; record: FinishedGameRecord };

/**
 * Result from a state transition. A rejected action carries the unchanged
 * state, the violation, and an error unicast to the actor.
 */
export interface TransitionResult {
  state: SessionState;
  sideEffects: SideEffect[];
  error?: RuleViolation;
}

/**
 * Initial session state factory
 */
export function createInitialState(gameId: string, settings?: Partial<SessionSettings>): SessionState {
  return {
    gameId,
    players: [],
    tokens: { ...STARTING_LOCATIONS },
    host: null,
    status: { phase: SessionPhase.LOBBY },
    history: [],
    settings: { ...DEFAULT_SESSION_SETTINGS, ...settings },
  };
}
