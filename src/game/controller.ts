/**
 * Session Controller - Owns one game's authoritative state and executes the
 * side effects of each transition through the transport adapter
 */

import { ITransportAdapter } from '../adapter/types';
import { isReadOnly, parseInbound, toGameAction } from '../commands/handler';
import { GameArchive } from '../storage/archive';
import { gameLogger, sessionLogger } from '../utils/logger';
import { RandomSource } from './cards';
import { assertSessionInvariants, findPlayer, isConnected, toPublicView } from './session';
import { privateCatchUp, transition } from './state-machine';
import {
  FinishedGameRecord,
  GameAction,
  GameErrorKind,
  InvariantViolationError,
  SessionPhase,
  SessionSettings,
  SessionState,
  SideEffect,
  TransitionResult,
  createInitialState,
} from './types';

export type SessionCloseReason = 'aborted' | 'expired';

export interface SessionControllerOptions {
  gameId: string;
  transport: ITransportAdapter;
  archive: GameArchive;
  settings?: Partial<SessionSettings>;
  /** How long an ended game stays readable before the session closes itself */
  endedSessionRetentionSeconds?: number;
  random?: RandomSource;
  now?: () => number;
  onFinished?: (record: FinishedGameRecord) => void;
  onClosed?: (gameId: string, reason: SessionCloseReason) => void;
}

export class SessionController {
  readonly gameId: string;
  private state: SessionState;
  private transport: ITransportAdapter;
  private archive: GameArchive;
  private random: RandomSource;
  private now: () => number;
  private retentionSeconds: number;
  private onFinished?: (record: FinishedGameRecord) => void;
  private onClosed?: (gameId: string, reason: SessionCloseReason) => void;

  // Every mutating action runs after the previous one and its side effects.
  private queue: Promise<void> = Promise.resolve();
  private disproveTimer: NodeJS.Timeout | null = null;
  private retentionTimer: NodeJS.Timeout | null = null;
  private closed: boolean = false;
  private actionsProcessed: number = 0;

  constructor(options: SessionControllerOptions) {
    this.gameId = options.gameId;
    this.state = createInitialState(options.gameId, options.settings);
    this.transport = options.transport;
    this.archive = options.archive;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.retentionSeconds = options.endedSessionRetentionSeconds ?? 300;
    this.onFinished = options.onFinished;
    this.onClosed = options.onClosed;
  }

  /**
   * Queue an action. Resolves with its transition, or null when the session
   * is closed or was aborted by it.
   */
  dispatch(action: GameAction): Promise<TransitionResult | null> {
    const run = this.queue.then(() => this.process(action));
    this.queue = run.then(
      () => undefined,
      (error: unknown) => {
        sessionLogger.error({ gameId: this.gameId, action: action.type, error }, 'Action failed');
      }
    );
    return run;
  }

  /**
   * Resolves once every action queued so far has been applied.
   */
  idle(): Promise<void> {
    return this.queue;
  }

  /**
   * Seat or reconnect a client. A refused seat gets its error, then the
   * connection is dropped.
   */
  async join(identity: string): Promise<TransitionResult | null> {
    const result = await this.dispatch({ type: 'PLAYER_JOIN', identity });
    if (result?.error) {
      sessionLogger.info({ gameId: this.gameId, identity, kind: result.error.kind }, 'Join refused');
      this.transport.disconnectClient(this.gameId, identity);
    }
    return result;
  }

  leave(identity: string): Promise<TransitionResult | null> {
    return this.dispatch({ type: 'PLAYER_DISCONNECT', identity });
  }

  /**
   * Handle a raw client payload: reads are answered at once, everything else
   * is queued.
   */
  async receive(identity: string, payload: unknown): Promise<TransitionResult | null> {
    const parsed = parseInbound(payload);
    if (!parsed.ok) {
      this.transport.unicast(this.gameId, identity, {
        type: 'error',
        kind: parsed.error.kind,
        message: parsed.error.message,
      });
      return null;
    }

    const message = parsed.value;
    if (isReadOnly(message)) {
      if (message.type === 'history') {
        this.sendHistory(identity);
      } else {
        this.sendSync(identity);
      }
      return null;
    }

    return this.dispatch(toGameAction(message, identity));
  }

  sendHistory(identity: string): void {
    this.transport.unicast(this.gameId, identity, { type: 'history', entries: [...this.state.history] });
  }

  /**
   * Current public state plus the requester's own hand and pending prompt.
   */
  sendSync(identity: string): void {
    this.transport.unicast(this.gameId, identity, { type: 'game_update', state: toPublicView(this.state) });
    const player = findPlayer(this.state, identity);
    if (!player) {
      this.transport.unicast(this.gameId, identity, {
        type: 'error',
        kind: GameErrorKind.PLAYER_NOT_FOUND,
        message: 'You are not seated in this game',
      });
      return;
    }
    this.executeMessages(privateCatchUp(this.state, player));
  }

  private async process(action: GameAction): Promise<TransitionResult | null> {
    if (this.closed) return null;

    let result: TransitionResult;
    try {
      result = transition(this.state, action, this.random, this.now());
      assertSessionInvariants(result.state);
    } catch (error) {
      if (error instanceof InvariantViolationError) {
        this.abort(error);
        return null;
      }
      throw error;
    }

    this.state = result.state;
    this.actionsProcessed++;

    if (result.error) {
      sessionLogger.debug(
        { gameId: this.gameId, action: action.type, kind: result.error.kind },
        'Action rejected'
      );
    }

    await this.executeSideEffects(result.sideEffects);

    if (this.state.status.phase === SessionPhase.ENDED && !this.retentionTimer) {
      this.scheduleRetention();
    }
    return result;
  }

  private async executeSideEffects(effects: SideEffect[]): Promise<void> {
    for (const effect of effects) {
      switch (effect.type) {
        case 'BROADCAST':
          this.transport.broadcast(this.gameId, effect.message);
          break;
        case 'UNICAST':
          this.transport.unicast(this.gameId, effect.identity, effect.message);
          break;
        case 'BROADCAST_STATE':
          this.transport.broadcast(this.gameId, { type: 'game_update', state: toPublicView(this.state) });
          break;
        case 'SET_DISPROVE_TIMER':
          this.setDisproveTimer(effect.durationSeconds);
          break;
        case 'CLEAR_TIMER':
          this.clearDisproveTimer();
          break;
        case 'ARCHIVE_GAME':
          await this.archiveGame(effect.record);
          break;
      }
    }
  }

  private executeMessages(effects: SideEffect[]): void {
    for (const effect of effects) {
      if (effect.type === 'UNICAST') {
        this.transport.unicast(this.gameId, effect.identity, effect.message);
      }
    }
  }

  private async archiveGame(record: FinishedGameRecord): Promise<void> {
    gameLogger.info({ gameId: this.gameId, outcome: record.outcome }, 'Game finished');
    this.onFinished?.(record);
    try {
      await this.archive.save(record);
    } catch (error) {
      sessionLogger.error({ gameId: this.gameId, error }, 'Failed to archive finished game');
    }
  }

  private setDisproveTimer(durationSeconds: number): void {
    this.clearDisproveTimer();
    this.disproveTimer = setTimeout(() => {
      this.disproveTimer = null;
      this.dispatch({ type: 'DISPROVE_TIMEOUT' }).catch((error: unknown) => {
        sessionLogger.error({ gameId: this.gameId, error }, 'Disprove timeout failed');
      });
    }, durationSeconds * 1000);
  }

  private clearDisproveTimer(): void {
    if (this.disproveTimer) {
      clearTimeout(this.disproveTimer);
      this.disproveTimer = null;
    }
  }

  private scheduleRetention(): void {
    this.retentionTimer = setTimeout(() => {
      this.retentionTimer = null;
      sessionLogger.info({ gameId: this.gameId }, 'Ended session expired');
      this.close('expired');
    }, this.retentionSeconds * 1000);
  }

  private abort(error: InvariantViolationError): void {
    sessionLogger.fatal({ gameId: this.gameId, problems: error.problems }, 'Session invariant violated');
    this.transport.broadcast(this.gameId, {
      type: 'session_aborted',
      reason: 'The game hit an internal error and has been stopped',
    });
    this.close('aborted');
  }

  private close(reason: SessionCloseReason): void {
    if (this.closed) return;
    this.stop();
    this.onClosed?.(this.gameId, reason);
  }

  getState(): SessionState {
    return this.state;
  }

  getPhase(): SessionPhase {
    return this.state.status.phase;
  }

  getPlayerCount(): number {
    return this.state.players.length;
  }

  getConnectedCount(): number {
    return this.state.players.filter(isConnected).length;
  }

  getActionsProcessed(): number {
    return this.actionsProcessed;
  }

  isClosed(): boolean {
    return this.closed;
  }

  stop(): void {
    this.closed = true;
    this.clearDisproveTimer();
    if (this.retentionTimer) {
      clearTimeout(this.retentionTimer);
      this.retentionTimer = null;
    }
  }
}
