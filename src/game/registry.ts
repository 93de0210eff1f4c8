/**
 * Session Registry - routes transport events to per-game controllers
 */

import { ClientRef, ITransportAdapter } from '../adapter/types';
import { parseInbound } from '../commands/handler';
import { GameArchive } from '../storage/archive';
import { sessionLogger } from '../utils/logger';
import { RandomSource } from './cards';
import { SessionCloseReason, SessionController } from './controller';
import { GameErrorKind, SessionPhase, SessionSettings } from './types';

export interface SessionRegistryOptions {
  settings?: Partial<SessionSettings>;
  endedSessionRetentionSeconds?: number;
  random?: RandomSource;
  now?: () => number;
}

export interface SessionSummary {
  gameId: string;
  phase: SessionPhase;
  players: number;
  connected: number;
}

export interface RegistryMetrics {
  sessionsActive: number;
  sessionsByPhase: Record<SessionPhase, number>;
  playersConnected: number;
  gamesFinished: number;
  sessionsAborted: number;
}

export class SessionRegistry {
  private sessions: Map<string, SessionController> = new Map();
  // Games whose ended session expired; the id stays closed for good.
  private finishedGameIds: Set<string> = new Set();
  private gamesFinished: number = 0;
  private sessionsAborted: number = 0;

  constructor(
    private readonly transport: ITransportAdapter,
    private readonly archive: GameArchive,
    private readonly options: SessionRegistryOptions = {}
  ) {
    this.transport.setEventHandlers({
      onClientConnect: (client) => this.track(client, 'connect', this.handleConnect(client)),
      onClientDisconnect: (client) => this.track(client, 'disconnect', this.handleDisconnect(client)),
      onClientMessage: (client, payload) => this.track(client, 'message', this.handleMessage(client, payload)),
    });
  }

  private track(client: ClientRef, event: string, work: Promise<unknown>): void {
    work.catch((error: unknown) => {
      sessionLogger.error({ ...client, event, error }, 'Failed to handle client event');
    });
  }

  private async handleConnect(client: ClientRef): Promise<void> {
    if (this.isFinished(client.gameId)) {
      // Not seated, but still connected so history can be read.
      this.refuseFinished(client);
      return;
    }
    const session = this.getOrCreate(client.gameId);
    await session.join(client.identity);
  }

  private async handleDisconnect(client: ClientRef): Promise<void> {
    const session = this.sessions.get(client.gameId);
    if (!session) return;
    await session.leave(client.identity);
  }

  private async handleMessage(client: ClientRef, payload: unknown): Promise<void> {
    const session = this.sessions.get(client.gameId);
    if (!session && this.isFinished(client.gameId)) {
      await this.answerFinished(client, payload);
      return;
    }
    if (!session) {
      this.transport.unicast(client.gameId, client.identity, {
        type: 'error',
        kind: GameErrorKind.SESSION_NOT_FOUND,
        message: `No game with id ${client.gameId}`,
      });
      return;
    }
    await session.receive(client.identity, payload);
  }

  private isFinished(gameId: string): boolean {
    return this.finishedGameIds.has(gameId) && !this.sessions.has(gameId);
  }

  private refuseFinished(client: ClientRef): void {
    this.transport.unicast(client.gameId, client.identity, {
      type: 'error',
      kind: GameErrorKind.GAME_OVER,
      message: 'This game is over',
    });
  }

  /**
   * Requests for a game whose session expired: history comes from the
   * archive, everything else is refused.
   */
  private async answerFinished(client: ClientRef, payload: unknown): Promise<void> {
    const parsed = parseInbound(payload);
    if (!parsed.ok) {
      this.transport.unicast(client.gameId, client.identity, {
        type: 'error',
        kind: parsed.error.kind,
        message: parsed.error.message,
      });
      return;
    }

    if (parsed.value.type === 'history') {
      const record = await this.archive.findByGameId(client.gameId);
      if (record) {
        this.transport.unicast(client.gameId, client.identity, { type: 'history', entries: record.history });
        return;
      }
    }
    this.refuseFinished(client);
  }

  getOrCreate(gameId: string): SessionController {
    const existing = this.sessions.get(gameId);
    if (existing) return existing;

    const session = new SessionController({
      gameId,
      transport: this.transport,
      archive: this.archive,
      settings: this.options.settings,
      endedSessionRetentionSeconds: this.options.endedSessionRetentionSeconds,
      random: this.options.random,
      now: this.options.now,
      onFinished: () => {
        this.gamesFinished++;
      },
      onClosed: (id, reason) => this.handleClosed(id, reason),
    });
    this.sessions.set(gameId, session);
    sessionLogger.info({ gameId }, 'Session opened');
    return session;
  }

  private handleClosed(gameId: string, reason: SessionCloseReason): void {
    if (reason === 'aborted') this.sessionsAborted++;
    if (reason === 'expired') this.finishedGameIds.add(gameId);
    this.sessions.delete(gameId);
    sessionLogger.info({ gameId, reason }, 'Session closed');
  }

  get(gameId: string): SessionController | undefined {
    return this.sessions.get(gameId);
  }

  remove(gameId: string): boolean {
    const session = this.sessions.get(gameId);
    if (!session) return false;
    session.stop();
    this.sessions.delete(gameId);
    return true;
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((s) => ({
      gameId: s.gameId,
      phase: s.getPhase(),
      players: s.getPlayerCount(),
      connected: s.getConnectedCount(),
    }));
  }

  getMetrics(): RegistryMetrics {
    const sessionsByPhase: Record<SessionPhase, number> = {
      [SessionPhase.LOBBY]: 0,
      [SessionPhase.IN_PROGRESS]: 0,
      [SessionPhase.ENDED]: 0,
    };
    let playersConnected = 0;
    for (const session of this.sessions.values()) {
      sessionsByPhase[session.getPhase()]++;
      playersConnected += session.getConnectedCount();
    }
    return {
      sessionsActive: this.sessions.size,
      sessionsByPhase,
      playersConnected,
      gamesFinished: this.gamesFinished,
      sessionsAborted: this.sessionsAborted,
    };
  }

  /**
   * Wait for every session to finish the actions already queued
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.sessions.values()).map((s) => s.idle()));
  }

  stop(): void {
    for (const session of this.sessions.values()) {
      session.stop();
    }
    this.sessions.clear();
    sessionLogger.info('Session registry stopped');
  }
}
