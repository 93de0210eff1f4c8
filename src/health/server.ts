/**
 * Health Check and Metrics Server
 *
 * Owns the HTTP server the realtime transport attaches to.
 */

import { createServer, Server as HTTPServer } from 'http';
import express, { Request, Response, Application } from 'express';
import { config } from '../config';
import { healthLogger } from '../utils/logger';

export interface HealthStatus {
  status: 'ok' | 'degraded' | 'error';
  uptime: number;
  timestamp: string;
  transportInitialized: boolean;
  sessionsActive: number;
  playersConnected: number;
}

export interface MetricsData {
  sessionsActive: number;
  sessionsByPhase: Record<string, number>;
  playersConnected: number;
  gamesFinished: number;
  sessionsAborted: number;
  uptime: number;
}

export interface SessionListing {
  gameId: string;
  phase: string;
  players: number;
  connected: number;
}

type HealthCallback = () => HealthStatus;
type MetricsCallback = () => MetricsData;
type SessionsCallback = () => SessionListing[];

export function formatPrometheusMetrics(metrics: MetricsData): string {
  const lines = [
    '# HELP clueless_sessions_active Sessions currently held in memory',
    '# TYPE clueless_sessions_active gauge',
    `clueless_sessions_active ${metrics.sessionsActive}`,
    '',
    '# HELP clueless_sessions_by_phase Sessions per phase',
    '# TYPE clueless_sessions_by_phase gauge',
    ...Object.entries(metrics.sessionsByPhase).map(
      ([phase, count]) => `clueless_sessions_by_phase{phase="${phase}"} ${count}`
    ),
    '',
    '# HELP clueless_players_connected Players with a live connection',
    '# TYPE clueless_players_connected gauge',
    `clueless_players_connected ${metrics.playersConnected}`,
    '',
    '# HELP clueless_games_finished_total Games that reached an outcome',
    '# TYPE clueless_games_finished_total counter',
    `clueless_games_finished_total ${metrics.gamesFinished}`,
    '',
    '# HELP clueless_sessions_aborted_total Sessions stopped by an internal error',
    '# TYPE clueless_sessions_aborted_total counter',
    `clueless_sessions_aborted_total ${metrics.sessionsAborted}`,
    '',
    '# HELP clueless_uptime_seconds Server uptime in seconds',
    '# TYPE clueless_uptime_seconds counter',
    `clueless_uptime_seconds ${metrics.uptime}`,
  ];
  return lines.join('\n');
}

export class HealthServer {
  private app: Application;
  private server: HTTPServer;
  private startTime: number = Date.now();
  private getHealth: HealthCallback;
  private getMetrics: MetricsCallback;
  private getSessions: SessionsCallback;

  constructor(getHealth: HealthCallback, getMetrics: MetricsCallback, getSessions: SessionsCallback) {
    this.app = express();
    this.server = createServer(this.app);
    this.getHealth = getHealth;
    this.getMetrics = getMetrics;
    this.getSessions = getSessions;
    this.setupRoutes();
  }

  private setupRoutes(): void {
    // Health check endpoint
    this.app.get('/health', (_req: Request, res: Response) => {
      try {
        const health = this.getHealth();
        res.status(health.status === 'error' ? 503 : 200).json(health);
      } catch (error) {
        healthLogger.error({ error }, 'Health check failed');
        res.status(503).json({
          status: 'error',
          error: 'Health check failed',
          timestamp: new Date().toISOString(),
        });
      }
    });

    // Liveness (simple)
    this.app.get('/live', (_req: Request, res: Response) => {
      res.status(200).send('OK');
    });

    // Readiness
    this.app.get('/ready', (_req: Request, res: Response) => {
      if (this.getHealth().transportInitialized) {
        res.status(200).send('Ready');
      } else {
        res.status(503).send('Not Ready');
      }
    });

    this.app.get('/sessions', (_req: Request, res: Response) => {
      res.json({ sessions: this.getSessions() });
    });

    // Prometheus-style metrics
    this.app.get('/metrics', (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', 'text/plain; version=0.0.4');
        res.send(formatPrometheusMetrics(this.getMetrics()));
      } catch (error) {
        healthLogger.error({ error }, 'Metrics generation failed');
        res.status(500).send('# Error generating metrics');
      }
    });
  }

  getHttpServer(): HTTPServer {
    return this.server;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(config.port, () => {
        this.server.off('error', reject);
        healthLogger.info({ port: config.port }, 'HTTP server started');
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    // socket.io closes the shared server when the transport shuts down first.
    if (!this.server.listening) return Promise.resolve();
    return new Promise((resolve) => {
      this.server.close(() => {
        healthLogger.info('HTTP server stopped');
        resolve();
      });
    });
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }
}
