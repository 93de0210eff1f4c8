import mongoose from 'mongoose';
import { config, getPublicConfig } from './config';
import { logger, storageLogger } from './utils/logger';
import { withRetry } from './utils/retry';
import { createSocketIOAdapter } from './adapter/socketio.adapter';
import { ITransportAdapter } from './adapter/types';
import { SessionRegistry } from './game/registry';
import { HealthServer } from './health/server';
import { GameArchive, InMemoryGameArchive } from './storage/archive';
import { MongoGameArchive } from './storage/mongo.archive';

let registry: SessionRegistry | null = null;
let transport: ITransportAdapter | null = null;
let healthServer: HealthServer | null = null;
let shuttingDown = false;

async function createArchive(): Promise<GameArchive> {
  if (!config.mongoUri) {
    storageLogger.warn('No MONGO_URI provided. Finished games are kept in memory only.');
    return new InMemoryGameArchive();
  }

  const uri = config.mongoUri;
  await withRetry(() => mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 }), {
    maxRetries: 5,
    initialDelayMs: 1000,
  });
  storageLogger.info('Connected to MongoDB');
  return new MongoGameArchive();
}

async function main(): Promise<void> {
  logger.info({ config: getPublicConfig() }, 'Starting session server...');

  const archive = await createArchive();

  healthServer = new HealthServer(
    () => {
      const metrics = registry?.getMetrics();
      const ready = transport?.isInitialized() ?? false;
      return {
        status: ready ? 'ok' : 'degraded',
        uptime: Math.floor((healthServer?.getUptime() ?? 0) / 1000),
        timestamp: new Date().toISOString(),
        transportInitialized: ready,
        sessionsActive: metrics?.sessionsActive ?? 0,
        playersConnected: metrics?.playersConnected ?? 0,
      };
    },
    () => {
      const metrics = registry?.getMetrics();
      return {
        sessionsActive: metrics?.sessionsActive ?? 0,
        sessionsByPhase: metrics?.sessionsByPhase ?? {},
        playersConnected: metrics?.playersConnected ?? 0,
        gamesFinished: metrics?.gamesFinished ?? 0,
        sessionsAborted: metrics?.sessionsAborted ?? 0,
        uptime: Math.floor((healthServer?.getUptime() ?? 0) / 1000),
      };
    },
    () => registry?.listSessions() ?? []
  );

  transport = createSocketIOAdapter(healthServer.getHttpServer(), { corsOrigin: config.corsOrigin });
  registry = new SessionRegistry(transport, archive, {
    settings: {
      disproveTimeoutSeconds: config.disproveTimeoutSeconds,
      legacyLobbyMovement: config.legacyLobbyMovement,
    },
    endedSessionRetentionSeconds: config.endedSessionRetentionSeconds,
  });

  await transport.initialize();
  await healthServer.start();

  logger.info(`Session server is running on port ${config.port}`);
  logger.info(`Health check available at http://localhost:${config.port}/health`);
}

async function shutdown(code: number = 0): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down...');

  try {
    if (registry) {
      await registry.drain();
      registry.stop();
      registry = null;
    }

    if (transport) {
      await transport.close();
      transport = null;
    }

    if (healthServer) {
      await healthServer.stop();
      healthServer = null;
    }

    if (mongoose.connection.readyState !== 0) {
      await mongoose.connection.close();
    }
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    code = 1;
  }

  process.exit(code);
}

function requestShutdown(code: number): void {
  void shutdown(code);
}

process.on('SIGINT', () => requestShutdown(0));
process.on('SIGTERM', () => requestShutdown(0));
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  requestShutdown(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  requestShutdown(1);
});

main().catch((error: unknown) => {
  logger.error({ error }, 'Fatal error during startup');
  requestShutdown(1);
});
