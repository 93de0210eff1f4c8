import pino from 'pino';
import { config } from '../config';

function createTransport() {
  return pino.transport({
    targets: [
      {
        target: 'pino-pretty',
        level: config.logLevel,
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
      ...(config.isProduction
        ? [
            {
              target: 'pino/file',
              level: config.logLevel,
              options: {
                destination: './logs/app.log',
                mkdir: true,
              },
            },
          ]
        : []),
    ],
  });
}

const options = {
  level: config.logLevel,
  base: {
    app: 'clueless-session-server',
  },
};

// Tests log nowhere; a transport would leave a worker thread behind.
export const logger = config.isTest ? pino(options) : pino(options, createTransport());

export const gameLogger = logger.child({ module: 'game' });
export const sessionLogger = logger.child({ module: 'session' });
export const transportLogger = logger.child({ module: 'transport' });
export const storageLogger = logger.child({ module: 'storage' });
export const healthLogger = logger.child({ module: 'health' });
