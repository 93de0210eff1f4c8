import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  // Server
  port: number;
  logLevel: string;
  corsOrigin: string;

  // Storage
  mongoUri: string | undefined;

  // Session rules (in seconds)
  disproveTimeoutSeconds: number;
  endedSessionRetentionSeconds: number;
  legacyLobbyMovement: boolean;

  // Derived
  isProduction: boolean;
  isTest: boolean;
  hasDatabase: boolean;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function loadConfig(): Config {
  const mongoUri = process.env.MONGO_URI?.trim() || undefined;
  const isTest = process.env.NODE_ENV === 'test';

  return {
    // Server
    port: getEnvNumber('PORT', 3000),
    logLevel: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
    corsOrigin: process.env.CORS_ORIGIN || '*',

    // Storage
    mongoUri,

    // Session rules
    disproveTimeoutSeconds: getEnvNumber('DISPROVE_TIMEOUT_SECONDS', 60),
    endedSessionRetentionSeconds: getEnvNumber('ENDED_SESSION_RETENTION_SECONDS', 300),
    legacyLobbyMovement: getEnvBoolean('LEGACY_LOBBY_MOVEMENT', false),

    // Derived
    isProduction: process.env.NODE_ENV === 'production',
    isTest,
    hasDatabase: mongoUri !== undefined,
  };
}

export const config = loadConfig();

// Log config on startup (excluding sensitive data)
export function getPublicConfig(): Omit<Config, 'mongoUri'> & { mongoUri: string } {
  return {
    ...config,
    mongoUri: config.hasDatabase ? '[REDACTED]' : '[NOT SET]',
  };
}
