import { isLogLevel, type LogLevel } from './logger';

export type DatabaseTarget =
  | { kind: 'memory' }
  | { kind: 'sqlite'; filename: string };

export interface ServerConfig {
  appName: string;
  appVersion: string;
  host: string;
  port: number;
  database: DatabaseTarget;
  /** HS256 signing secret shared with the identity provider */
  authSecret: string;
  corsOrigin: string;
  logLevel: LogLevel;
  /** bcrypt cost factor for new password hashes */
  passwordHashRounds: number;
}

type EnvMap = Record<string, string | undefined>;

/**
 * Raised while reading configuration at startup. The message names the
 * offending variable and never echoes its value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_CORS_ORIGIN = 'http://localhost:3000';
const DEFAULT_APP_NAME = 'Owned Tasks API';
const DEFAULT_APP_VERSION = '1.0.0';
const DEFAULT_PASSWORD_HASH_ROUNDS = 10;

const readString = (env: EnvMap, name: string): string => (env[name] || '').trim();

const requireString = (env: EnvMap, name: string): string => {
  const value = readString(env, name);
  if (!value) {
    throw new ConfigError(`${name} is required`);
  }
  return value;
};

const parseBoolean = (raw: string | undefined): boolean => {
  if (raw == null) {
    return false;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
};

const parsePort = (raw: string | undefined): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 65535) {
    return DEFAULT_PORT;
  }
  return parsed;
};

// bcrypt accepts cost factors 4 through 31
const parseHashRounds = (raw: string | undefined): number => {
  const parsed = Number.parseInt(raw ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 4 || parsed > 31) {
    return DEFAULT_PASSWORD_HASH_ROUNDS;
  }
  return parsed;
};

/**
 * Accepts `memory:` for a process-local store, and `sqlite:<path>` (or
 * `sqlite::memory:`) for a SQLite database file.
 */
export const parseDatabaseUrl = (raw: string): DatabaseTarget => {
  if (raw === 'memory:' || raw === 'memory://') {
    return { kind: 'memory' };
  }

  if (raw.startsWith('sqlite:')) {
    const filename = raw.slice('sqlite:'.length).replace(/^\/\//, '');
    if (!filename) {
      throw new ConfigError('DATABASE_URL must name a SQLite file');
    }
    return { kind: 'sqlite', filename };
  }

  throw new ConfigError('DATABASE_URL uses an unsupported scheme');
};

const parseLogLevel = (env: EnvMap): LogLevel => {
  const raw = readString(env, 'LOG_LEVEL').toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return parseBoolean(env.DEBUG) ? 'debug' : 'info';
};

export const createServerConfig = (env: EnvMap = process.env): ServerConfig => {
  const databaseUrl = requireString(env, 'DATABASE_URL');
  const authSecret = requireString(env, 'AUTH_SECRET');

  return {
    appName: readString(env, 'APP_NAME') || DEFAULT_APP_NAME,
    appVersion: readString(env, 'APP_VERSION') || DEFAULT_APP_VERSION,
    host: readString(env, 'HOST') || DEFAULT_HOST,
    port: parsePort(env.PORT),
    database: parseDatabaseUrl(databaseUrl),
    authSecret,
    corsOrigin: readString(env, 'CORS_ORIGIN') || DEFAULT_CORS_ORIGIN,
    logLevel: parseLogLevel(env),
    passwordHashRounds: parseHashRounds(env.PASSWORD_HASH_ROUNDS),
  };
};
