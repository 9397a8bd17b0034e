import dotenv from 'dotenv';
import { AppConfig, Frozen } from '../types/config.types';

// Load environment variables
dotenv.config();

export type Config = Frozen<AppConfig>;

export type Env = Record<string, string | undefined>;

export const DEFAULT_SECRET_KEY = 'change_this_in_production';

/**
 * Raised at startup when the environment cannot produce a usable configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value === undefined || value.trim() === '' ? fallback : value;
}

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`${key} must be an integer, got "${raw}"`);
  }

  const value = parseInt(raw, 10);
  if (value < min) {
    throw new ConfigError(`${key} must be at least ${min}, got ${value}`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigError(`${key} must be a boolean, got "${raw}"`);
  }
}

function deepFreeze(value: object): void {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
}

/**
 * Build the process-wide configuration from environment variables
 * with sensible defaults. The result is frozen.
 */
export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = readString(env, 'NODE_ENV', 'development');
  const secretKey = readString(env, 'CRM_SECRET_KEY', DEFAULT_SECRET_KEY);

  if (nodeEnv === 'production' && secretKey === DEFAULT_SECRET_KEY) {
    throw new ConfigError('CRM_SECRET_KEY must be set in production');
  }

  const appConfig: AppConfig = {
    port: readInt(env, 'PORT', 3000),
    nodeEnv,

    database: {
      connectionString: env.DATABASE_URL || undefined,
      host: readString(env, 'DATABASE_HOST', 'localhost'),
      port: readInt(env, 'DATABASE_PORT', 5432, 1),
      database: readString(env, 'DATABASE_NAME', 'crm_local'),
      user: readString(env, 'DATABASE_USER', 'postgres'),
      password: env.DATABASE_PASSWORD ?? '',
      ssl: readBool(env, 'DATABASE_SSL', false),
      max: 10, // Maximum pool size
      idleTimeoutMillis: 30000, // Close idle clients after 30s
      connectionTimeoutMillis: 5000, // Timeout connection attempts after 5s
    },

    logging: {
      level: readString(env, 'LOG_LEVEL', 'info'),
      file: env.LOG_FILE || undefined,
    },

    auth: {
      secretKey,
      tokenExpireMinutes: readInt(env, 'CRM_TOKEN_EXPIRE_MINUTES', 480, 1),
      adminUsername: readString(env, 'CRM_ADMIN_USERNAME', 'admin'),
      adminPassword: readString(env, 'CRM_ADMIN_PASSWORD', 'admin'),
      sessionCookieName: readString(env, 'CRM_SESSION_COOKIE_NAME', 'session_token'),
      sessionCookieSecure: readBool(env, 'CRM_SESSION_COOKIE_SECURE', false),
      passwordMinLength: readInt(env, 'CRM_PASSWORD_MIN_LENGTH', 8, 1),
      bcryptRounds: readInt(env, 'CRM_BCRYPT_ROUNDS', 12, 4),
    },

    loginRateLimit: {
      windowMs: readInt(env, 'CRM_LOGIN_RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000, 1),
      max: readInt(env, 'CRM_LOGIN_RATE_LIMIT_MAX', 20, 1),
    },
  };

  deepFreeze(appConfig);
  return appConfig;
}

/**
 * Process configuration, loaded once on import
 */
export const config: Config = loadConfig();
