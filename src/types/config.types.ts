// ============================================
// Configuration Types
// ============================================

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface AuthConfig {
  secretKey: string;
  tokenExpireMinutes: number;
  adminUsername: string;
  adminPassword: string;
  sessionCookieName: string;
  sessionCookieSecure: boolean;
  passwordMinLength: number;
  bcryptRounds: number;
}

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  database: DatabaseConfig;
  logging: LoggingConfig;
  auth: AuthConfig;
  loginRateLimit: RateLimitConfig;
}

/**
 * Deeply readonly view of a configuration object.
 * Configuration is built once at startup and never mutated afterwards.
 */
export type Frozen<T> = {
  readonly [K in keyof T]: T[K] extends object ? Frozen<T[K]> : T[K];
};
