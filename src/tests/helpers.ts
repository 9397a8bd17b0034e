import { Application } from 'express';
import { AppServices, createApp, createServices } from '../app';
import { Config, Env, loadConfig } from '../config/config';
import { InMemoryUserRepository } from '../repositories/memory-user.repository';
import { FixedClock } from '../utils/clock';

export const TEST_SECRET = 'test-secret';
export const START_TIME = new Date('2026-03-02T09:00:00.000Z');

export const TEST_ENV: Env = {
  NODE_ENV: 'test',
  CRM_SECRET_KEY: TEST_SECRET,
  CRM_BCRYPT_ROUNDS: '4',
  CRM_PASSWORD_MIN_LENGTH: '8',
  CRM_TOKEN_EXPIRE_MINUTES: '480',
};

export function buildTestConfig(overrides: Env = {}): Config {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export interface TestContext {
  config: Config;
  clock: FixedClock;
  repository: InMemoryUserRepository;
  services: AppServices;
  app: Application;
}

export interface TestContextOptions {
  env?: Env;
  repository?: InMemoryUserRepository;
  clock?: FixedClock;
}

/**
 * Full application over an in-memory user store and a pinned clock
 */
export function buildTestContext(options: TestContextOptions = {}): TestContext {
  const config = buildTestConfig(options.env);
  const clock = options.clock ?? new FixedClock(START_TIME);
  const repository = options.repository ?? new InMemoryUserRepository();
  const services = createServices(config, repository, clock);
  const app = createApp(config, services);
  return { config, clock, repository, services, app };
}

/**
 * Set-Cookie headers of a supertest response
 */
export function getSetCookies(res: { headers: Record<string, unknown> }): string[] {
  const raw = res.headers['set-cookie'];
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.filter((value): value is string => typeof value === 'string');
}

/**
 * Value of the named cookie in a list of Set-Cookie headers, or null
 */
export function cookieValue(setCookies: string[], name: string): string | null {
  for (const header of setCookies) {
    const [pair] = header.split(';');
    const index = pair.indexOf('=');
    if (index > 0 && pair.substring(0, index) === name) {
      return decodeURIComponent(pair.substring(index + 1));
    }
  }
  return null;
}
