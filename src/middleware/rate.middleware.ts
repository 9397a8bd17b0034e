import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Config } from '../config/config';

/**
 * Per-IP limiter for the login endpoint.
 * Slows down password guessing; only failed attempts count.
 */
export function createLoginRateLimiter(settings: Config['loginRateLimit']): RateLimitRequestHandler {
  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.max,
    skipSuccessfulRequests: true,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'TooManyRequests',
      message: 'Too many login attempts. Please try again later.',
      statusCode: 429,
    },
  });
}
