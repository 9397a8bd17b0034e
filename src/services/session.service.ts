import { CookieOptions, Request, Response } from 'express';
import { Config } from '../config/config';

type SessionSettings = Pick<
  Config['auth'],
  'sessionCookieName' | 'sessionCookieSecure' | 'tokenExpireMinutes'
>;

/**
 * The one place the session cookie name is read. Attach, extract and clear
 * all resolve the name through here so they cannot drift apart.
 */
export function sessionCookieName(settings: Pick<SessionSettings, 'sessionCookieName'>): string {
  return settings.sessionCookieName;
}

/**
 * Carries the identity token between client and server in an HTTP-only cookie
 */
export class SessionTransport {
  private settings: SessionSettings;

  constructor(settings: SessionSettings) {
    this.settings = settings;
  }

  get cookieName(): string {
    return sessionCookieName(this.settings);
  }

  private baseOptions(): CookieOptions {
    return {
      httpOnly: true,
      secure: this.settings.sessionCookieSecure,
      sameSite: 'lax',
      path: '/',
    };
  }

  attach(res: Response, token: string): void {
    res.cookie(sessionCookieName(this.settings), token, {
      ...this.baseOptions(),
      maxAge: this.settings.tokenExpireMinutes * 60 * 1000,
    });
  }

  /**
   * Read the token from the session cookie, falling back to a bearer
   * Authorization header for non-browser clients
   */
  extract(req: Request): string | null {
    const cookies: unknown = req.cookies;
    if (typeof cookies === 'object' && cookies !== null) {
      const value: unknown = Reflect.get(cookies, sessionCookieName(this.settings));
      if (typeof value === 'string' && value !== '') {
        return value;
      }
    }

    const authHeader = req.get('Authorization');
    if (authHeader && authHeader.toLowerCase().startsWith('bearer ')) {
      const token = authHeader.substring(7).trim();
      return token === '' ? null : token;
    }

    return null;
  }

  /**
   * Expire the session cookie immediately
   */
  clear(res: Response): void {
    res.clearCookie(sessionCookieName(this.settings), this.baseOptions());
  }
}
