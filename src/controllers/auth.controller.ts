import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { TokenService } from '../services/token.service';
import { SessionTransport } from '../services/session.service';
import { AuthGuard } from '../middleware/auth.middleware';
import { toPublicUser } from '../types/user.types';
import { asBody, requireString } from '../utils/validation.utils';
import { logger } from '../utils/logger';

export interface AuthControllerDeps {
  users: UserService;
  tokens: TokenService;
  transport: SessionTransport;
  guard: AuthGuard;
}

/**
 * Auth Controller
 * Session lifecycle: login issues the cookie, logout clears it
 */
export class AuthController {
  private deps: AuthControllerDeps;

  constructor(deps: AuthControllerDeps) {
    this.deps = deps;
  }

  /**
   * POST /login
   * Body: { username, password }
   */
  async login(req: Request, res: Response): Promise<void> {
    const body = asBody(req.body);
    const username = requireString(body, 'username').trim();
    const password = requireString(body, 'password');

    const user = await this.deps.users.authenticate(username, password);
    const { token, expiresAt } = await this.deps.tokens.issue(user.username);
    this.deps.transport.attach(res, token);

    res.status(200).json({
      user: toPublicUser(user),
      expiresAt: expiresAt.toISOString(),
    });
  }

  /**
   * POST /logout
   * Always clears the cookie; records the logout when the token was valid.
   * Recording is best effort and never fails the request.
   */
  async logout(req: Request, res: Response): Promise<void> {
    this.deps.transport.clear(res);

    try {
      const identity = await this.deps.guard.identify(req);
      if (identity) {
        await this.deps.users.recordLogout(identity.username);
      }
    } catch (error) {
      logger.warn('Could not record logout', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    res.status(200).json({ message: 'Logged out successfully.' });
  }
}
