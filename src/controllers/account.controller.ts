import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { TokenService } from '../services/token.service';
import { SessionTransport } from '../services/session.service';
import { UnauthenticatedError } from '../middleware/error.middleware';
import { asBody, requireString } from '../utils/validation.utils';

export interface AccountControllerDeps {
  users: UserService;
  tokens: TokenService;
  transport: SessionTransport;
}

/**
 * Account Controller
 * Self-service endpoints for the signed-in user
 */
export class AccountController {
  private deps: AccountControllerDeps;

  constructor(deps: AccountControllerDeps) {
    this.deps = deps;
  }

  private currentUsername(req: Request): string {
    if (!req.user) {
      throw new UnauthenticatedError();
    }
    return req.user.username;
  }

  /**
   * GET /account
   */
  async getAccount(req: Request, res: Response): Promise<void> {
    const user = await this.deps.users.getUser(this.currentUsername(req));
    res.status(200).json({ user });
  }

  /**
   * POST /account/password
   * Body: { oldPassword, newPassword }
   *
   * Outstanding tokens stay valid until they expire; the caller gets a
   * freshly issued cookie.
   */
  async changePassword(req: Request, res: Response): Promise<void> {
    const username = this.currentUsername(req);
    const body = asBody(req.body);
    const oldPassword = requireString(body, 'oldPassword');
    const newPassword = requireString(body, 'newPassword');

    await this.deps.users.changePassword(username, oldPassword, newPassword);

    const { token } = await this.deps.tokens.issue(username);
    this.deps.transport.attach(res, token);

    res.status(200).json({ message: 'Password changed successfully.' });
  }
}
