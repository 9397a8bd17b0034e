import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { UnauthenticatedError, ValidationError } from '../middleware/error.middleware';
import { isRole, UserPatch } from '../types/user.types';
import { asBody, optionalBoolean, requireString } from '../utils/validation.utils';

/**
 * Admin Controller
 * User management; every route is behind requireAdmin
 */
export class AdminController {
  private users: UserService;

  constructor(users: UserService) {
    this.users = users;
  }

  private currentUsername(req: Request): string {
    if (!req.user) {
      throw new UnauthenticatedError();
    }
    return req.user.username;
  }

  /**
   * GET /admin/users
   */
  async listUsers(_req: Request, res: Response): Promise<void> {
    const users = await this.users.listUsers();
    res.status(200).json({ users });
  }

  /**
   * POST /admin/users
   * Body: { username, password, role }
   */
  async createUser(req: Request, res: Response): Promise<void> {
    const body = asBody(req.body);
    const username = requireString(body, 'username');
    const password = requireString(body, 'password');
    const role = body.role ?? 'standard';

    const user = await this.users.createUser(username, password, role);
    res.status(201).json({ user });
  }

  /**
   * POST /admin/users/:username/password
   * Body: { newPassword }
   */
  async resetPassword(req: Request, res: Response): Promise<void> {
    const actor = this.currentUsername(req);
    const body = asBody(req.body);
    const newPassword = requireString(body, 'newPassword');

    await this.users.resetPassword(actor, req.params.username, newPassword);
    res.status(200).json({ message: 'Password reset successfully.' });
  }

  /**
   * PATCH /admin/users/:username
   * Body: { role?, isActive? }
   */
  async updateUser(req: Request, res: Response): Promise<void> {
    const actor = this.currentUsername(req);
    const body = asBody(req.body);
    const patch: UserPatch = {};

    if (body.role !== undefined) {
      if (!isRole(body.role)) {
        throw new ValidationError('Role must be "admin" or "standard"');
      }
      patch.role = body.role;
    }

    const isActive = optionalBoolean(body, 'isActive');
    if (isActive !== undefined) {
      patch.isActive = isActive;
    }

    const user = await this.users.updateUser(actor, req.params.username, patch);
    res.status(200).json({ user });
  }
}
