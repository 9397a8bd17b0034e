import { Router } from 'express';
import { AdminController } from '../controllers/admin.controller';
import { AuthGuard } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Admin user management routes.
 * Every route requires an authenticated user with role 'admin'.
 */
export function createAdminRoutes(controller: AdminController, guard: AuthGuard): Router {
  const router = Router();

  router.use(guard.requireAdmin);

  /**
   * GET /admin/users
   */
  router.get(
    '/users',
    asyncHandler(async (req, res) => {
      await controller.listUsers(req, res);
    })
  );

  /**
   * POST /admin/users
   * - 201: user created
   * - 400: malformed username or role
   * - 409: username taken
   * - 422: password policy
   */
  router.post(
    '/users',
    asyncHandler(async (req, res) => {
      await controller.createUser(req, res);
    })
  );

  /**
   * POST /admin/users/:username/password
   * Reset another user's password without the old one; policy still applies.
   * 400 when the target is the acting admin.
   */
  router.post(
    '/users/:username/password',
    asyncHandler(async (req, res) => {
      await controller.resetPassword(req, res);
    })
  );

  /**
   * PATCH /admin/users/:username
   */
  router.patch(
    '/users/:username',
    asyncHandler(async (req, res) => {
      await controller.updateUser(req, res);
    })
  );

  return router;
}
