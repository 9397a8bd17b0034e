import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/auth.controller';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Login / logout routes
 */
export function createAuthRoutes(controller: AuthController, loginLimiter: RequestHandler): Router {
  const router = Router();

  /**
   * POST /login
   * Credentials in, session cookie out
   */
  router.post(
    '/login',
    loginLimiter,
    asyncHandler(async (req, res) => {
      await controller.login(req, res);
    })
  );

  /**
   * POST /logout
   * Clears the session cookie; no guard so stale cookies can always be dropped
   */
  router.post(
    '/logout',
    asyncHandler(async (req, res) => {
      await controller.logout(req, res);
    })
  );

  return router;
}
