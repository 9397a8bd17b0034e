import { Router } from 'express';
import { AccountController } from '../controllers/account.controller';
import { AuthGuard } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';

export function createAccountRoutes(controller: AccountController, guard: AuthGuard): Router {
  const router = Router();

  router.use(guard.requireUser);

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      await controller.getAccount(req, res);
    })
  );

  router.post(
    '/password',
    asyncHandler(async (req, res) => {
      await controller.changePassword(req, res);
    })
  );

  return router;
}
