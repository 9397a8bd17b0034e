import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { TokenService } from '../services/token.service';
import { SessionTransport } from '../services/session.service';
import { UserService } from '../services/user.service';
import { AuthenticatedUser, Role } from '../types/user.types';
import {
  asyncHandler,
  AuthError,
  ForbiddenError,
  UnauthenticatedError,
} from './error.middleware';

// Extend Express Request to include the resolved identity
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

export interface AuthGuardDeps {
  tokens: TokenService;
  transport: SessionTransport;
  users: UserService;
}

export interface AuthGuard {
  /** Resolves the current user or fails with UnauthenticatedError */
  requireUser: RequestHandler;
  /** requireUser followed by the admin role check */
  requireAdmin: RequestHandler[];
  /** Resolves the identity without side effects; null when there is none */
  identify(req: Request): Promise<AuthenticatedUser | null>;
}

/**
 * Role predicate for use after requireUser
 */
export function requireRole(role: Role): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthenticatedError());
      return;
    }

    if (req.user.role !== role) {
      logger.warn('Access denied', { username: req.user.username, required: role });
      next(new ForbiddenError('You do not have permission to perform this action.'));
      return;
    }

    next();
  };
}

export function createAuthGuard({ tokens, transport, users }: AuthGuardDeps): AuthGuard {
  /**
   * Token → username → active user. Token failures (expired, bad signature,
   * malformed) and unknown or inactive users all come back as null.
   */
  async function identify(req: Request): Promise<AuthenticatedUser | null> {
    const token = transport.extract(req);
    if (!token) {
      return null;
    }

    let username: string;
    try {
      username = await tokens.validate(token);
    } catch (error) {
      if (error instanceof AuthError) {
        logger.debug('Session token rejected', { reason: error.name });
        return null;
      }
      throw error;
    }

    const user = await users.findByUsername(username);
    if (!user || !user.isActive) {
      logger.debug('Session user missing or inactive', { username });
      return null;
    }

    return { username: user.username, role: user.role };
  }

  const requireUser = asyncHandler(async (req, res, next) => {
    const identity = await identify(req);

    if (!identity) {
      transport.clear(res);
      throw new UnauthenticatedError();
    }

    await users.touch(identity.username);

    req.user = identity;
    next();
  });

  return {
    requireUser,
    requireAdmin: [requireUser, requireRole('admin')],
    identify,
  };
}
