import express, { Application, Request, Response, NextFunction } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import { Config } from './config/config';
import { UserRepository } from './repositories/user.repository';
import { PasswordService } from './services/password.service';
import { TokenService } from './services/token.service';
import { SessionTransport } from './services/session.service';
import { UserService } from './services/user.service';
import { AuthGuard, createAuthGuard } from './middleware/auth.middleware';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { createLoginRateLimiter } from './middleware/rate.middleware';
import { AuthController } from './controllers/auth.controller';
import { AccountController } from './controllers/account.controller';
import { AdminController } from './controllers/admin.controller';
import { createAuthRoutes } from './routes/auth.routes';
import { createAccountRoutes } from './routes/account.routes';
import { createAdminRoutes } from './routes/admin.routes';
import { Clock, systemClock } from './utils/clock';
import { logger, logRequest } from './utils/logger';

export const LOGIN_PATH = '/login';

export interface AppServices {
  passwords: PasswordService;
  tokens: TokenService;
  transport: SessionTransport;
  users: UserService;
  guard: AuthGuard;
}

/**
 * Wire the auth components from configuration and a credential store
 */
export function createServices(
  config: Config,
  repository: UserRepository,
  clock: Clock = systemClock
): AppServices {
  const passwords = new PasswordService(config.auth);
  const tokens = new TokenService(config.auth, clock);
  const transport = new SessionTransport(config.auth);
  const users = new UserService(repository, passwords, clock);
  const guard = createAuthGuard({ tokens, transport, users });

  return { passwords, tokens, transport, users, guard };
}

/**
 * Create and configure Express application
 */
export function createApp(config: Config, services: AppServices): Application {
  const app = express();

  // ============================================
  // Security Middleware
  // ============================================

  app.use(helmet());

  // Same-origin UI: no cross-origin access to the session endpoints
  app.use(
    cors({
      origin: false,
      credentials: true,
    })
  );

  // ============================================
  // Body & Cookie Parsing Middleware
  // ============================================

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(cookieParser());

  // ============================================
  // Request Logging Middleware
  // ============================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    // Log when response finishes
    res.on('finish', () => {
      const duration = Date.now() - startTime;
      logRequest(req.method, req.originalUrl, res.statusCode, duration);
    });

    next();
  });

  // ============================================
  // Health Check
  // ============================================

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // ============================================
  // API Routes
  // ============================================

  const authController = new AuthController(services);
  const accountController = new AccountController(services);
  const adminController = new AdminController(services.users);

  app.use('/', createAuthRoutes(authController, createLoginRateLimiter(config.loginRateLimit)));
  app.use('/account', createAccountRoutes(accountController, services.guard));
  app.use('/admin', createAdminRoutes(adminController, services.guard));

  // ============================================
  // Error Handling
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(
    createErrorHandler({
      loginPath: LOGIN_PATH,
      includeStack: config.nodeEnv === 'development',
    })
  );

  logger.debug('Express application configured successfully');

  return app;
}
