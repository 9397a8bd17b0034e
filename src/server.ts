import { createApp, createServices } from './app';
import { config } from './config/config';
import { Database } from './config/database';
import { PgUserRepository } from './repositories/user.repository';
import { logError, logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  const db = new Database(config.database);

  try {
    if (!(await db.testConnection())) {
      logger.error('Cannot start without the credential store');
      await db.close();
      process.exit(1);
    }

    const services = createServices(config, new PgUserRepository(db));
    await services.users.ensureDefaultAdmin(config.auth);

    const app = createApp(config, services);
    const server = app.listen(config.port, () => {
      logger.info('CRM auth service listening', {
        port: config.port,
        environment: config.nodeEnv,
        sessionCookie: services.transport.cookieName,
        tokenExpireMinutes: config.auth.tokenExpireMinutes,
      });
    });

    let shuttingDown = false;
    const shutdown = (signal: string): void => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`${signal} received, shutting down`);

      server.close(() => {
        db.close()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logError('Database pool did not close cleanly', error);
            process.exit(1);
          });
      });

      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logError('Uncaught exception', error);
      shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logError('Unhandled rejection', reason);
      shutdown('unhandledRejection');
    });
  } catch (error) {
    logError('Failed to start server', error);
    await db.close().catch((closeError: unknown) => {
      logError('Database pool did not close cleanly', closeError);
    });
    process.exit(1);
  }
}

void startServer();
