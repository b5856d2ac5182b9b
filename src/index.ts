import * as dotenv from 'dotenv';
import { App } from './app';
import { AppConfig, loadConfig } from './config/config';
import { closeDatabase, connectDatabase, createDatabase, Database, syncDatabase } from './db/database';
import { errorMessage, errorStack } from './utils/errors';
import logger from './utils/logger';

dotenv.config();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error(`PostResponseService: ${errorMessage(error)}`, { type: 'StartupLog.FatalConfigError' });
  process.exit(1);
}

const SHUTDOWN_TIMEOUT_MS = 10000;

const startService = async () => {
  logger.info('Post Response Service starting...', { type: 'StartupLog.Init' });
  let database: Database | undefined;
  try {
    database = createDatabase(config.databaseUrl, logger);
    await connectDatabase(database, logger);
    if (config.syncSchema) {
      await syncDatabase(database, logger);
    }

    const appInstance = new App(database, { corsOrigins: config.corsOrigins });
    const expressApp = appInstance.app;
    const activeDatabase = database;

    const server = expressApp.listen(config.port, () => {
      logger.info(`Post Response Service is running on port ${config.port}`, { port: config.port, type: 'StartupLog.HttpReady' });
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} received. Shutting down Post Response Service gracefully.`, { signal, type: 'ShutdownLog.SignalReceived' });
      server.close((err?: Error) => {
        if (err) {
          logger.error('Error during HTTP server close:', { error: err.message, stack: err.stack, type: 'ShutdownLog.HttpCloseError' });
        } else {
          logger.info('HTTP server closed.', { type: 'ShutdownLog.HttpClosed' });
        }
        closeDatabase(activeDatabase, logger)
          .catch(closeError => logger.error('Error closing database pool', { error: errorMessage(closeError), type: 'ShutdownLog.DatabaseCloseError' }))
          .finally(() => process.exit(err ? 1 : 0));
      });

      setTimeout(() => {
        logger.error('Could not close connections in time, forcefully shutting down', { timeout: SHUTDOWN_TIMEOUT_MS, type: 'ShutdownLog.ForceExit' });
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('uncaughtException', (error) => {
      logger.error('Unhandled synchronous error (uncaughtException):', { error: error.message, stack: error.stack, type: 'FatalErrorLog.UncaughtException' });
      closeDatabase(activeDatabase, logger)
        .catch(closeError => logger.error('Error closing database pool after fatal error', { error: errorMessage(closeError), type: 'ShutdownLog.DatabaseCloseError' }))
        .finally(() => process.exit(1));
    });
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled promise rejection:', { reason: errorMessage(reason), stack: errorStack(reason), type: 'FatalErrorLog.UnhandledRejection' });
    });
  } catch (error) {
    logger.error('Failed to start Post Response Service.', { error: errorMessage(error), stack: errorStack(error), type: 'StartupLog.FatalError' });
    if (database) {
      await closeDatabase(database, logger).catch(closeError => logger.error('Error closing database pool during failed startup', { error: errorMessage(closeError), type: 'ShutdownLog.DatabaseFailClose' }));
    }
    process.exit(1);
  }
};

startService();
