import { app } from './app'; // Imports from app.ts
import { config } from '@/config/env';
import { connectDatabase, disconnectDatabase } from '@/lib/mongoose';
import { logger } from '@/lib/logger';

const start = async (): Promise<void> => {
  if (config.storageDriver === 'mongo') {
    await connectDatabase(config.mongoUri);
  } else {
    logger.warn('Server', 'Using in-memory storage; attendance is lost on restart.');
  }

  const server = app.listen(config.port, () => {
    logger.info('Server', `Running on http://localhost:${config.port}`);
  });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('Server', `Received ${signal}, shutting down gracefully...`);
      server.close(() => {
        const done = config.storageDriver === 'mongo' ? disconnectDatabase() : Promise.resolve();
        done
          .catch((error: unknown) => logger.error('Server', 'Error while disconnecting from MongoDB', error))
          .finally(() => {
            logger.info('Server', 'Server closed.');
            process.exit(0);
          });
      });
    });
  });
};

start().catch((error: unknown) => {
  logger.error('Server', 'Failed to start', error);
  process.exit(1);
});
