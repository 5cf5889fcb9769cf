import { loadConfig } from './config/index.js';
import { createServer } from './api/server.js';
import { DatabaseConnection } from './db/database.js';
import { ChallengesRepository } from './db/repositories/challenges.repository.js';
import { CompletionsRepository } from './db/repositories/completions.repository.js';
import { ProfilesRepository } from './db/repositories/profiles.repository.js';
import { S3BlobStoreService } from './services/storage/s3BlobStore.service.js';
import { LocalMediaService } from './services/storage/localMedia.service.js';
import { OpenAIImageComparator } from './services/comparator/imageComparator.service.js';
import { PhotoSubmissionService } from './services/submission/photoSubmission.service.js';
import { PhotosHandler } from './handlers/photos.handler.js';
import { CompletionsHandler } from './handlers/completions.handler.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info('Starting Photo Hunt Backend...');

  try {
    const config = loadConfig();

    // Initialize database
    logger.info('Initializing database...');
    const dbConnection = new DatabaseConnection({
      connectionString: config.databaseUrl,
      production: config.nodeEnv === 'production',
    });
    await dbConnection.initialize();
    const challengesRepository = new ChallengesRepository(dbConnection.getAdapter());
    const completionsRepository = new CompletionsRepository(dbConnection.getAdapter());
    const profilesRepository = new ProfilesRepository(dbConnection.getAdapter());

    // Initialize services
    logger.info('Initializing services...');
    const blobStore = new S3BlobStoreService(config.storage);
    const localMedia = new LocalMediaService(config.media);
    const comparator = new OpenAIImageComparator(config.comparator);
    const submissionService = new PhotoSubmissionService(
      challengesRepository,
      completionsRepository,
      blobStore,
      localMedia,
      comparator,
      { presignTtlSeconds: config.presignTtlSeconds }
    );

    // Initialize handlers
    const photosHandler = new PhotosHandler(submissionService);
    const completionsHandler = new CompletionsHandler(completionsRepository, profilesRepository);

    // Create and start server
    const app = createServer({ photosHandler, completionsHandler }, config);

    const port = config.port;

    const server = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');
      });

      // Close database
      await dbConnection.close();

      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.fatal({ reason, promise }, 'Unhandled Rejection');
  process.exit(1);
});

// Start the application
main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
