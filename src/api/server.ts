import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import { Config } from '../config/index.js';
import { createPhotosRoutes } from './routes/photos.routes.js';
import { createCompletionsRoutes } from './routes/completions.routes.js';
import { createErrorMiddleware } from './middleware/error.middleware.js';
import { loggingMiddleware } from './middleware/logging.middleware.js';
import { contextMiddleware } from './middleware/context.middleware.js';
import { createAuthenticate } from './middleware/authenticate.middleware.js';
import { createPhotoUpload } from './middleware/photoUpload.middleware.js';
import { PhotosHandler } from '../handlers/photos.handler.js';
import { CompletionsHandler } from '../handlers/completions.handler.js';

export interface ServerDependencies {
  photosHandler: PhotosHandler;
  completionsHandler: CompletionsHandler;
}

export function createServer(dependencies: ServerDependencies, config: Config): Express {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' }, // Allow images from different origins
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-Id'],
      credentials: true,
    })
  );

  // Compression middleware
  app.use(compression());

  // Body parsing middleware (multipart is handled per route)
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Context middleware (must be before logging)
  app.use(contextMiddleware);

  // Logging middleware
  app.use(loggingMiddleware);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  // Photos that fell back to local disk
  app.use(config.media.urlPrefix, express.static(path.resolve(config.media.root)));

  const swaggerDocument = YAML.load(path.join(process.cwd(), 'swagger', 'swagger.yaml'));
  swaggerDocument.servers = [
    {
      url: `${config.media.publicBaseUrl ?? `http://localhost:${config.port}`}/api`,
      description: `${config.nodeEnv} server`,
    },
  ];
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));

  // Mount API routes
  const authenticate = createAuthenticate(config.jwtSecret);
  const photoUpload = createPhotoUpload(config.uploadMaxSize);

  app.use('/api/photos', createPhotosRoutes(dependencies.photosHandler, authenticate, photoUpload));
  app.use(
    '/api/completions',
    createCompletionsRoutes(dependencies.completionsHandler, authenticate)
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        message: `Cannot ${req.method} ${req.path}`,
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(createErrorMiddleware(config.nodeEnv === 'production'));

  return app;
}
