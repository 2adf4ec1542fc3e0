import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { FlowerController } from '@/controllers/flower.controller';
import { getOpenApiDocument } from '@/docs/openapi';
import { logger } from '@/lib/logger';
import { errorHandler } from '@/middleware/error-handler';
import { notFoundHandler } from '@/middleware/not-found-handler';
import { createFlowerRouter } from '@/routes/flower.routes';
import type { FlowerService } from '@/services/flower.service';

export interface AppDependencies {
  flowerService: FlowerService;
  corsOrigin?: string;
  publicUrl?: string;
  accessLog?: boolean;
}

/**
 * Build the Express application around the given services
 */
export const createApp = ({
  flowerService,
  corsOrigin = '*',
  publicUrl,
  accessLog = true,
}: AppDependencies): Express => {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: corsOrigin === '*' ? '*' : corsOrigin.split(',').map(origin => origin.trim()),
    })
  );

  // Logging middleware
  if (accessLog) {
    app.use(
      morgan('combined', {
        stream: {
          write: (message: string) => logger.info(message.trim()),
        },
      })
    );
  }

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({ success: true, data: 'OK' });
  });

  // OpenAPI document
  app.get('/openapi.json', (_req, res) => {
    res.status(200).json(getOpenApiDocument(publicUrl));
  });

  // API routes
  const flowerController = new FlowerController(flowerService);
  app.use('/api/flowers', createFlowerRouter(flowerController));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
