import { createApp } from '@/app';
import { loadConfig, serverAddr } from '@/config/app.config';
import { connectDatabase } from '@/db/connection';
import { runMigrations } from '@/db/migrator';
import { logger, setLogLevel } from '@/lib/logger';
import { FlowerRepository } from '@/repositories/flower.repository';
import { FlowerService } from '@/services/flower.service';

const main = async () => {
  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  logger.info(`🌸 Starting Flower API on ${serverAddr(config)}`);
  logger.info(`📊 Environment: ${config.nodeEnv}`);

  // Initialize database
  logger.info('Connecting to database...');
  const connection = await connectDatabase({
    databaseUrl: config.databaseUrl,
    maxConnections: config.dbMaxConnections,
  });

  // Run migrations
  logger.info('Running migrations...');
  const applied = await runMigrations(connection.db, config.migrationsDir);
  logger.info(`✅ Migrations completed successfully (${applied.length} applied)`);

  const flowerService = new FlowerService(new FlowerRepository(connection.db));
  const publicUrl = `http://${serverAddr(config)}`;
  const app = createApp({ flowerService, corsOrigin: config.corsOrigin, publicUrl });

  const server = app.listen(config.serverPort, config.serverHost, () => {
    logger.info(`🚀 Flower API is running on ${publicUrl}`);
    logger.info(`📚 OpenAPI document available at ${publicUrl}/openapi.json`);
  });

  // Graceful shutdown
  const gracefulShutdown = (signal: string) => {
    logger.info(`📴 Received ${signal}. Starting graceful shutdown...`);

    server.close(async closeError => {
      try {
        await connection.close();
        logger.info('✅ Server closed successfully');
        await logger.flush();
        process.exit(closeError ? 1 : 0);
      } catch (error) {
        logger.error('❌ Error during graceful shutdown:', error instanceof Error ? error : { error });
        process.exit(1);
      }
    });
  };

  // Handle shutdown signals
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

main().catch(async (error: unknown) => {
  logger.error('❌ Failed to start server:', error instanceof Error ? error : { error });
  await logger.flush();
  process.exit(1);
});
