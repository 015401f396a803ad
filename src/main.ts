import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the export worker
 * Application context only (no HTTP server); work arrives on the job queue.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const rootLogger = app.get(PinoLoggerService);

  app.useLogger(rootLogger);
  const logger = rootLogger.forContext('Bootstrap');

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });
  const storageConfig = configService.getOrThrow('storage', { infer: true });
  const workerPoolConfig = configService.getOrThrow('workerPool', { infer: true });

  // Enable graceful shutdown
  app.enableShutdownHooks();

  // Register shutdown handlers
  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, draining in-flight jobs...');
    await app.close();
    logger.info('Worker pool drained, application shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
  process.on('SIGINT', () => void shutdownHandler('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      queueUrl: sqsConfig.exportJobsUrl,
      storageDriver: storageConfig.driver,
      workerPool: workerPoolConfig.enabled ? workerPoolConfig.poolSize : 0,
    },
    'Document export service started',
  );
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start document export service:', error);
  process.exit(1);
});
