import 'dotenv/config';
import { createServer } from '@/api/server.js';
import { loadConfig } from '@/config/loader.js';
import { createLogger } from '@/observability/logger.js';
import { createAdmissionController } from '@/webhook/admission-controller.js';

async function start(): Promise<void> {
  const configResult = await loadConfig();
  if (!configResult.ok) {
    const bootLogger = createLogger();
    bootLogger.fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }

  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel });

  try {
    const admissionController = createAdmissionController({
      logger,
      disallowUnknownFields: config.disallowUnknownFields,
    });

    const server = await createServer({
      admissionController,
      webhookPath: config.webhookPath,
      logger,
    });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port: config.port, host: config.host });
    logger.info(`Admission webhook listening on ${config.host}:${config.port}`, {
      component: 'main',
      webhookPath: config.webhookPath,
      disallowUnknownFields: config.disallowUnknownFields,
    });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
