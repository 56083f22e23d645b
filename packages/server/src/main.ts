import * as dotenv from 'dotenv';
import { createValidatorPipeline, loadConfig, LoggingEventHooks } from '@efaktur/kernel';
import { createSafeLogger } from '@efaktur/shared';
import { createAppServer, listen } from './app.js';
import { createProviders } from './create-providers.js';

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig(process.env);
  const logger = createSafeLogger({ level: config.logLevel });

  const { providers, close } = await createProviders(config, logger);
  const pipeline = createValidatorPipeline(providers, config, {
    logger,
    events: new LoggingEventHooks(logger),
  });

  const server = createAppServer({ validator: pipeline, maxUploadBytes: config.maxUploadBytes, logger });
  try {
    await listen(server, config.port, config.host);
  } catch (error) {
    logger.error('Server failed to start', {
      host: config.host,
      port: config.port,
      error: error instanceof Error ? error.message : String(error),
    });
    await close();
    process.exit(1);
  }
  logger.info('E-Faktur validation service listening', {
    host: config.host,
    port: config.port,
    authorityMode: config.authority.mode,
  });
  server.on('error', (error) => {
    logger.error('Server failed', { error: error.message });
    process.exit(1);
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('OCR worker did not stop cleanly', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        },
      );
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
