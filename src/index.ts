import { loadConfig } from './config/index.js';
import { ServerStartError } from './errors/index.js';
import { initSentry } from './instrument.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig();

  initSentry(config.sentry, createLogger(config.logging, 'stowage-bootstrap'));

  // Create server
  const server = await createServer({ config });

  // Start listening
  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    server.log.error({ err: new ServerStartError(reason) }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown: onClose releases every live operator handle
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      server.log.error(err, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
