import { resolve } from 'node:path';
import { configureLogger, describeError, flushLogs, log } from '@chat-quiz/logger';
import { loadServerConfig } from './config';
import { createApplicationContext } from './context';
import { loadDefinitions } from './definitions-repository';
import { createWebhookServer } from './server';

async function main(): Promise<void> {
  const config = loadServerConfig();
  configureLogger(config.logging);
  const definitions = await loadDefinitions(resolve(config.dataDir));
  const ctx = createApplicationContext(config, definitions);
  const app = createWebhookServer(ctx, config);

  const server = app.listen(config.port, () => {
    log('INFO', 'Server is listening', { layer: 'SERVER', port: config.port, deliveryMode: config.deliveryMode });
  });

  const shutdown = (signal: string) => {
    log('INFO', 'Shutting down', { layer: 'SERVER', signal });
    server.close(() => {
      void flushLogs().finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(async (err: unknown) => {
  log('ERROR', 'Server failed to start', { layer: 'SERVER', ...describeError(err) });
  await flushLogs();
  process.exit(1);
});
