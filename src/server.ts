import { buildApp } from './app';
import { config } from './config';
import { logger } from './observability/logger';

async function start() {
  logger.info('=== container-lab start ===');
  const server = await buildApp();
  await server.listen({ port: config.port, host: config.host });
  logger.info('server listening', { port: config.port, host: config.host });
}

start().catch((err) => {
  logger.error('failed to start server', err);
  process.exit(1);
});
