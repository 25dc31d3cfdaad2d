import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';
import { RedisSessionStore } from './session/session-store';

async function main(): Promise<void> {
  const { app, redis, store } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    await app.close();
    if (store instanceof RedisSessionStore) {
      store.close();
    }
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => logger.error({ err }, 'Shutdown failed'));
  });

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({
      port: env.port,
      env: env.nodeEnv,
      primaryProvider: env.llm.primaryProvider,
    }, 'Support ticket router started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
