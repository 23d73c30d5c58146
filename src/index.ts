import { Server } from 'http';
import { loadConfigFromEnvironment } from './config';
import { connectRedisPublisher, RedisPublisherHandle } from './config/redis';
import { createApp } from './app';
import { DispatchCoordinator } from './services/DispatchCoordinator';
import { RecentEventsObserver } from './services/observers';
import { RedisEventRelay } from './services/RedisEventRelay';
import { createMatchingPolicy } from './algorithms/matching';
import { buildFarePipeline } from './algorithms/pricing';
import { createSeededRandom, defaultRandom } from './utils/random';
import { seedDemoFleet } from './fleet/seedFleet';
import { logger } from './utils/logger';

async function start(): Promise<void> {
  const config = loadConfigFromEnvironment();
  logger.setLevel(config.logLevel);

  const coordinator = new DispatchCoordinator({
    matchingPolicy: createMatchingPolicy(config.matchingPolicy),
    farePipeline: buildFarePipeline(config.fareModifiers),
    random: config.acceptanceSeed !== undefined ? createSeededRandom(config.acceptanceSeed) : defaultRandom
  });

  const history = new RecentEventsObserver();
  coordinator.subscribe(history);

  let redis: RedisPublisherHandle | undefined;
  let relay: RedisEventRelay | undefined;
  if (config.redis) {
    redis = await connectRedisPublisher(config.redis.url);
    relay = new RedisEventRelay(redis.publisher, config.redis.channel);
    coordinator.subscribe(relay);
    logger.info('Relaying dispatch events to Redis', { channel: config.redis.channel });
  }

  if (config.seedDemoFleet) {
    seedDemoFleet(coordinator);
  }

  const app = createApp({ coordinator, history, rateLimit: config.rateLimit });

  const server: Server = app.listen(config.port, () => {
    logger.info('Server running', {
      port: config.port,
      docs: `http://localhost:${config.port}/api-docs`,
      health: `http://localhost:${config.port}/health`,
      matchingPolicy: config.matchingPolicy,
      farePipeline: coordinator.getSystemStatus().farePipeline
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      const drained = relay ? relay.flush() : Promise.resolve();
      drained
        .then(() => redis?.disconnect())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
