import { createClient } from 'redis';
import { logger } from '../utils/logger';
import { EventPublisher } from '../services/RedisEventRelay';

export interface RedisPublisherHandle {
  publisher: EventPublisher;
  disconnect(): Promise<void>;
}

/**
 * Connect a Redis client used only for publishing dispatch events.
 */
export async function connectRedisPublisher(url: string): Promise<RedisPublisherHandle> {
  const client = createClient({ url });

  client.on('error', (err) => logger.error('Redis client error', err));
  client.on('connect', () => logger.info('Redis connected'));

  await client.connect();

  return {
    publisher: {
      publish: (channel, message) => client.publish(channel, message)
    },
    disconnect: async () => {
      await client.quit();
    }
  };
}
