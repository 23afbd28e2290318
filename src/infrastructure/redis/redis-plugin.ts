import fp from 'fastify-plugin';
import type Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { createRedisClient, inspectRunQueue } from './connection.js';
import { RUN_STREAM_KEY } from './run-producer.js';

/**
 * Connects the run queue and decorates `fastify.redis`.
 *
 * Boot fails when Redis is unreachable, since `POST /api/v1/runs` could not
 * queue anything. The current stream length is logged once connected.
 */
async function redisPlugin(fastify: FastifyInstance): Promise<void> {
  const redis = createRedisClient();

  await redis.connect();
  const status = await inspectRunQueue(redis);
  fastify.log.info({ stream: RUN_STREAM_KEY, queued: status.queued }, 'Run queue connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Run queue disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
