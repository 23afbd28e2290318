import Fastify from 'fastify';

import {
  redisPlugin,
  dbPlugin,
  miningConfigPlugin,
} from './infrastructure/index.js';

import {
  pipelineRoutes,
  runRoutes,
} from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration + infrastructure plugins
 * 2) HTTP routes
 * 3) listen()
 *
 * Runs are executed by the separate worker process (src/worker.ts).
 */
async function main(): Promise<void> {

  const fastify = Fastify({
    logger: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    bodyLimit: Number(process.env['BODY_LIMIT_BYTES'] ?? 10 * 1024 * 1024),
  });

  // --------------------------------------------------
  // Configuration + Infrastructure
  // --------------------------------------------------

  await fastify.register(miningConfigPlugin);
  await fastify.register(redisPlugin);
  await fastify.register(dbPlugin);

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(pipelineRoutes);
  await fastify.register(runRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({
    host,
    port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
