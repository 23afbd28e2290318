import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient, ensureTables } from './client.js';
import type { Database } from './client.js';

/**
 * Opens the run store and decorates `fastify.db`.
 *
 * The `mining_runs` and `mined_rules` tables are created before the routes
 * load, so the API can accept runs against a fresh database before any
 * worker has started.
 */
async function dbPlugin(fastify: FastifyInstance): Promise<void> {
  const { sql, db } = createDbClient();

  await ensureTables(sql);
  fastify.log.info('Run store ready (mining_runs + mined_rules tables)');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Run store disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
