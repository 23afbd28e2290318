import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { loadMiningConfig } from './mining-config.js';
import type { MiningConfig } from './mining-config.js';

/**
 * Loads config/mining.yaml once at boot and decorates `fastify.miningConfig`.
 */
async function miningConfigPlugin(fastify: FastifyInstance): Promise<void> {
  const config = loadMiningConfig();

  fastify.log.info(
    { fields: config.fields, mining: config.mining, output: config.output },
    'Mining config loaded',
  );

  fastify.decorate('miningConfig', config);
}

export default fp(miningConfigPlugin, {
  name: 'mining-config',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    miningConfig: MiningConfig;
  }
}
