import pino from 'pino';
import { createDbClient, ensureTables } from './infrastructure/db/index.js';
import { createRedisClient } from './infrastructure/redis/index.js';
import { loadMiningConfig } from './infrastructure/config/index.js';
import { HttpSequenceMiner } from './infrastructure/mining/index.js';
import { startRunConsumer } from './infrastructure/worker/index.js';

/**
 * Standalone worker process that executes queued mining runs.
 *
 * Consumes run ids from the Redis Stream, runs normalize → encode →
 * external engine → decompose, and stores the rule table in PostgreSQL.
 * Can be scaled horizontally by launching several instances with
 * different WORKER_ID values.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const minerUrl = process.env['MINER_URL'] ?? 'http://localhost:8000/mine';
const minerTimeoutMs = Number(process.env['MINER_TIMEOUT_MS'] ?? 60_000);

const redis = createRedisClient();
const { sql, db } = createDbClient();

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const config = loadMiningConfig();
  log.info({ fields: config.fields, mining: config.mining, output: config.output }, 'Mining config loaded');

  await redis.connect();
  log.info('Redis connected');

  await ensureTables(sql);
  log.info('Database ready (mining_runs + mined_rules tables)');

  const miner = new HttpSequenceMiner({ url: minerUrl, timeoutMs: minerTimeoutMs, log });
  log.info({ minerUrl, minerTimeoutMs }, 'Mining engine client configured');

  await startRunConsumer({ redis, db, log, miner, config }, ac.signal);
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give the in-flight run a moment, then force exit
  setTimeout(() => {
    Promise.allSettled([redis.quit(), sql.end()])
      .then((results) => {
        for (const result of results) {
          if (result.status === 'rejected') {
            log.warn({ err: result.reason }, 'Error while closing connections');
          }
        }
        process.exit(0);
      })
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
