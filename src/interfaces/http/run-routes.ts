import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { runRequestSchema, rankMetricSchema } from '../../application/mining-schema.js';
import { resolveRunSettings } from '../../application/run-settings.js';
import { prepareTransactions } from '../../application/pipeline.js';
import { countEvents } from '../../application/encoder.js';
import { submitRun, getRun, listRuns, getRunRules } from '../../application/run-service.js';
import { formatRuleTableCsv } from '../../application/rule-csv.js';
import { inspectRunQueue } from '../../infrastructure/redis/index.js';
import { sendPipelineError } from './pipeline-errors.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing or empty values, `NaN` for non-integers.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Mining run routes.
 *
 * POST /api/v1/runs:                validate, pre-flight encode, queue
 * GET  /api/v1/runs:                paginated run list
 * GET  /api/v1/runs/:run_id:        single run
 * GET  /api/v1/runs/:run_id/rules:  stored rule table (?top[=k], ?by, ?format)
 * GET  /api/v1/health:              Redis ping + run stream length
 */
async function runRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/runs ────────────────────────────────────
  fastify.post(
    '/api/v1/runs',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = runRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const resolved = resolveRunSettings(parsed.data, fastify.miningConfig);
      if (!resolved.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: resolved.issues,
        });
      }

      // Pre-flight: field or timestamp problems are reported now instead
      // of surfacing later as a failed run.
      let sequenceCount: number;
      let eventCount: number;
      try {
        const { transactions } = prepareTransactions(parsed.data.records, resolved.settings);
        sequenceCount = transactions.transactions.length;
        eventCount = countEvents(transactions);
      } catch (err: unknown) {
        return sendPipelineError(reply, err);
      }

      const run = await submitRun(fastify.db, fastify.redis, parsed.data);

      request.log.info({ run_id: run.run_id, sequenceCount, eventCount }, 'Run queued');

      return reply.status(202).send({
        status: run.status,
        run_id: run.run_id,
        sequence_count: sequenceCount,
        event_count: eventCount,
      });
    },
  );

  // ── GET /api/v1/runs ─────────────────────────────────────
  fastify.get(
    '/api/v1/runs',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string; offset?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      const offset = safeInt(request.query.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const result = await listRuns(fastify.db, { limit, offset });
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/v1/runs/:run_id ─────────────────────────────
  fastify.get(
    '/api/v1/runs/:run_id',
    async (
      request: FastifyRequest<{ Params: { run_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { run_id } = request.params;
      if (!UUID_RE.test(run_id)) {
        return reply.status(400).send({ error: 'run_id must be a valid UUID' });
      }

      const run = await getRun(fastify.db, run_id);
      if (run === null) {
        return reply.status(404).send({ error: 'Run not found' });
      }

      // The stored request can be large; expose everything but the records.
      const { request: _stored, ...summary } = run;
      return reply.status(200).send(summary);
    },
  );

  // ── GET /api/v1/runs/:run_id/rules ───────────────────────
  fastify.get(
    '/api/v1/runs/:run_id/rules',
    async (
      request: FastifyRequest<{
        Params: { run_id: string };
        Querystring: { top?: string; by?: string; format?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const { run_id } = request.params;
      if (!UUID_RE.test(run_id)) {
        return reply.status(400).send({ error: 'run_id must be a valid UUID' });
      }

      const q = request.query;

      // `?top` without a value selects the configured top-K view
      const top = q.top !== undefined && q.top.trim() === ''
        ? fastify.miningConfig.output.top_k
        : safeInt(q.top);
      if (top !== undefined && (Number.isNaN(top) || top < 0)) {
        return reply.status(400).send({ error: 'top must be a non-negative integer' });
      }

      const by = rankMetricSchema.safeParse(q.by ?? 'lift');
      if (!by.success) {
        return reply.status(400).send({ error: 'by must be one of support, confidence, lift' });
      }

      const format = q.format ?? 'json';
      if (format !== 'json' && format !== 'csv') {
        return reply.status(400).send({ error: 'format must be json or csv' });
      }

      const table = await getRunRules(fastify.db, run_id, { top, by: by.data });
      if (table === null) {
        return reply.status(404).send({ error: 'Run not found' });
      }

      if (format === 'csv') {
        return reply
          .status(200)
          .header('Content-Disposition', `attachment; filename="sequence_rules_${run_id}.csv"`)
          .type('text/csv; charset=utf-8')
          .send(formatRuleTableCsv(table));
      }

      return reply.status(200).send({
        run_id,
        count: table.rows.length,
        rows: table.rows,
        warnings: table.warnings,
      });
    },
  );

  /**
   * Health check: pings Redis and reports how many entries the run stream
   * holds.
   */
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const queue = await inspectRunQueue(fastify.redis);
        return reply.status(200).send({ status: 'ok', ...queue });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
      }
    },
  );
}

export default fp(runRoutes, {
  name: 'run-routes',
  dependencies: ['redis', 'db', 'mining-config'],
  fastify: '5.x',
});
