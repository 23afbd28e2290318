import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  normalizeRequestSchema,
  encodeRequestSchema,
  decomposeRequestSchema,
} from '../../application/mining-schema.js';
import { normalize } from '../../application/normalizer.js';
import { prepareTransactions } from '../../application/pipeline.js';
import { decompose, topK } from '../../application/decomposer.js';
import { formatRuleTableCsv } from '../../application/rule-csv.js';
import type { DecomposedRuleTable } from '../../domain/index.js';
import { sendPipelineError } from './pipeline-errors.js';

/**
 * Decomposes and optionally ranks a posted rule list.
 * Returns null (after replying 400) when the body is invalid.
 */
function decomposeBody(body: unknown, reply: FastifyReply): DecomposedRuleTable | null {
  const parsed = decomposeRequestSchema.safeParse(body);
  if (!parsed.success) {
    void reply.status(400).send({
      error: 'Validation failed',
      issues: parsed.error.issues,
    });
    return null;
  }

  const table = decompose(parsed.data.rules);
  return parsed.data.top_k === undefined
    ? table
    : topK(table, { by: parsed.data.by, k: parsed.data.top_k });
}

/**
 * Synchronous pipeline routes. Each runs one stage on the posted batch;
 * nothing is stored.
 *
 * POST /api/v1/normalize:            temporal normalization
 * POST /api/v1/encode:               normalize → filter → encode
 * POST /api/v1/rules/decompose:      split + rank engine rules (JSON)
 * POST /api/v1/rules/decompose.csv:  same, rendered as CSV
 *
 * Field names not given in the body fall back to config/mining.yaml.
 */
async function pipelineRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/normalize ───────────────────────────────
  fastify.post(
    '/api/v1/normalize',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = normalizeRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const defaults = fastify.miningConfig;
      const sessionKeyField = parsed.data.fields?.session_key ?? defaults.fields.session_key;
      const timestampField = parsed.data.fields?.timestamp ?? defaults.fields.timestamp;

      try {
        const records = normalize(parsed.data.records, sessionKeyField, timestampField, {
          fractionalDigits: parsed.data.fractional_digits ?? defaults.output.fractional_digits,
        });

        return reply.status(200).send({
          count: records.length,
          records: records.map((r) => ({
            position: r.position,
            session_key: r.session_key,
            timestamp: new Date(r.timestamp_ms).toISOString(),
            time_diff: r.time_diff,
            fields: r.fields,
          })),
        });
      } catch (err: unknown) {
        return sendPipelineError(reply, err);
      }
    },
  );

  // ── POST /api/v1/encode ──────────────────────────────────
  fastify.post(
    '/api/v1/encode',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = encodeRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const defaults = fastify.miningConfig;

      try {
        const { transactions } = prepareTransactions(parsed.data.records, {
          fields: {
            session_key: parsed.data.fields?.session_key ?? defaults.fields.session_key,
            action: parsed.data.fields?.action ?? defaults.fields.action,
            timestamp: parsed.data.fields?.timestamp ?? defaults.fields.timestamp,
          },
          filter: parsed.data.filter,
          fractionalDigits: parsed.data.fractional_digits ?? defaults.output.fractional_digits,
        });

        return reply.status(200).send(transactions);
      } catch (err: unknown) {
        return sendPipelineError(reply, err);
      }
    },
  );

  // ── POST /api/v1/rules/decompose ─────────────────────────
  fastify.post(
    '/api/v1/rules/decompose',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const table = decomposeBody(request.body, reply);
      if (table === null) return reply;

      return reply.status(200).send({
        count: table.rows.length,
        rows: table.rows,
        warnings: table.warnings,
      });
    },
  );

  // ── POST /api/v1/rules/decompose.csv ─────────────────────
  fastify.post(
    '/api/v1/rules/decompose.csv',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const table = decomposeBody(request.body, reply);
      if (table === null) return reply;

      return reply
        .status(200)
        .type('text/csv; charset=utf-8')
        .send(formatRuleTableCsv(table));
    },
  );
}

export default fp(pipelineRoutes, {
  name: 'pipeline-routes',
  dependencies: ['mining-config'],
  fastify: '5.x',
});
