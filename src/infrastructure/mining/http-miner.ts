import { z } from 'zod';
import type { Logger } from 'pino';
import type { EncodedTransactionSet, MinedRule } from '../../domain/index.js';
import type { SequenceMiner } from '../../application/miner.js';
import { minedRuleSchema } from '../../application/mining-schema.js';
import type { MiningParams } from '../../application/mining-schema.js';

const DEFAULT_TIMEOUT_MS = 60_000;

const minerResponseSchema = z.object({
  rules: z.array(minedRuleSchema),
});

/** The engine was unreachable or broke its response contract. */
export class MiningEngineError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'MiningEngineError';
  }
}

export interface HttpSequenceMinerOptions {
  url: string;
  timeoutMs?: number;
  log?: Logger;
}

/**
 * Mining engine client over HTTP.
 *
 * POSTs `{ transactions, symbols, params }` as JSON and expects
 * `{ rules: [{ rule, support, confidence, lift }] }` back. The response is
 * validated before any rule reaches the decomposer.
 */
export class HttpSequenceMiner implements SequenceMiner {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly log: Logger | undefined;

  constructor(opts: HttpSequenceMinerOptions) {
    if (!opts.url) {
      throw new Error('HttpSequenceMiner requires a url');
    }
    this.url = opts.url;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts.log;
  }

  async mine(transactions: EncodedTransactionSet, params: MiningParams): Promise<readonly MinedRule[]> {
    const body = JSON.stringify({
      transactions: transactions.transactions,
      symbols: transactions.symbols,
      params,
    });

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MiningEngineError(`Mining engine request failed: ${reason}`, null, { cause: err });
    }

    if (!response.ok) {
      throw new MiningEngineError(`Mining engine returned HTTP ${response.status}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err: unknown) {
      throw new MiningEngineError('Mining engine returned a non-JSON body', response.status, { cause: err });
    }

    const parsed = minerResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new MiningEngineError(`Mining engine returned an invalid rule list (${issues})`, response.status);
    }

    this.log?.debug(
      { sequenceCount: transactions.transactions.length, ruleCount: parsed.data.rules.length },
      'Mining engine responded',
    );

    return parsed.data.rules;
  }
}
