import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpSequenceMiner, MiningEngineError } from '../../src/infrastructure/mining/http-miner.js';
import type { EncodedTransactionSet } from '../../src/domain/index.js';

const MINER_URL = 'http://miner.test/mine';

const params = { min_support: 0.2, max_length: 4, min_gap: 1, max_gap: 2, min_confidence: 0.5 };

const transactions: EncodedTransactionSet = {
  transactions: [{ sequence_id: 1, events: [{ event_id: 1, symbol: 'view' }] }],
  sessions: [{ session_key: 'S1', sequence_id: 1 }],
  symbols: [{ symbol: 'view', code: 1 }],
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(impl: () => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>().mockImplementation(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('HttpSequenceMiner', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requires a url', () => {
    expect(() => new HttpSequenceMiner({ url: '' })).toThrow('HttpSequenceMiner requires a url');
  });

  it('posts transactions, symbols and params as JSON', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ rules: [] }));

    await new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params);

    expect(fetchMock).toHaveBeenCalledOnce();
    const init = fetchMock.mock.calls[0]?.[1];
    expect(fetchMock.mock.calls[0]?.[0]).toBe(MINER_URL);
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      transactions: transactions.transactions,
      symbols: transactions.symbols,
      params,
    });
  });

  it('returns the validated rule list', async () => {
    const rules = [{ rule: '<view> => <click>', support: 0.5, confidence: 0.75, lift: 1.25 }];
    stubFetch(async () => jsonResponse({ rules }));

    expect(await new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params)).toEqual(rules);
  });

  it('wraps network failures', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params)).rejects.toThrow(
      'Mining engine request failed: fetch failed',
    );
  });

  it('reports non-2xx responses with their status', async () => {
    stubFetch(async () => jsonResponse({ error: 'boom' }, 503));

    const err: unknown = await new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MiningEngineError);
    if (err instanceof MiningEngineError) {
      expect(err.status).toBe(503);
      expect(err.message).toBe('Mining engine returned HTTP 503');
    }
  });

  it('rejects a body that is not JSON', async () => {
    stubFetch(async () => new Response('<html>', { status: 200 }));

    await expect(new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params)).rejects.toThrow(
      'Mining engine returned a non-JSON body',
    );
  });

  it('rejects a malformed rule list', async () => {
    stubFetch(async () => jsonResponse({ rules: [{ rule: '<a> => <b>', support: 'high' }] }));

    await expect(new HttpSequenceMiner({ url: MINER_URL }).mine(transactions, params)).rejects.toThrow(
      /^Mining engine returned an invalid rule list \(rules\.0\.support: /,
    );
  });
});
