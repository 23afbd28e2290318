import { describe, it, expect, vi, beforeEach } from 'vitest';
import Fastify from 'fastify';

/**
 * The connection factories are replaced so the plugins can boot without a
 * live Redis or Postgres.
 */
vi.mock('../../src/infrastructure/redis/connection.js', () => ({
  createRedisClient: vi.fn(),
  inspectRunQueue: vi.fn(),
}));

vi.mock('../../src/infrastructure/db/client.js', () => ({
  createDbClient: vi.fn(),
  ensureTables: vi.fn(),
}));

import redisPlugin from '../../src/infrastructure/redis/redis-plugin.js';
import dbPlugin from '../../src/infrastructure/db/db-plugin.js';
import { createRedisClient, inspectRunQueue } from '../../src/infrastructure/redis/connection.js';
import { createDbClient, ensureTables } from '../../src/infrastructure/db/client.js';

const mockCreateRedisClient = vi.mocked(createRedisClient);
const mockInspectRunQueue = vi.mocked(inspectRunQueue);
const mockCreateDbClient = vi.mocked(createDbClient);
const mockEnsureTables = vi.mocked(ensureTables);

function fakeRedis() {
  return {
    connect: vi.fn().mockResolvedValue(undefined),
    quit: vi.fn().mockResolvedValue('OK'),
  };
}

function fakeDb() {
  return {
    sql: { end: vi.fn().mockResolvedValue(undefined) },
    db: { marker: 'db' },
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  mockInspectRunQueue.mockResolvedValue({ redis: 'PONG', queued: 0 });
  mockEnsureTables.mockResolvedValue(undefined);
});

// ─── redisPlugin ─────────────────────────────────────────────

describe('redisPlugin', () => {
  it('connects, inspects the run queue and decorates fastify.redis', async () => {
    const redis = fakeRedis();
    mockCreateRedisClient.mockReturnValue(redis as unknown as ReturnType<typeof createRedisClient>);
    const app = Fastify();

    await app.register(redisPlugin);
    await app.ready();

    expect(redis.connect).toHaveBeenCalledOnce();
    expect(mockInspectRunQueue).toHaveBeenCalledWith(redis);
    expect(app.redis).toBe(redis);

    await app.close();
    expect(redis.quit).toHaveBeenCalledOnce();
  });

  it('fails boot when Redis is unreachable', async () => {
    const redis = fakeRedis();
    redis.connect.mockRejectedValue(new Error('ECONNREFUSED'));
    mockCreateRedisClient.mockReturnValue(redis as unknown as ReturnType<typeof createRedisClient>);
    const app = Fastify();

    await expect(app.register(redisPlugin).ready()).rejects.toThrow('ECONNREFUSED');
  });
});

// ─── dbPlugin ────────────────────────────────────────────────

describe('dbPlugin', () => {
  it('creates the run tables before decorating fastify.db', async () => {
    const client = fakeDb();
    mockCreateDbClient.mockReturnValue(client as unknown as ReturnType<typeof createDbClient>);
    const app = Fastify();

    await app.register(dbPlugin);
    await app.ready();

    expect(mockEnsureTables).toHaveBeenCalledWith(client.sql);
    expect(app.db).toBe(client.db);

    await app.close();
    expect(client.sql.end).toHaveBeenCalledOnce();
  });

  it('fails boot when the tables cannot be created', async () => {
    mockCreateDbClient.mockReturnValue(fakeDb() as unknown as ReturnType<typeof createDbClient>);
    mockEnsureTables.mockRejectedValue(new Error('permission denied for schema public'));
    const app = Fastify();

    await expect(app.register(dbPlugin).ready()).rejects.toThrow('permission denied for schema public');
  });
});
