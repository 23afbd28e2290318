import { describe, it, expect, vi } from 'vitest';
import type Redis from 'ioredis';
import { inspectRunQueue } from '../../src/infrastructure/redis/connection.js';

describe('inspectRunQueue', () => {
  it('reports the PING reply and the run stream length', async () => {
    const xlen = vi.fn().mockResolvedValue(7);
    const redis = { ping: vi.fn().mockResolvedValue('PONG'), xlen } as unknown as Redis;

    expect(await inspectRunQueue(redis)).toEqual({ redis: 'PONG', queued: 7 });
    expect(xlen).toHaveBeenCalledWith('mining_runs_stream');
  });

  it('propagates a failed PING', async () => {
    const redis = {
      ping: vi.fn().mockRejectedValue(new Error('Connection is closed.')),
      xlen: vi.fn(),
    } as unknown as Redis;

    await expect(inspectRunQueue(redis)).rejects.toThrow('Connection is closed.');
  });
});
