import { describe, it, expect, vi } from 'vitest';
import { withTransaction } from '../../src/db/transaction.js';
import { createMockPool } from '../fixtures/pg-test.js';

function statements(pool: ReturnType<typeof createMockPool>): unknown[] {
  return pool._mockClient.query.mock.calls.map((c: unknown[]) => c[0]);
}

describe('withTransaction()', () => {
  it('commits and returns the callback result', async () => {
    const pool = createMockPool();

    const result = await withTransaction(pool, async (client) => {
      await client.query('UPDATE t SET x = 1');
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(statements(pool)).toEqual(['BEGIN', 'UPDATE t SET x = 1', 'COMMIT']);
    expect(pool._mockClient.release).toHaveBeenCalledOnce();
  });

  it('rolls back and rethrows the callback error', async () => {
    const pool = createMockPool();

    await expect(
      withTransaction(pool, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(statements(pool)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(pool._mockClient.release).toHaveBeenCalledOnce();
  });

  it('keeps the original error and logs when ROLLBACK also fails', async () => {
    const pool = createMockPool();
    const log = vi.fn();
    pool._mockClient.query.mockImplementation(async (text: string) => {
      if (text === 'ROLLBACK') throw new Error('rollback failed');
      if (text === 'SOME QUERY') throw new Error('query failed');
      return { rows: [], rowCount: 0 };
    });

    await expect(
      withTransaction(
        pool,
        async (client) => {
          await client.query('SOME QUERY');
        },
        log,
      ),
    ).rejects.toThrow('query failed');

    expect(log).toHaveBeenCalledWith('error', {
      event: 'rollback_failed',
      message: 'rollback failed',
      cause: 'query failed',
    });
    expect(pool._mockClient.release).toHaveBeenCalledOnce();
  });
});
