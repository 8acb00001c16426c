import type { QueryResult, QueryResultRow } from 'pg';
import { query, withTransaction } from '../../src/db/client';
import { PersistenceError } from '../../src/errors';
import { PgJoinStore } from '../../src/services/join-store.service';

jest.mock('../../src/db/client', () => ({
  query: jest.fn(),
  withTransaction: jest.fn(),
}));

const mockedQuery = jest.mocked(query);
const mockedTransaction = jest.mocked(withTransaction);

function result(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
  return { command: 'SELECT', rowCount: rows.length, oid: 0, fields: [], rows };
}

function recordRow(overrides: QueryResultRow = {}): QueryResultRow {
  return {
    id: 'record-1',
    subject_id: '600000000000000001',
    community_id: '400000000000000001',
    community_name: 'Test Community',
    observed_at: new Date('2026-03-01T12:00:00.000Z'),
    source: 'heuristic:activity_pattern',
    subject: { username: 'alice', account_created_at: '2024-01-15T00:00:00.000Z', is_bot: false, extra: 1 },
    notified: false,
    delivery_status: 'pending',
    attempt_count: 0,
    next_attempt_at: null,
    last_error: null,
    created_at: new Date('2026-03-01T12:00:01.000Z'),
    ...overrides,
  };
}

describe('PgJoinStore', () => {
  const store = new PgJoinStore();

  beforeEach(() => {
    mockedQuery.mockReset();
    mockedTransaction.mockReset();
  });

  it('should map a stored row to a join record', async () => {
    mockedQuery.mockResolvedValueOnce(result([recordRow()]));

    const record = await store.getRecord('record-1');

    expect(record).toEqual({
      id: 'record-1',
      subject_id: '600000000000000001',
      community_id: '400000000000000001',
      community_name: 'Test Community',
      observed_at: new Date('2026-03-01T12:00:00.000Z'),
      source: 'heuristic:activity_pattern',
      confidence: 'inferred',
      subject: {
        username: 'alice',
        account_created_at: new Date('2024-01-15T00:00:00.000Z'),
        is_bot: false,
      },
      notified: false,
      delivery_status: 'pending',
      attempt_count: 0,
      next_attempt_at: null,
      last_error: null,
      created_at: new Date('2026-03-01T12:00:01.000Z'),
    });
    expect(mockedQuery.mock.calls[0]?.[1]).toEqual(['record-1']);
  });

  it('should return null for a missing record', async () => {
    mockedQuery.mockResolvedValueOnce(result([]));

    await expect(store.getRecord('record-9')).resolves.toBeNull();
  });

  it('should reject a row with an unknown source', async () => {
    mockedQuery.mockResolvedValueOnce(result([recordRow({ source: 'carrier_pigeon' })]));

    await expect(store.getRecord('record-1')).rejects.toThrow(
      new PersistenceError('Join record record-1 has an unknown source or status')
    );
  });

  it('should wrap database failures in a persistence error', async () => {
    mockedQuery.mockRejectedValueOnce(new Error('connection refused'));

    const failure = store.getRecord('record-1');

    await expect(failure).rejects.toBeInstanceOf(PersistenceError);
    await expect(failure).rejects.toThrow('Load join record record-1: connection refused');
  });

  it('should list records that are due for delivery', async () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    mockedQuery.mockResolvedValueOnce(
      result([recordRow(), recordRow({ id: 'record-2', delivery_status: 'retrying', attempt_count: 2 })])
    );

    const records = await store.listDispatchable(now, 500);

    expect(records.map((r) => [r.id, r.delivery_status, r.attempt_count])).toEqual([
      ['record-1', 'pending', 0],
      ['record-2', 'retrying', 2],
    ]);
    expect(mockedQuery.mock.calls[0]?.[1]).toEqual([now, 500]);
  });

  it('should write the delivery state of a record', async () => {
    const nextAttemptAt = new Date('2026-03-01T12:01:00.000Z');
    mockedQuery.mockResolvedValueOnce(result([]));

    await store.updateDelivery('record-1', {
      delivery_status: 'retrying',
      attempt_count: 1,
      next_attempt_at: nextAttemptAt,
      last_error: 'HTTP 503',
    });

    expect(mockedQuery.mock.calls[0]?.[1]).toEqual(['record-1', 'retrying', 1, nextAttemptAt, 'HTTP 503']);
  });

  it('should report a failed pair transaction as a persistence error', async () => {
    mockedTransaction.mockRejectedValueOnce(new Error('too many clients'));

    await expect(store.withPairLock('600000000000000001', '400000000000000001', async () => true)).rejects.toThrow(
      'Pair transaction 600000000000000001:400000000000000001: too many clients'
    );
  });
});
