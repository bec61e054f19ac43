/**
 * ShortstackClient Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { MessageType } from 'shortstack-rpc';
import type { ColumnDescriptor, SegmentKey } from 'shortstack-rpc';

import { ShortstackClient, createClient } from '../client.js';
import { InvalidArgumentError, RowAlignmentError, ServerError, TransportError } from '../errors.js';
import { makePartition, makeRow } from '../helpers.js';
import { Row } from '../segment/row.js';
import { FakeGateway, fetchThrough } from './fake-gateway.js';
import type { FetchReply } from './fake-gateway.js';

const key: SegmentKey = {
  tableName: 'events',
  partition: [{ name: 'day', value: '2024-01-01' }],
  segmentId: 'seg-1',
};

const age: ColumnDescriptor = { name: 'age', dtype: 'int64' };
const name: ColumnDescriptor = { name: 'name', dtype: 'string' };

const config = {
  endpoint: 'https://datastore.example.com/rpc',
  token: 'test-secret',
  retry: { backoffMs: 0, maxBackoffMs: 0 },
  logLevel: 'silent',
} as const;

describe('ShortstackClient', () => {
  let gateway: FakeGateway;
  let client: ShortstackClient;

  beforeEach(() => {
    gateway = new FakeGateway();
    client = createClient(config, gateway);
  });

  describe('schema operations', () => {
    const schema = {
      columns: { age: { dtype: 'int64' as const } },
      partitioning: { day: { dtype: 'string' as const } },
    };

    it('should create, inspect, alter and drop a table', async () => {
      await expect(client.createTable({ tableName: 'events', schema })).resolves.toEqual({
        alreadyExists: false,
        columnsAdded: ['age'],
      });
      expect(await client.listTables()).toEqual([{ tableName: 'events' }]);

      await client.alterTable({ tableName: 'events', newColumns: { tags: { dtype: 'string', nestedListDepth: 1 } } });
      expect(await client.getSchema({ tableName: 'events' })).toEqual({
        columns: { age: { dtype: 'int64' }, tags: { dtype: 'string', nestedListDepth: 1 } },
        partitioning: { day: { dtype: 'string' } },
      });

      await client.dropTable({ tableName: 'events' });
      expect(await client.listTables()).toEqual([]);
    });

    it('should honour the schema mode of createTable', async () => {
      await client.createTable({ tableName: 'events', schema });

      await expect(client.createTable({ tableName: 'events', schema })).rejects.toBeInstanceOf(ServerError);
      await expect(client.createTable({ tableName: 'events', schema, mode: 'ok_if_exact' })).resolves.toEqual({
        alreadyExists: true,
        columnsAdded: [],
      });
      const wider = { ...schema, columns: { ...schema.columns, score: { dtype: 'float64' as const } } };
      await expect(client.createTable({ tableName: 'events', schema: wider, mode: 'add_new_columns' })).resolves.toEqual({
        alreadyExists: true,
        columnsAdded: ['score'],
      });
    });

    it('should retry transient server errors', async () => {
      gateway.failNext(MessageType.GET_SCHEMA, new ServerError('UNAVAILABLE', 'restarting'));
      await client.createTable({ tableName: 'events', schema });

      await expect(client.getSchema({ tableName: 'events' })).resolves.toEqual(schema);
      expect(gateway.callsOf(MessageType.GET_SCHEMA)).toHaveLength(2);
    });

    it('should reject an empty table name before any call', async () => {
      await expect(client.getSchema({ tableName: '' })).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(gateway.calls).toHaveLength(0);
    });
  });

  describe('data operations', () => {
    beforeEach(async () => {
      await client.createTable({
        tableName: 'events',
        schema: { columns: { age: { dtype: 'int64' } }, partitioning: { day: { dtype: 'string' } } },
      });
    });

    it('should write rows to a partition', async () => {
      await client.writeToPartition({
        tableName: 'events',
        partition: makePartition({ day: '2024-01-01' }),
        rows: [makeRow({ age: 31n }), makeRow({ age: null })],
      });

      expect(gateway.writes).toEqual([
        { tableName: 'events', partition: [{ name: 'day', value: '2024-01-01' }], rows: [{ age: 31n }, { age: null }] },
      ]);
    });

    it('should send a write only once even when it fails transiently', async () => {
      gateway.failNext(MessageType.WRITE_TO_PARTITION, new TransportError('connection reset'));

      await expect(
        client.writeToPartition({ tableName: 'events', partition: [], rows: [makeRow({ age: 1n })] })
      ).rejects.toBeInstanceOf(TransportError);
      expect(gateway.callsOf(MessageType.WRITE_TO_PARTITION)).toHaveLength(1);
    });

    it('should list segments, filtering by partition', async () => {
      gateway.addSegment('events', { segmentId: 'seg-1', partition: makePartition({ day: '2024-01-01' }) });
      gateway.addSegment('events', {
        segmentId: 'seg-2',
        partition: makePartition({ day: '2024-01-02' }),
        metadata: { rowCount: 10 },
      });

      expect(await client.listSegments({ tableName: 'events' })).toEqual([
        { segmentId: 'seg-1', partition: [{ name: 'day', value: '2024-01-01' }] },
        { segmentId: 'seg-2', partition: [{ name: 'day', value: '2024-01-02' }] },
      ]);
      expect(
        await client.listSegments({
          tableName: 'events',
          partitionFilter: makePartition({ day: '2024-01-02' }),
          includeMetadata: true,
        })
      ).toEqual([{ segmentId: 'seg-2', partition: [{ name: 'day', value: '2024-01-02' }], metadata: { rowCount: 10 } }]);
    });

    it('should delete rows and report them in the deletion mask', async () => {
      await client.deleteFromSegment({ ...key, rowIds: [1, 3] });

      expect(await client.decodeIsDeleted(key, 'corr-1')).toEqual([false, true, false, true]);
      const [call] = gateway.callsOf(MessageType.READ_SEGMENT_DELETIONS);
      expect(call.correlationId).toBe('corr-1');
    });
  });

  describe('segment reads', () => {
    it('should read one column as values with exactly 3 page calls', async () => {
      gateway.serveColumn('seg-1', age, [31n, 42n, 27n, 55n, 19n], [2, 0, 3]);

      await expect(client.read(key, age)).resolves.toEqual([31n, 42n, 27n, 55n, 19n]);
      expect(gateway.callsOf(MessageType.READ_SEGMENT_COLUMN)).toHaveLength(3);
    });

    it('should read several columns as rows', async () => {
      gateway.serveColumn('seg-1', age, [31n, 42n]);
      gateway.serveColumn('seg-1', name, ['Ada', 'Grace']);

      const rows = await client.read(key, [age, name]);

      expect(rows.every((row) => row instanceof Row)).toBe(true);
      expect(rows.map((row) => row.toObject())).toEqual([
        { age: 31n, name: 'Ada' },
        { age: 42n, name: 'Grace' },
      ]);
    });

    it('should raise RowAlignmentError when age has 5 values and name 4', async () => {
      gateway.serveColumn('seg-1', age, [1n, 2n, 3n, 4n, 5n]);
      gateway.serveColumn('seg-1', name, ['a', 'b', 'c', 'd']);

      await expect(client.decodeSegment(key, [age, name])).rejects.toMatchObject({
        name: 'RowAlignmentError',
        lengths: { age: 5, name: 4 },
      });
      await expect(client.decodeSegment(key, [age, name])).rejects.toBeInstanceOf(RowAlignmentError);
    });

    it('should apply a caller-supplied deletion mask to one column', async () => {
      gateway.serveColumn('seg-1', age, [1n, 2n, 3n]);

      await expect(client.decodeSegmentColumn(key, age, { isDeleted: [false, true] })).resolves.toEqual([1n, 3n]);
    });

    it('should skip deleted rows in decodeSegment by default', async () => {
      gateway.serveColumn('seg-1', age, [1n, 2n, 3n]);
      gateway.setDeleted('seg-1', [false, false, true]);

      const rows = await client.decodeSegment(key, [age]);
      expect(rows.map((row) => row.get('age'))).toEqual([1n, 2n]);

      const all = await client.decodeSegment(key, [age], { applyDeletions: false });
      expect(all).toHaveLength(3);
    });

    it('should reject an invalid column descriptor', async () => {
      await expect(client.decodeSegmentColumn(key, { name: '', dtype: 'int64' })).rejects.toThrow(
        'Column name must be a non-empty string'
      );
    });

    it('should expose raw pages through readSegmentColumn', async () => {
      gateway.serveColumn('seg-1', age, [1n, 2n], [1, 1]);

      const first = await client.readSegmentColumn({ ...key, columnName: 'age', correlationId: 'corr-1' });

      expect(first.continuationToken).toBe('t1');
      expect(first.data).toEqual(new Uint8Array([1, 1, 0, 1, 1, 0, 0, 0, 0, 0, 0, 0, 1]));
    });

    it('should expose the raw deletion bitmap through readSegmentDeletions', async () => {
      gateway.setDeleted('seg-1', [true]);

      const result = await client.readSegmentDeletions({ ...key, correlationId: 'corr-1' });

      expect(result.data).toEqual(new Uint8Array([1, 1]));
    });
  });

  describe('argument validation', () => {
    const noSegment: SegmentKey = { ...key, segmentId: '' };

    it('should reject an empty table name in createTable', async () => {
      await expect(
        client.createTable({ tableName: '', schema: { columns: {}, partitioning: {} } })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('should reject a segment key without a segment id in every raw read', async () => {
      const message = 'SegmentKey segmentId must be a non-empty string';

      await expect(
        client.readSegmentColumn({ ...noSegment, columnName: 'age', correlationId: 'corr-1' })
      ).rejects.toThrow(new InvalidArgumentError(message));
      await expect(client.readSegmentDeletions({ ...noSegment, correlationId: 'corr-1' })).rejects.toThrow(
        new InvalidArgumentError(message)
      );
      await expect(client.decodeIsDeleted(noSegment)).rejects.toThrow(new InvalidArgumentError(message));
      expect(gateway.calls).toHaveLength(0);
    });
  });
});

describe('ShortstackClient over HTTP', () => {
  let server: FakeGateway;
  let mockFetch: Mock<(url: string, init: { body: string }) => Promise<FetchReply>>;

  beforeEach(() => {
    server = new FakeGateway();
    mockFetch = vi.fn(fetchThrough(server));
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should decode a segment end to end', async () => {
    server.serveColumn('seg-1', age, [31n, 42n, 27n, 55n, 19n], [2, 0, 3]);
    server.serveColumn('seg-1', name, ['a', 'b', 'c', 'd', 'e'], [5]);
    server.setDeleted('seg-1', [false, true]);

    const rows = await createClient(config).decodeSegment(key, [age, name]);

    expect(rows.map((row) => row.values())).toEqual([
      [31n, 'a'],
      [27n, 'c'],
      [55n, 'd'],
      [19n, 'e'],
    ]);
    // 3 pages of age, 1 of name, 1 deletion mask
    expect(mockFetch).toHaveBeenCalledTimes(5);
  });

  it('should surface server errors as ServerError', async () => {
    await expect(createClient(config).getSchema({ tableName: 'missing' })).rejects.toMatchObject({
      serverCode: 'NOT_FOUND',
      message: 'table missing does not exist',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
