import { describe, expect, it, vi } from 'vitest';
import { getIndexUsageAnalysis } from '../src/features/indexUsageTools/tableLevelTools/getIndexUsageAnalysis.js';
import { QueryResultError } from '../src/errors.js';

const now = new Date('2026-03-15T12:00:00Z');

// Counters arrive as strings, the way the driver returns BIGINT columns.
function usageRow(overrides: Record<string, unknown>) {
  return {
    schemaName: 'dbo',
    tableName: 'Orders',
    indexName: 'IX_Orders_Status',
    indexType: 'NONCLUSTERED',
    objectId: 1001,
    userSeeks: '0',
    userScans: '0',
    userLookups: '0',
    userUpdates: '0',
    lastUserSeek: null,
    lastUserScan: null,
    lastUserLookup: null,
    lastUserUpdate: null,
    ...overrides,
  };
}

const rows = [
  usageRow({
    tableName: 'Customers',
    indexName: 'IX_Customers_Email',
    objectId: 1002,
    userSeeks: '20000',
    userScans: '10',
    userUpdates: '50',
  }),
  usageRow({ userUpdates: '3' }),
  usageRow({
    indexName: 'PK_Orders',
    indexType: 'CLUSTERED',
    userSeeks: '5000',
    userScans: '20',
    userLookups: '12000',
    userUpdates: '40',
    lastUserSeek: new Date('2026-03-15T10:00:00Z'),
  }),
  usageRow({
    tableName: 'Invoices',
    indexName: 'IX_Invoices_Date',
    objectId: 1003,
    userSeeks: '30000',
  }),
];

function fakeDb(result: unknown[]) {
  return { executeQuery: vi.fn().mockResolvedValue(result) };
}

describe('getIndexUsageAnalysis', () => {
  it('orders by priority, then total reads', async () => {
    const db = fakeDb(rows);
    const report = JSON.parse(await getIndexUsageAnalysis({ db, now }));

    expect(report.map((r: Record<string, unknown>) => r['Index Name'])).toEqual([
      'IX_Orders_Status',
      'PK_Orders',
      'IX_Invoices_Date',
      'IX_Customers_Email',
    ]);
  });

  it('reports counters, ratios and recommendation for each index', async () => {
    const db = fakeDb(rows);
    const [unused, clustered] = JSON.parse(await getIndexUsageAnalysis({ db, now }));

    expect(unused).toEqual({
      'Schema Name': 'dbo',
      'Table Name': 'Orders',
      'Index Name': 'IX_Orders_Status',
      'Index Type': 'NONCLUSTERED',
      'User Seeks': 0,
      'User Scans': 0,
      'User Lookups': 0,
      'User Updates': 3,
      'Total Reads': 0,
      'Scan/Seek Ratio': 0,
      'Read/Write Ratio': 0,
      'Lookup %': 0,
      Recommendation: 'CONSIDER DROPPING - Unused',
      'Priority Score': 90,
      'Last Seek': 'Never',
      'Last Scan': 'Never',
      'Last Lookup': 'Never',
      'Last Update': 'Never',
    });
    expect(clustered).toMatchObject({
      'Index Name': 'PK_Orders',
      'Total Reads': 17020,
      'Scan/Seek Ratio': 0,
      'Read/Write Ratio': 425.5,
      'Lookup %': 70.51,
      Recommendation: 'COVERING INDEX - High Key Lookups',
      'Priority Score': 60,
      'Last Seek': 'Today',
    });
  });

  it('binds table names as parameters', async () => {
    const db = fakeDb(rows);
    await getIndexUsageAnalysis({ tableNames: ['Orders', 'Customers'], db, now });

    expect(db.executeQuery).toHaveBeenCalledTimes(1);
    const [{ query, parameters }] = db.executeQuery.mock.calls[0];
    expect(query).toContain('AND OBJECT_NAME(i.object_id) IN (@tableName0, @tableName1)');
    expect(query).not.toContain("'Orders'");
    expect(parameters).toEqual({ tableName0: 'Orders', tableName1: 'Customers' });
  });

  it('explains an empty result', async () => {
    await expect(
      getIndexUsageAnalysis({ tableNames: ['Orders'], db: fakeDb([]), now })
    ).resolves.toBe('No index usage statistics found for the specified tables.');
    await expect(getIndexUsageAnalysis({ db: fakeDb([]), now })).resolves.toBe(
      'No index usage statistics found in the current database.'
    );
  });

  it('rejects rows with malformed counters', async () => {
    const db = fakeDb([usageRow({ userSeeks: '-1' })]);
    const analysis = getIndexUsageAnalysis({ db, now });

    await expect(analysis).rejects.toBeInstanceOf(QueryResultError);
    await expect(analysis).rejects.toThrow(/^Unexpected row 0 from index usage query: userSeeks:/);
  });

  it('rejects counters beyond the safe integer range as a row error', async () => {
    const db = fakeDb([usageRow({ userScans: '9007199254740993' })]);
    const analysis = getIndexUsageAnalysis({ db, now });

    await expect(analysis).rejects.toBeInstanceOf(QueryResultError);
    await expect(analysis).rejects.toThrow(/^Unexpected row 0 from index usage query: userScans:/);
  });
});
