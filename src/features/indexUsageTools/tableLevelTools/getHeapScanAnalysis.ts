import { z } from 'zod';
import type { QueryExecutor } from '../../../MSSQL.js';
import { formatZodIssues, QueryResultError } from '../../../errors.js';
import {
  classifyHeapScans,
  DEFAULT_HEAP_SCAN_THRESHOLDS,
  type HeapScanThresholds,
} from '../classification/classifyHeapScans.js';

const counter = z.coerce.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const heapScanRowSchema = z.object({
  // NULL when the caller lacks metadata visibility on the object.
  schemaName: z.string().nullable(),
  tableName: z.string().nullable(),
  objectId: z.coerce.number().int(),
  tableScans: counter,
  tableSeeks: counter,
  tableLookups: counter,
});

export async function getHeapScanAnalysis({
  db,
  thresholds = DEFAULT_HEAP_SCAN_THRESHOLDS,
}: {
  db: QueryExecutor;
  thresholds?: HeapScanThresholds;
}): Promise<string> {
  // Tables with high scan counts and no index to seek on
  const query = `
SELECT
    OBJECT_SCHEMA_NAME(s.object_id) AS schemaName,
    OBJECT_NAME(s.object_id) AS tableName,
    s.object_id AS objectId,
    s.user_scans AS tableScans,
    s.user_seeks AS tableSeeks,
    s.user_lookups AS tableLookups
FROM
    sys.dm_db_index_usage_stats s
WHERE
    s.database_id = DB_ID()
    AND s.index_id = 0 -- Heap scans only
    AND s.user_scans > @minScans
ORDER BY
    s.user_scans DESC;`;

  const result = await db.executeQuery<unknown>({
    query,
    parameters: { minScans: thresholds.minScans },
  });
  if (!result || result.length === 0) {
    return 'No heap tables with significant scan activity found.';
  }

  const report = result.map((raw, i) => {
    const parsed = heapScanRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new QueryResultError(
        'heap scan query',
        i,
        formatZodIssues(parsed.error.issues).join(', ')
      );
    }
    const row = parsed.data;
    return {
      'Analysis Type': 'TABLE SCAN ANALYSIS',
      'Schema Name': row.schemaName,
      'Table Name': row.tableName ?? `object_id ${row.objectId}`,
      'Object ID': row.objectId,
      'Table Scans': row.tableScans,
      'Table Seeks': row.tableSeeks,
      'Table Lookups': row.tableLookups,
      Recommendation: classifyHeapScans(
        {
          scans: row.tableScans,
          seeks: row.tableSeeks,
        },
        thresholds
      ),
    };
  });
  return JSON.stringify(report, null, 2);
}
