import { z } from 'zod';
import type { QueryExecutor } from '../../../MSSQL.js';
import { formatZodIssues, QueryResultError } from '../../../errors.js';
import {
  classifyIndexUsage,
  type IndexUsageClassification,
} from '../classification/classifyIndexUsage.js';
import { describeLastActivity } from '../classification/describeLastActivity.js';
import { buildTableFilter } from './tableFilter.js';

// BIGINT columns come back from the driver as strings.
const counter = z.coerce.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const indexUsageRowSchema = z.object({
  schemaName: z.string(),
  tableName: z.string(),
  indexName: z.string(),
  indexType: z.string(),
  objectId: z.coerce.number().int(),
  userSeeks: counter,
  userScans: counter,
  userLookups: counter,
  userUpdates: counter,
  lastUserSeek: z.date().nullable(),
  lastUserScan: z.date().nullable(),
  lastUserLookup: z.date().nullable(),
  lastUserUpdate: z.date().nullable(),
});

export type IndexUsageRow = z.infer<typeof indexUsageRowSchema>;

export interface AnalyzedIndex {
  row: IndexUsageRow;
  classification: IndexUsageClassification;
}

const roundRatio = (value: number) => Math.round(value * 100) / 100;

export function analyzeIndexUsageRows(rows: readonly unknown[]): AnalyzedIndex[] {
  const analyzed = rows.map((raw, i) => {
    const parsed = indexUsageRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new QueryResultError(
        'index usage query',
        i,
        formatZodIssues(parsed.error.issues).join(', ')
      );
    }
    const row = parsed.data;
    return {
      row,
      classification: classifyIndexUsage({
        seeks: row.userSeeks,
        scans: row.userScans,
        lookups: row.userLookups,
        updates: row.userUpdates,
        isClustered: row.indexType === 'CLUSTERED',
      }),
    };
  });

  return analyzed.sort(
    (a, b) =>
      b.classification.priorityScore - a.classification.priorityScore ||
      b.classification.totalReads - a.classification.totalReads ||
      b.classification.scanToSeekRatio - a.classification.scanToSeekRatio
  );
}

export function toIndexUsageReport(
  { row, classification }: AnalyzedIndex,
  now: Date
) {
  return {
    'Schema Name': row.schemaName,
    'Table Name': row.tableName,
    'Index Name': row.indexName,
    'Index Type': row.indexType,
    'User Seeks': row.userSeeks,
    'User Scans': row.userScans,
    'User Lookups': row.userLookups,
    'User Updates': row.userUpdates,
    'Total Reads': classification.totalReads,
    'Scan/Seek Ratio': roundRatio(classification.scanToSeekRatio),
    'Read/Write Ratio': roundRatio(classification.readToWriteRatio),
    'Lookup %': roundRatio(classification.lookupPercentage),
    Recommendation: classification.recommendation,
    'Priority Score': classification.priorityScore,
    'Last Seek': describeLastActivity(row.lastUserSeek, now),
    'Last Scan': describeLastActivity(row.lastUserScan, now),
    'Last Lookup': describeLastActivity(row.lastUserLookup, now),
    'Last Update': describeLastActivity(row.lastUserUpdate, now),
  };
}

export async function getIndexUsageAnalysis({
  tableNames,
  db,
  now = new Date(),
}: {
  tableNames?: string[];
  db: QueryExecutor;
  now?: Date;
}): Promise<string> {
  const filter = buildTableFilter('OBJECT_NAME(i.object_id)', tableNames);

  const query = `-- =====================================================
-- Index usage counters for every named index in the current database
-- Missing usage rows mean the index has not been touched since restart
-- =====================================================
SELECT
    OBJECT_SCHEMA_NAME(i.object_id) AS schemaName,
    OBJECT_NAME(i.object_id) AS tableName,
    i.name AS indexName,
    i.type_desc AS indexType,
    i.object_id AS objectId,
    ISNULL(s.user_seeks, 0) AS userSeeks,
    ISNULL(s.user_scans, 0) AS userScans,
    ISNULL(s.user_lookups, 0) AS userLookups,
    ISNULL(s.user_updates, 0) AS userUpdates,
    s.last_user_seek AS lastUserSeek,
    s.last_user_scan AS lastUserScan,
    s.last_user_lookup AS lastUserLookup,
    s.last_user_update AS lastUserUpdate
FROM
    sys.indexes i
    LEFT JOIN sys.dm_db_index_usage_stats s ON i.object_id = s.object_id
    AND i.index_id = s.index_id
    AND s.database_id = DB_ID()
WHERE
    i.object_id > 100 -- Exclude system objects
    AND i.name IS NOT NULL -- Exclude heaps
    ${filter.clause};`;

  const result = await db.executeQuery<unknown>({
    query,
    parameters: filter.parameters,
  });
  if (!result || result.length === 0) {
    return filter.clause
      ? 'No index usage statistics found for the specified tables.'
      : 'No index usage statistics found in the current database.';
  }
  const report = analyzeIndexUsageRows(result).map((analyzed) =>
    toIndexUsageReport(analyzed, now)
  );
  return JSON.stringify(report, null, 2);
}
