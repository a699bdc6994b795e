import { getIndexUsageAnalysis } from './features/indexUsageTools/tableLevelTools/getIndexUsageAnalysis.js';
import { getHeapScanAnalysis } from './features/indexUsageTools/tableLevelTools/getHeapScanAnalysis.js';
import { classifyIndexUsage } from './features/indexUsageTools/classification/classifyIndexUsage.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { QueryExecutor } from './MSSQL.js';
import { formatError } from './errors.js';
import { logger } from './logger.js';
import { z } from 'zod';

function textResult(text: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

function errorResult(action: string, error: unknown): CallToolResult {
  logger.error(`tool failed: ${action}`, error);
  return {
    content: [
      {
        type: 'text',
        text: `Error ${action}: ${formatError(error)}`,
      },
    ],
    isError: true,
  };
}

const counter = z.number().int().nonnegative();

export function createMcpServer({ db }: { db: QueryExecutor }): McpServer {
  const mcpServer = new McpServer({
    name: 'mssql-index-usage',
    version: '1.0.0',
  });

  /* Prompts
  --------------------------------------------------*/
  mcpServer.registerPrompt(
    'review-index-usage',
    {
      title: 'Review Index Usage',
      description:
        'Review index usage on specified tables and propose manual index changes.',
      argsSchema: { tableNames: z.string() },
    },
    ({ tableNames }) => ({
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: `Fetch the index usage analysis for these tables: ${tableNames}, using only tools from the “mssql-index-usage” MCP server. If you receive an error from any of the tools, stop right away and inform the user about the error. If no tables are provided, analyze every index in the current database.

Usage counters reset when SQL Server restarts. Before recommending anything, tell the user that the numbers only cover the period since the last restart.

Work through the indexes in order of their priority score:
- "CONSIDER DROPPING - Unused": confirm the index does not enforce uniqueness and is not needed for month-end or other periodic workloads, then propose a DROP INDEX statement.
- "OPTIMIZE - High Scans, No Seeks" and "OPTIMIZE - Poor Scan/Seek Ratio": the key columns do not match the predicates. Propose reordering the key columns or a more selective index.
- "COVERING INDEX - High Key Lookups": propose recreating the index with the looked-up columns in an INCLUDE clause.
- "HIGH MAINTENANCE - More Updates than Reads": weigh the write cost against the reads it serves.

Also fetch the heap scan analysis and propose a clustered or selective index for every heap marked "HIGH PRIORITY".

Important: do not make up optimizations if they are unnecessary. If the indexes are performing well, say so.

Write every proposed change to "index_usage_changes.sql" with a comment explaining it, and the statements that undo them to "index_usage_rollback.sql". Do not run any of them.
`,
          },
        },
      ],
    })
  );

  /* Tools
  --------------------------------------------------*/
  mcpServer.registerTool(
    'get-index-usage-analysis',
    {
      title: 'Get Index Usage Analysis',
      description:
        'Classify index usage (seeks, scans, lookups, updates) for specified tables, or every table when none are given, ordered by priority',
      inputSchema: { tableNames: z.array(z.string()).optional() },
    },
    async ({ tableNames }) => {
      try {
        const analysis = await getIndexUsageAnalysis({ tableNames, db });
        return textResult(analysis);
      } catch (error) {
        return errorResult('retrieving index usage analysis', error);
      }
    }
  );

  mcpServer.registerTool(
    'get-heap-scan-analysis',
    {
      title: 'Get Heap Scan Analysis',
      description:
        'Find heap tables with high scan counts that may need a selective index',
      inputSchema: {},
    },
    async () => {
      try {
        const analysis = await getHeapScanAnalysis({ db });
        return textResult(analysis);
      } catch (error) {
        return errorResult('retrieving heap scan analysis', error);
      }
    }
  );

  mcpServer.registerTool(
    'classify-index-usage',
    {
      title: 'Classify Index Usage',
      description:
        'Classify a single index from its usage counters without querying the database',
      inputSchema: {
        seeks: counter,
        scans: counter,
        lookups: counter,
        updates: counter,
        isClustered: z.boolean().default(false),
      },
    },
    async ({ seeks, scans, lookups, updates, isClustered }) => {
      try {
        const classification = classifyIndexUsage({
          seeks,
          scans,
          lookups,
          updates,
          isClustered,
        });
        return textResult(JSON.stringify(classification, null, 2));
      } catch (error) {
        return errorResult('classifying index usage', error);
      }
    }
  );

  return mcpServer;
}
