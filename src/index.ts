#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './stdioServer.js';
import { loadConfig } from './config.js';
import { logger, setLogLevel } from './logger.js';
import { MSSQL } from './MSSQL.js';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const db = MSSQL.getInstance(config.mssql);
  const mcpServer = createMcpServer({ db });

  const shutdown = (signal: string) => {
    logger.info('shutting down', { signal });
    Promise.all([mcpServer.close(), MSSQL.resetInstance()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('error during shutdown', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  logger.info('MSSQL index usage MCP server running on stdio', {
    server: config.mssql.server,
    database: config.mssql.database,
  });
}

main().catch((error) => {
  logger.error('fatal error in main()', error);
  process.exit(1);
});
