import type { QueryParameter } from '../../../MSSQL.js';

export interface TableFilter {
  /** `AND <column> IN (...)`, or an empty string when no tables were named. */
  clause: string;
  parameters: Record<string, QueryParameter>;
}

/**
 * Builds a parameterized IN filter so table names never reach the SQL text.
 */
export function buildTableFilter(
  column: string,
  tableNames: readonly string[] | undefined
): TableFilter {
  const names = [...new Set((tableNames ?? []).map((name) => name.trim()))]
    .filter((name) => name.length > 0);
  if (names.length === 0) {
    return { clause: '', parameters: {} };
  }
  const parameters: Record<string, QueryParameter> = {};
  const placeholders = names.map((name, i) => {
    parameters[`tableName${i}`] = name;
    return `@tableName${i}`;
  });
  return {
    clause: `AND ${column} IN (${placeholders.join(', ')})`,
    parameters,
  };
}
