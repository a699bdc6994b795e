import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * A row returned by a DMV query did not have the expected shape.
 */
export class QueryResultError extends Error {
  constructor(
    public readonly queryName: string,
    public readonly rowIndex: number,
    detail: string
  ) {
    super(`Unexpected row ${rowIndex} from ${queryName}: ${detail}`);
    this.name = 'QueryResultError';
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
