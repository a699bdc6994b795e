import { describe, expect, it } from 'vitest';
import { buildTableFilter } from '../src/features/indexUsageTools/tableLevelTools/tableFilter.js';

describe('buildTableFilter', () => {
  it('adds no clause when no tables are named', () => {
    expect(buildTableFilter('t.name', undefined)).toEqual({ clause: '', parameters: {} });
    expect(buildTableFilter('t.name', ['  '])).toEqual({ clause: '', parameters: {} });
  });

  it('binds each distinct table name as a parameter', () => {
    expect(buildTableFilter('t.name', ['Orders', ' Orders ', '', 'Customers'])).toEqual({
      clause: 'AND t.name IN (@tableName0, @tableName1)',
      parameters: { tableName0: 'Orders', tableName1: 'Customers' },
    });
  });

  it('keeps quotes out of the SQL text', () => {
    const filter = buildTableFilter('t.name', ["x'; DROP TABLE Orders;--"]);
    expect(filter.clause).toBe('AND t.name IN (@tableName0)');
    expect(filter.parameters).toEqual({ tableName0: "x'; DROP TABLE Orders;--" });
  });
});
