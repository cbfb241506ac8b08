/**
 * Delimiter and table configuration detection tests
 *
 * @see src/services/parsing/delimiter.ts
 * @see src/services/parsing/detect.ts
 */

import { describe, it, expect } from 'vitest';
import { detectDelimiter, detectTableConfig } from '../../../src/services/parsing/index.js';
import { InputValidationError, compileTableConfig } from '../../../src/utils/validation.js';

describe('detectDelimiter', () => {
  it('picks the most frequent candidate', () => {
    expect(detectDelimiter('a;b;c\n1;2,5;3\n')).toBe(';');
    expect(detectDelimiter('a|b|c\n')).toBe('|');
  });

  it('falls back to a comma when no candidate occurs', () => {
    expect(detectDelimiter('single_column\nvalue\n')).toBe(',');
    expect(detectDelimiter('')).toBe(',');
  });

  it('breaks ties in candidate order', () => {
    expect(detectDelimiter('a;b,c')).toBe(',');
    expect(detectDelimiter('a|b\tc')).toBe('\t');
  });

  it('ignores candidates inside quotes', () => {
    expect(detectDelimiter('"a,b,c,d";x;y\n')).toBe(';');
  });
});

describe('detectTableConfig', () => {
  const customers = compileTableConfig({
    table: 'customers',
    columns: [{ column: 'customer_code' }, { column: 'name' }, { column: 'email' }],
  });
  const orders = compileTableConfig({
    table: 'orders',
    columns: [
      { column: 'order_number' },
      { column: 'customer_code', field: 'customer_id' },
      { column: 'total_amount' },
    ],
    rules: [{ kind: 'REQUIRED', field: 'order_date' }],
  });
  const configs = [customers, orders];

  it('picks the configuration with the largest field overlap', () => {
    expect(detectTableConfig(['customer_code', 'name', 'email'], configs).table).toBe('customers');
    expect(detectTableConfig(['order_number', 'customer_id', 'order_date'], configs).table).toBe('orders');
  });

  it('counts fields referenced only by rules', () => {
    expect(detectTableConfig(['order_date', 'unrelated'], configs).table).toBe('orders');
  });

  it('rejects headers that match nothing', () => {
    expect(() => detectTableConfig(['x', 'y'], configs)).toThrow(
      'No table configuration matches the file headers: x, y'
    );
    expect(() => detectTableConfig([], configs)).toThrow(
      'No table configuration matches the file headers: (none)'
    );
  });

  it('rejects a tie', () => {
    expect(() => detectTableConfig(['name', 'order_number'], configs)).toThrow(InputValidationError);
    expect(() => detectTableConfig(['name', 'order_number'], configs)).toThrow(
      'Ambiguous table configuration: customers, orders each match 1 fields'
    );
  });
});
