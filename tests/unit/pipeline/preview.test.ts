/**
 * Preview validation tests
 *
 * @see src/services/pipeline/preview.ts
 */

import { describe, it, expect } from 'vitest';
import { PREVIEW_ERROR_LIMIT, previewValidation } from '../../../src/services/pipeline/index.js';
import { FatalParseError, bufferSource } from '../../../src/services/parsing/index.js';
import { InputValidationError } from '../../../src/utils/validation.js';
import { CUSTOMERS_HEADER, customersConfig } from '../helpers.js';

const CSV = [
  CUSTOMERS_HEADER,
  'C1,Alice,alice@example.com,100',
  ',Bob,bob@example.com,50',
  'C3,Carol,not-an-email,-5',
  'C4,Dan,dan@example.com,10',
].join('\n');

describe('previewValidation', () => {
  const config = customersConfig();

  it('reports error rows, rate and sample errors', async () => {
    const result = await previewValidation(bufferSource(CSV, 'customers.csv'), 'csv', config);
    expect(result).toEqual({
      sample_size: 4,
      valid_rows: 2,
      error_rows: 2,
      error_rate: 50,
      sample_errors: [
        {
          row_number: 2,
          kind: 'REQUIRED',
          message: 'customer_code is required',
          field_name: 'customer_code',
          field_value: '',
        },
        {
          row_number: 3,
          kind: 'FORMAT',
          message: 'email does not match expected pattern',
          field_name: 'email',
          field_value: 'not-an-email',
        },
        {
          row_number: 3,
          kind: 'RANGE',
          message: 'credit_limit must be at least 0',
          field_name: 'credit_limit',
          field_value: '-5',
        },
      ],
    });
  });

  it('stops after the sample size', async () => {
    const result = await previewValidation(bufferSource(CSV, 'customers.csv'), 'csv', config, {
      sampleSize: 2,
    });
    expect(result.sample_size).toBe(2);
    expect(result.valid_rows).toBe(1);
    expect(result.error_rows).toBe(1);
    expect(result.sample_errors.map((e) => e.row_number)).toEqual([2]);
  });

  it(`returns at most ${String(PREVIEW_ERROR_LIMIT)} sample errors`, async () => {
    const lines = [CUSTOMERS_HEADER];
    for (let i = 1; i <= 12; i++) lines.push(`C${String(i)},,c${String(i)}@example.com,1`);
    const result = await previewValidation(bufferSource(lines.join('\n')), 'csv', config);
    expect(result.error_rows).toBe(12);
    expect(result.error_rate).toBe(100);
    expect(result.sample_errors).toHaveLength(PREVIEW_ERROR_LIMIT);
    expect(result.sample_errors[9]?.row_number).toBe(10);
  });

  it('does not check duplicates', async () => {
    const json = JSON.stringify([
      { customer_code: 'C1', name: 'A' },
      { customer_code: 'C1', name: 'B' },
    ]);
    const result = await previewValidation(bufferSource(json, 'c.json'), 'json', config);
    expect(result.valid_rows).toBe(2);
    expect(result.sample_errors).toEqual([]);
  });

  it('reports a zero error rate for an empty file', async () => {
    const result = await previewValidation(bufferSource(`${CUSTOMERS_HEADER}\n`), 'csv', config);
    expect(result).toEqual({ sample_size: 0, valid_rows: 0, error_rows: 0, error_rate: 0, sample_errors: [] });
  });

  it('propagates framing errors', async () => {
    await expect(previewValidation(bufferSource('[{"a":1}'), 'json', config)).rejects.toThrow(FatalParseError);
  });

  it('rejects an invalid sample size', async () => {
    await expect(
      previewValidation(bufferSource(CSV), 'csv', config, { sampleSize: 0 })
    ).rejects.toThrow(InputValidationError);
  });
});
