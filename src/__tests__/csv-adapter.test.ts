import { describe, it, expect } from 'vitest';
import { prepareAttempt } from '../core/adapter-settings';
import { CollectionError, ValidationError } from '../core/errors';
import { processAdapter } from '../core/pipeline';
import { CsvAdapter } from '../services/adapters/csv-adapter';

const csvAdapter = (data: string, extra: Record<string, unknown> = {}) => {
  const { settings } = prepareAttempt('csv', { source_type: 'string', data, ...extra });
  return { adapter: new CsvAdapter(settings), settings };
};

const INVENTORY = ['sku,name,qty', 'A1,Widget,4', 'B2,Gadget,', 'A1,Widget,4'].join('\n');

describe('CsvAdapter', () => {
  it('parses the header row and maps rows by column', async () => {
    const { adapter } = csvAdapter(INVENTORY);

    const table = await adapter.collect();

    expect(table.columns).toEqual(['sku', 'name', 'qty']);
    expect(table.rows).toEqual([
      { sku: 'A1', name: 'Widget', qty: '4' },
      { sku: 'B2', name: 'Gadget', qty: '' },
      { sku: 'A1', name: 'Widget', qty: '4' },
    ]);
  });

  it('honors delimiter, quote and skipped rows', async () => {
    const text = ['# exported 2026-01-01', 'id;label', "1;'a;b'"].join('\n');
    const { adapter } = csvAdapter(text, { csv_options: { delimiter: ';', quote: "'", skip_rows: 1 } });

    expect(await adapter.collect()).toEqual({ columns: ['id', 'label'], rows: [{ id: '1', label: 'a;b' }] });
  });

  it('reports metrics and passes with default rules', async () => {
    const { adapter, settings } = csvAdapter(INVENTORY);

    const payload = await processAdapter(adapter, settings);

    expect(payload.validation.isValid).toBe(true);
    expect(payload.validation.metrics).toEqual({
      row_count: 3,
      column_count: 3,
      missing_columns: [],
      has_empty_values: true,
    });
  });

  it('collects every rule violation', async () => {
    const { adapter } = csvAdapter(INVENTORY, {
      validation: { min_rows: 5, required_columns: ['sku', 'price', 'currency'], allow_empty_values: false },
    });

    const result = await adapter.validate(await adapter.collect());

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      'CSV has 3 rows, minimum required is 5',
      'CSV is missing required columns: currency, price',
      'CSV contains empty values but allow_empty_values is false',
    ]);
    expect(result.metrics.missing_columns).toEqual(['price', 'currency']);
  });

  it('flags a header-only file as empty', async () => {
    const { adapter } = csvAdapter('sku,name\n');

    const result = await adapter.validate(await adapter.collect());

    expect(result.errors).toEqual(['CSV file is empty']);
  });

  it('enforces max_rows', async () => {
    const { adapter } = csvAdapter(INVENTORY, { validation: { max_rows: 2 } });
    const result = await adapter.validate(await adapter.collect());
    expect(result.errors).toEqual(['CSV has 3 rows, maximum allowed is 2']);
  });

  it('raises ValidationError for malformed rules', async () => {
    const { adapter } = csvAdapter(INVENTORY, { validation: { min_rows: 'ten' } });
    const table = await adapter.collect();

    await expect(adapter.validate(table)).rejects.toBeInstanceOf(ValidationError);
    await expect(adapter.validate(table)).rejects.toThrow(
      'Invalid CSV validation rules: min_rows: Expected number, received string'
    );
  });

  it('rejects unknown rule names', async () => {
    const { adapter } = csvAdapter(INVENTORY, { validation: { min_row: 1 } });
    await expect(adapter.validate(await adapter.collect())).rejects.toThrow(/^Invalid CSV validation rules: validation: /);
  });

  it('applies transformations', async () => {
    const text = ['SKU , Name', ' A1 , Widget ', 'A1,Widget', 'B2,Gadget'].join('\n');
    const { adapter } = csvAdapter(text, {
      transformation: { strip_whitespace: true, lowercase_columns: true, drop_duplicates: true },
    });

    const result = await adapter.transform(await adapter.collect());

    expect(result).toEqual({
      columns: ['sku ', ' name'],
      rows: [
        { 'sku ': 'A1', ' name': 'Widget' },
        { 'sku ': 'B2', ' name': 'Gadget' },
      ],
    });
  });

  it('wraps parser failures in CollectionError', async () => {
    const { adapter } = csvAdapter('a,b\n"unterminated,1');
    await expect(adapter.collect()).rejects.toBeInstanceOf(CollectionError);
    await expect(adapter.collect()).rejects.toThrow(/^Failed to collect CSV data: /);
  });

  it('requires data for string sources', async () => {
    const { adapter } = csvAdapter('');
    await expect(adapter.collect()).rejects.toThrow('CSV string not provided in config');
  });
});
