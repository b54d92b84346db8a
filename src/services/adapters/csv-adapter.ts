/**
 * CSV adapter (csv-parse, run on the parse worker pool). The first non-empty
 * line is the header row.
 *
 * Data problems (row counts, missing columns, blank cells) are reported in the
 * validation result. Malformed `validation` rules raise {@link ValidationError}.
 *
 * @module services/adapters/csv-adapter
 */

import { z } from 'zod';
import { readOptions, type AdapterSettings } from '../../core/adapter-settings';
import { CollectionError, ValidationError } from '../../core/errors';
import { createValidationResult, type SourceAdapter, type ValidationResult } from '../../core/pipeline';
import { errorMessage } from '../../utils/logger';
import { inlineParser, type ParseWorkerPool } from '../parse-workers';
import { readTextSource, textSourceSchema } from './sources';

export interface CsvTable {
  columns: string[];
  rows: Record<string, string>[];
}

const csvOptionsSchema = textSourceSchema.extend({
  csv_options: z
    .object({
      delimiter: z.string().min(1).default(','),
      skip_rows: z.number().int().nonnegative().default(0),
      quote: z.string().length(1).default('"')
    })
    .default({}),
  validation: z.unknown().optional(),
  transformation: z
    .object({
      strip_whitespace: z.boolean().default(false),
      lowercase_columns: z.boolean().default(false),
      drop_duplicates: z.boolean().default(false)
    })
    .default({})
});

const validationRulesSchema = z
  .object({
    min_rows: z.number().int().nonnegative().optional(),
    max_rows: z.number().int().nonnegative().optional(),
    required_columns: z.array(z.string()).default([]),
    allow_empty_values: z.boolean().default(true)
  })
  .strict();

const parsedRowsSchema = z.array(z.array(z.string()));

type CsvOptions = z.output<typeof csvOptionsSchema>;

export class CsvAdapter implements SourceAdapter<CsvTable, CsvTable> {
  private readonly options: CsvOptions;
  private readonly parser: ParseWorkerPool;

  constructor(settings: AdapterSettings, deps: { parser?: ParseWorkerPool } = {}) {
    this.options = readOptions(settings, csvOptionsSchema);
    this.parser = deps.parser ?? inlineParser;
  }

  async collect(): Promise<CsvTable> {
    const text = await readTextSource(this.options, 'CSV');
    const { delimiter, skip_rows: skipRows, quote } = this.options.csv_options;

    let parsed: unknown;
    try {
      parsed = await this.parser.parseCsv(text, { delimiter, quote, fromLine: skipRows + 1 });
    } catch (error) {
      throw new CollectionError(`Failed to collect CSV data: ${errorMessage(error)}`, {}, { cause: error });
    }

    const rows = parsedRowsSchema.safeParse(parsed);
    if (!rows.success) {
      throw new CollectionError('CSV parser returned an unexpected shape');
    }
    const [header = [], ...body] = rows.data;
    return {
      columns: header,
      rows: body.map(cells => Object.fromEntries(header.map((column, i) => [column, cells[i] ?? ''])))
    };
  }

  async validate(table: CsvTable): Promise<ValidationResult> {
    const rules = this.resolveRules();
    const errors: string[] = [];
    const rowCount = table.rows.length;
    const metrics: Record<string, unknown> = {
      row_count: rowCount,
      column_count: table.columns.length
    };

    if (rowCount === 0) {
      errors.push('CSV file is empty');
    }
    if (rules.min_rows !== undefined && rowCount < rules.min_rows) {
      errors.push(`CSV has ${rowCount} rows, minimum required is ${rules.min_rows}`);
    }
    if (rules.max_rows !== undefined && rowCount > rules.max_rows) {
      errors.push(`CSV has ${rowCount} rows, maximum allowed is ${rules.max_rows}`);
    }

    const present = new Set(table.columns);
    const missing = rules.required_columns.filter(column => !present.has(column));
    metrics.missing_columns = missing;
    if (missing.length > 0) {
      errors.push(`CSV is missing required columns: ${[...missing].sort().join(', ')}`);
    }

    const hasEmptyValues = table.rows.some(row => Object.values(row).some(value => value.trim() === ''));
    metrics.has_empty_values = hasEmptyValues;
    if (!rules.allow_empty_values && hasEmptyValues) {
      errors.push('CSV contains empty values but allow_empty_values is false');
    }

    return createValidationResult({ errors, metrics });
  }

  async transform(table: CsvTable): Promise<CsvTable> {
    const { strip_whitespace: strip, lowercase_columns: lowercase, drop_duplicates: dedupe } =
      this.options.transformation;

    const rename = (column: string): string => (lowercase ? column.toLowerCase() : column);
    const columns = table.columns.map(rename);

    let rows = table.rows.map(row =>
      Object.fromEntries(
        table.columns.map(column => {
          const value = row[column] ?? '';
          return [rename(column), strip ? value.trim() : value];
        })
      )
    );

    if (dedupe) {
      const seen = new Set<string>();
      rows = rows.filter(row => {
        const key = JSON.stringify(columns.map(column => row[column]));
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }

    return { columns, rows };
  }

  async cleanup(): Promise<void> {
    return;
  }

  private resolveRules(): z.output<typeof validationRulesSchema> {
    const parsed = validationRulesSchema.safeParse(this.options.validation ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Invalid CSV validation rules: ${issue ? `${issue.path.join('.') || 'validation'}: ${issue.message}` : 'malformed'}`
      );
    }
    return parsed.data;
  }
}
