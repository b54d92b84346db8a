/**
 * JSON adapter: file or inline string sources.
 *
 * @module services/adapters/json-adapter
 */

import { z } from 'zod';
import { readOptions, type AdapterSettings } from '../../core/adapter-settings';
import { TransformationError } from '../../core/errors';
import { createValidationResult, type SourceAdapter, type ValidationResult } from '../../core/pipeline';
import { errorMessage } from '../../utils/logger';
import { inlineParser, type ParseWorkerPool } from '../parse-workers';
import { readTextSource, textSourceSchema } from './sources';

const jsonOptionsSchema = textSourceSchema.extend({
  expected_schema: z.array(z.string()).optional(),
  flatten: z.boolean().default(false)
});

type JsonOptions = z.output<typeof jsonOptionsSchema>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Nested objects become dotted keys: `{a: {b: 1}}` → `{'a.b': 1}`. Arrays are
 * kept as values.
 */
export function flattenObject(input: Record<string, unknown>, parentKey = ''): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const path = parentKey ? `${parentKey}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(out, flattenObject(value, path));
    } else {
      out[path] = value;
    }
  }
  return out;
}

export class JsonAdapter implements SourceAdapter<string, unknown> {
  private readonly options: JsonOptions;
  private readonly parser: ParseWorkerPool;
  // validate and transform see the same raw text; parse it once
  private lastParse: { raw: string; result: Promise<unknown> } | null = null;

  constructor(settings: AdapterSettings, deps: { parser?: ParseWorkerPool } = {}) {
    this.options = readOptions(settings, jsonOptionsSchema);
    this.parser = deps.parser ?? inlineParser;
  }

  async collect(): Promise<string> {
    return readTextSource(this.options, 'JSON');
  }

  async validate(raw: string): Promise<ValidationResult> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const metrics: Record<string, unknown> = {};

    try {
      const parsed = await this.parse(raw);
      metrics.valid_json = true;
      metrics.data_size_bytes = Buffer.byteLength(raw, 'utf8');

      const expected = this.options.expected_schema;
      if (expected && expected.length > 0) {
        const present = isPlainObject(parsed) ? new Set(Object.keys(parsed)) : new Set<string>();
        const missing = expected.filter(key => !present.has(key));
        if (missing.length > 0) {
          warnings.push(`Missing expected keys: ${missing.join(', ')}`);
        }
      }
    } catch (error) {
      errors.push(`Invalid JSON: ${errorMessage(error)}`);
      metrics.valid_json = false;
    }

    return createValidationResult({ errors, warnings, metrics });
  }

  async transform(raw: string): Promise<unknown> {
    let parsed: unknown;
    try {
      parsed = await this.parse(raw);
    } catch (error) {
      throw new TransformationError(`Failed to parse JSON: ${errorMessage(error)}`, {}, { cause: error });
    }

    if (this.options.flatten && isPlainObject(parsed)) {
      return flattenObject(parsed);
    }
    return parsed;
  }

  async cleanup(): Promise<void> {
    this.lastParse = null;
  }

  private parse(raw: string): Promise<unknown> {
    if (this.lastParse === null || this.lastParse.raw !== raw) {
      this.lastParse = { raw, result: this.parser.parseJson(raw) };
    }
    return this.lastParse.result;
  }
}
