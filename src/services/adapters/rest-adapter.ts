/**
 * REST adapter: one HTTP request per attempt via the global fetch.
 *
 * Idempotent methods may retry transient failures inside `collect` (see
 * `utils/retry`). Anything still failing after that is a {@link CollectionError}.
 *
 * @module services/adapters/rest-adapter
 */

import { z } from 'zod';
import { readOptions, type AdapterSettings } from '../../core/adapter-settings';
import { CollectionError, TransformationError } from '../../core/errors';
import { createValidationResult, type SourceAdapter, type ValidationResult } from '../../core/pipeline';
import { errorMessage } from '../../utils/logger';
import { httpRetrySchema, parseRetryAfter, RetryableStatusError, withRetry } from '../../utils/retry';

export interface RestResponse {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

export type FetchFn = typeof fetch;

const authSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('basic'), username: z.string().min(1), password: z.string() }),
  z.object({ type: z.literal('bearer'), token: z.string().min(1) })
]);

const restOptionsSchema = z.object({
  endpoint: z.string().min(1, "REST adapter requires an 'endpoint' URL in the config"),
  base_url: z.string().url().optional(),
  method: z
    .string()
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE']))
    .default('GET'),
  headers: z.record(z.string()).default({}),
  query_params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  body: z.unknown().optional(),
  timeout: z.number().positive().max(300, 'timeout exceeds maximum allowed value of 300 seconds').default(30),
  auth: authSchema.default({ type: 'none' }),
  response_format: z.enum(['auto', 'json', 'text']).default('auto'),
  expected_status: z.array(z.number().int()).optional(),
  max_content_length: z.number().int().positive().optional(),
  retry: httpRetrySchema.default({}),
  validation: z
    .object({
      required_fields: z.array(z.string()).default([])
    })
    .default({})
});

type RestOptions = z.output<typeof restOptionsSchema>;

export class RestAdapter implements SourceAdapter<RestResponse, unknown> {
  private readonly options: RestOptions;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(settings: AdapterSettings, deps: { fetch?: FetchFn; sleep?: (ms: number) => Promise<void> } = {}) {
    this.options = readOptions(settings, restOptionsSchema);
    this.fetchImpl = deps.fetch ?? fetch;
    this.sleep = deps.sleep;
  }

  async collect(): Promise<RestResponse> {
    const url = this.resolveUrl();
    const { method, retry } = this.options;

    return withRetry(() => this.request(url), retry, {
      method,
      ...(this.sleep ? { sleep: this.sleep } : {})
    }).catch((error: unknown) => {
      if (error instanceof CollectionError) {
        throw error;
      }
      if (error instanceof RetryableStatusError) {
        throw new CollectionError(`HTTP request failed with status ${error.status}`, { url, status: error.status });
      }
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new CollectionError(`HTTP request timed out after ${this.options.timeout} seconds`, { url });
      }
      throw new CollectionError(`HTTP request failed: ${errorMessage(error)}`, { url }, { cause: error });
    });
  }

  async validate(response: RestResponse): Promise<ValidationResult> {
    const errors: string[] = [];
    const warnings: string[] = [];
    const metrics: Record<string, unknown> = {
      status_code: response.status,
      content_type: response.contentType,
      response_size_bytes: Buffer.byteLength(response.body, 'utf8')
    };

    if (response.body.length === 0) {
      warnings.push('Response body is empty');
    }

    const required = this.options.validation.required_fields;
    if (required.length > 0) {
      const parsed = this.tryParseJson(response.body);
      const keys = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? Object.keys(parsed) : [];
      const missing = required.filter(field => !keys.includes(field));
      metrics.missing_fields = missing;
      if (missing.length > 0) {
        errors.push(`Response is missing required fields: ${missing.join(', ')}`);
      }
    }

    return createValidationResult({ errors, warnings, metrics });
  }

  async transform(response: RestResponse): Promise<unknown> {
    const format = this.options.response_format;
    const wantsJson = format === 'json' || (format === 'auto' && response.contentType.includes('json'));

    if (!wantsJson) {
      return { url: response.url, status: response.status, body: response.body };
    }

    try {
      return { url: response.url, status: response.status, body: JSON.parse(response.body) };
    } catch (error) {
      throw new TransformationError(`Failed to parse JSON response body: ${errorMessage(error)}`, {}, { cause: error });
    }
  }

  async cleanup(): Promise<void> {
    return;
  }

  private resolveUrl(): string {
    const { endpoint, base_url: baseUrl, query_params: query } = this.options;

    let url: URL;
    try {
      url = baseUrl ? new URL(endpoint, baseUrl) : new URL(endpoint);
    } catch {
      throw new CollectionError(
        baseUrl ? `Invalid endpoint URL: ${endpoint}` : 'Relative endpoints require a base_url configuration'
      );
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new CollectionError('Only HTTP(S) endpoints are supported');
    }

    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { ...this.options.headers };
    const auth = this.options.auth;
    if (auth.type === 'basic') {
      headers.authorization = `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;
    } else if (auth.type === 'bearer') {
      headers.authorization = `Bearer ${auth.token}`;
    }
    return headers;
  }

  private async request(url: string): Promise<RestResponse> {
    const { method, body, timeout, expected_status: expected, max_content_length: maxLength, retry } = this.options;
    const headers = this.buildHeaders();

    let payload: string | undefined;
    if (body !== undefined && method !== 'GET' && method !== 'HEAD') {
      payload = typeof body === 'string' ? body : JSON.stringify(body);
      if (typeof body !== 'string' && !Object.keys(headers).some(h => h.toLowerCase() === 'content-type')) {
        headers['content-type'] = 'application/json';
      }
    }

    const response = await this.fetchImpl(url, {
      method,
      headers,
      ...(payload !== undefined ? { body: payload } : {}),
      signal: AbortSignal.timeout(timeout * 1000)
    });

    if (retry.status_forcelist.includes(response.status)) {
      throw new RetryableStatusError(response.status, parseRetryAfter(response.headers.get('retry-after')));
    }

    const accepted = expected ? expected.includes(response.status) : response.ok;
    if (!accepted) {
      throw new CollectionError(`Unexpected HTTP status ${response.status}`, { url, status: response.status });
    }

    const declaredLength = response.headers.get('content-length');
    if (maxLength !== undefined && declaredLength !== null && Number(declaredLength) > maxLength) {
      throw new CollectionError(`Response exceeds max_content_length (${declaredLength} > ${maxLength})`, { url });
    }

    const text = await response.text();
    if (maxLength !== undefined && Buffer.byteLength(text, 'utf8') > maxLength) {
      throw new CollectionError(`Response exceeds max_content_length (${maxLength})`, { url });
    }

    return {
      url: response.url || url,
      status: response.status,
      contentType: response.headers.get('content-type') ?? '',
      body: text
    };
  }

  private tryParseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch {
      return null;
    }
  }
}
