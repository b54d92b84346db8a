/**
 * HTML adapter (jsdom). Sources: inline string, file or URL.
 *
 * The document is parsed once in `collect`; `cleanup` closes its window.
 *
 * @module services/adapters/html-adapter
 */

import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { readOptions, type AdapterSettings } from '../../core/adapter-settings';
import { CollectionError, ValidationError } from '../../core/errors';
import { createValidationResult, type SourceAdapter, type ValidationResult } from '../../core/pipeline';
import { errorMessage } from '../../utils/logger';
import { readTextSource } from './sources';
import type { FetchFn } from './rest-adapter';

export interface HtmlDocument {
  url: string | null;
  statusCode: number | null;
  content: string;
  elapsedMs: number;
  dom: JSDOM;
}

export interface HtmlLink {
  href: string;
  text: string | null;
}

const htmlOptionsSchema = z.object({
  source_type: z.enum(['string', 'file', 'url']).default('url'),
  data: z.string().optional(),
  path: z.string().optional(),
  url: z.string().url().optional(),
  headers: z.record(z.string()).default({}),
  timeout: z.number().positive().max(300).default(30),
  validation: z.unknown().optional(),
  transformation: z
    .object({
      include_text: z.boolean().default(true),
      include_links: z.boolean().default(true),
      include_metadata: z.boolean().default(false),
      include_raw: z.boolean().default(false),
      max_text_chars: z.number().int().positive().optional(),
      selectors: z.record(z.string()).default({})
    })
    .strict()
    .default({})
});

const validationRulesSchema = z
  .object({
    expected_statuses: z.union([z.number().int(), z.array(z.number().int())]).default([200]),
    min_content_length: z.number().int().nonnegative().optional(),
    max_content_length: z.number().int().positive().optional(),
    required_selectors: z.array(z.string()).default([])
  })
  .strict();

type HtmlOptions = z.output<typeof htmlOptionsSchema>;

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export class HtmlAdapter implements SourceAdapter<HtmlDocument, Record<string, unknown>> {
  private readonly options: HtmlOptions;
  private readonly fetchImpl: FetchFn;
  private readonly now: () => number;

  constructor(settings: AdapterSettings, deps: { fetch?: FetchFn; now?: () => number } = {}) {
    this.options = readOptions(settings, htmlOptionsSchema);
    this.fetchImpl = deps.fetch ?? fetch;
    this.now = deps.now ?? Date.now;
  }

  async collect(): Promise<HtmlDocument> {
    const started = this.now();
    const { source_type: sourceType } = this.options;

    let url: string | null = null;
    let statusCode: number | null = null;
    let content: string;

    if (sourceType === 'url') {
      if (!this.options.url) {
        throw new CollectionError("HTML adapter requires a 'url' in the config");
      }
      url = this.options.url;
      try {
        const response = await this.fetchImpl(url, {
          headers: this.options.headers,
          signal: AbortSignal.timeout(this.options.timeout * 1000)
        });
        statusCode = response.status;
        content = await response.text();
      } catch (error) {
        throw new CollectionError(`HTTP request failed: ${errorMessage(error)}`, { url }, { cause: error });
      }
    } else {
      content = await readTextSource(
        { source_type: sourceType, path: this.options.path, data: this.options.data, encoding: 'utf8' },
        'HTML'
      );
    }

    const dom = new JSDOM(content, url ? { url } : {});
    return { url, statusCode, content, elapsedMs: this.now() - started, dom };
  }

  async validate(doc: HtmlDocument): Promise<ValidationResult> {
    const rules = this.resolveRules();
    const errors: string[] = [];
    const warnings: string[] = [];
    const document = doc.dom.window.document;
    const textLength = collapseWhitespace(document.body?.textContent ?? '').length;
    const contentLength = Buffer.byteLength(doc.content, 'utf8');

    const metrics: Record<string, unknown> = {
      content_length: contentLength,
      title_present: document.title.trim().length > 0,
      text_length: textLength,
      link_count: document.querySelectorAll('a[href]').length,
      elapsed_ms: doc.elapsedMs
    };

    if (doc.statusCode !== null) {
      metrics.status_code = doc.statusCode;
      const expected = Array.isArray(rules.expected_statuses) ? rules.expected_statuses : [rules.expected_statuses];
      if (!expected.includes(doc.statusCode)) {
        errors.push(`Unexpected status code: ${doc.statusCode} (expected ${expected.join(', ')})`);
      }
    }

    if (rules.min_content_length !== undefined && contentLength < rules.min_content_length) {
      errors.push(`Response body too small: ${contentLength} bytes (< ${rules.min_content_length})`);
    }
    if (rules.max_content_length !== undefined && contentLength > rules.max_content_length) {
      warnings.push(`Response body large: ${contentLength} bytes (> ${rules.max_content_length})`);
    }

    for (const selector of rules.required_selectors) {
      let found: boolean;
      try {
        found = document.querySelector(selector) !== null;
      } catch {
        throw new ValidationError(`Invalid required selector: '${selector}'`);
      }
      if (!found) {
        errors.push(`Required selector missing content: '${selector}'`);
      }
    }

    return createValidationResult({ errors, warnings, metrics });
  }

  async transform(doc: HtmlDocument): Promise<Record<string, unknown>> {
    const cfg = this.options.transformation;
    const document = doc.dom.window.document;
    const title = document.title.trim();

    const result: Record<string, unknown> = {
      url: doc.url,
      status_code: doc.statusCode,
      title: title.length > 0 ? title : null
    };

    if (cfg.include_text) {
      const text = collapseWhitespace(document.body?.textContent ?? '');
      result.text = cfg.max_text_chars !== undefined ? text.slice(0, cfg.max_text_chars) : text;
    }

    if (cfg.include_links) {
      const links = new Map<string, HtmlLink>();
      for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
        const href = anchor.getAttribute('href');
        if (!href) continue;
        const text = collapseWhitespace(anchor.textContent ?? '');
        links.set(href, { href, text: text.length > 0 ? text : null });
      }
      result.links = Array.from(links.values());
    }

    if (cfg.include_metadata) {
      result.metadata = Array.from(document.querySelectorAll('meta'))
        .map(meta => Object.fromEntries(Array.from(meta.attributes, attr => [attr.name, attr.value])))
        .filter(attrs => Object.keys(attrs).length > 0);
    }

    const selectorEntries = Object.entries(cfg.selectors);
    if (selectorEntries.length > 0) {
      const extracted: Record<string, string[]> = {};
      for (const [key, selector] of selectorEntries) {
        extracted[key] = Array.from(document.querySelectorAll(selector), node => collapseWhitespace(node.textContent ?? ''));
      }
      result.extracted = extracted;
    }

    if (cfg.include_raw) {
      result.raw_html = doc.content;
    }

    return result;
  }

  async cleanup(doc: HtmlDocument): Promise<void> {
    doc.dom.window.close();
  }

  private resolveRules(): z.output<typeof validationRulesSchema> {
    const parsed = validationRulesSchema.safeParse(this.options.validation ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`Invalid HTML validation rules: ${issue ? `${issue.path.join('.') || 'validation'}: ${issue.message}` : 'malformed'}`);
    }
    return parsed.data;
  }
}
