/**
 * Worker-thread pool for the CPU-bound parse stages of the JSON and CSV
 * adapters.
 *
 * Each thread runs a small CommonJS script that parses text with
 * `JSON.parse` or csv-parse and posts the result back, so large documents
 * never stall the event loop that serves HTTP requests and the queue. With
 * zero threads, or once every thread has died, parsing runs inline.
 *
 * @module services/parse-workers
 */

import { Worker } from 'node:worker_threads';
import { parse as csvParse, type Options as CsvParseOptions } from 'csv-parse/sync';
import { z } from 'zod';
import { errorMessage, logger } from '../utils/logger';

export type ParseKind = 'json' | 'csv';

export interface CsvParseSettings {
  delimiter: string;
  quote: string;
  fromLine: number;
}

export interface ParseWorkerPoolOptions {
  /** Worker threads to spawn. 0 parses inline on the calling thread. */
  threads?: number;
}

export interface ParseWorkerPoolStats {
  threads: number;
  busy: number;
  queued: number;
  completed: number;
  inline: boolean;
}

interface ParseRequest {
  id: number;
  kind: ParseKind;
  text: string;
  options?: CsvParseOptions;
}

interface ParseTask {
  request: ParseRequest;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
}

interface WorkerHandle {
  worker: Worker;
  task: ParseTask | null;
}

const WORKER_SCRIPT = `
const { parentPort, workerData } = require('node:worker_threads');

let csvParse = null;
const parsers = {
  json: (text) => JSON.parse(text),
  csv: (text, options) => {
    if (csvParse === null) {
      csvParse = require(workerData.csvParserPath).parse;
    }
    return csvParse(text, options);
  }
};

parentPort.on('message', (message) => {
  const id = message.id;
  try {
    const parser = parsers[message.kind];
    if (!parser) {
      throw new Error('Unknown parse kind: ' + message.kind);
    }
    parentPort.postMessage({ id, ok: true, value: parser(message.text, message.options) });
  } catch (error) {
    parentPort.postMessage({ id, ok: false, error: error instanceof Error ? error.message : String(error) });
  }
});
`;

const responseSchema = z.discriminatedUnion('ok', [
  z.object({ id: z.number(), ok: z.literal(true), value: z.unknown() }),
  z.object({ id: z.number(), ok: z.literal(false), error: z.string() })
]);

const resolveCsvParserPath = (): string | undefined => {
  try {
    return require.resolve('csv-parse/sync');
  } catch {
    return undefined;
  }
};

const toCsvOptions = (settings: CsvParseSettings): CsvParseOptions => ({
  delimiter: settings.delimiter,
  quote: settings.quote,
  from_line: settings.fromLine,
  skip_empty_lines: true,
  relax_column_count: true
});

function parseInline(kind: ParseKind, text: string, options?: CsvParseOptions): unknown {
  return kind === 'json' ? JSON.parse(text) : csvParse(text, options);
}

export class ParseWorkerPool {
  private readonly workers: WorkerHandle[] = [];
  private readonly queue: ParseTask[] = [];
  private readonly csvParserPath: string | undefined;
  private nextId = 1;
  private completed = 0;
  private inlineOnly: boolean;
  private closed = false;

  constructor(options: ParseWorkerPoolOptions = {}) {
    const threads = Math.max(0, Math.floor(options.threads ?? 0));
    this.csvParserPath = resolveCsvParserPath();
    this.inlineOnly = threads === 0;

    for (let i = 0; i < threads; i++) {
      this.spawnWorker();
    }
    if (this.workers.length === 0) {
      this.inlineOnly = true;
    }
  }

  parseJson(text: string): Promise<unknown> {
    return this.submit('json', text);
  }

  /** Rows as arrays of cells, header row included. */
  parseCsv(text: string, settings: CsvParseSettings): Promise<unknown> {
    return this.submit('csv', text, toCsvOptions(settings));
  }

  stats(): ParseWorkerPoolStats {
    return {
      threads: this.workers.length,
      busy: this.workers.filter(handle => handle.task !== null).length,
      queued: this.queue.length,
      completed: this.completed,
      inline: this.inlineOnly
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const closing = new Error('Parse worker pool closed');
    for (const task of this.queue.splice(0)) {
      task.reject(closing);
    }
    const handles = this.workers.splice(0);
    for (const handle of handles) {
      handle.task?.reject(closing);
      handle.task = null;
    }

    const results = await Promise.allSettled(handles.map(handle => handle.worker.terminate()));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn('parse worker did not terminate cleanly', { error: errorMessage(result.reason) });
      }
    }
  }

  private async submit(kind: ParseKind, text: string, options?: CsvParseOptions): Promise<unknown> {
    if (this.closed) {
      throw new Error('Parse worker pool closed');
    }
    if (this.inlineOnly || (kind === 'csv' && this.csvParserPath === undefined)) {
      const value = parseInline(kind, text, options);
      this.completed++;
      return value;
    }

    return new Promise<unknown>((resolve, reject) => {
      const request: ParseRequest = { id: this.nextId++, kind, text, ...(options ? { options } : {}) };
      this.queue.push({ request, resolve, reject });
      this.dispatch();
    });
  }

  private spawnWorker(): void {
    try {
      const worker = new Worker(WORKER_SCRIPT, {
        eval: true,
        workerData: { csvParserPath: this.csvParserPath }
      });
      const handle: WorkerHandle = { worker, task: null };

      worker.on('message', (message: unknown) => this.handleMessage(handle, message));
      worker.on('error', error => this.handleFailure(handle, error));
      worker.on('exit', code => {
        if (code !== 0) {
          this.handleFailure(handle, new Error(`Parse worker exited with code ${code}`));
        }
      });

      // Idle threads must not keep the process alive.
      worker.unref();
      this.workers.push(handle);
    } catch (error) {
      logger.warn('parse worker could not be started, parsing inline', { error: errorMessage(error) });
    }
  }

  private dispatch(): void {
    for (const handle of this.workers) {
      if (handle.task !== null) continue;
      const task = this.queue.shift();
      if (!task) return;

      handle.task = task;
      handle.worker.ref();
      try {
        handle.worker.postMessage(task.request);
      } catch (error) {
        handle.task = null;
        handle.worker.unref();
        this.runInline(task, error);
      }
    }
  }

  private handleMessage(handle: WorkerHandle, message: unknown): void {
    const task = handle.task;
    handle.task = null;
    handle.worker.unref();

    const response = responseSchema.safeParse(message);
    if (task && response.success && response.data.id === task.request.id) {
      this.completed++;
      if (response.data.ok) {
        task.resolve(response.data.value);
      } else {
        task.reject(new Error(response.data.error));
      }
    } else if (task) {
      this.runInline(task, new Error('Malformed parse worker response'));
    }

    this.dispatch();
  }

  private handleFailure(handle: WorkerHandle, error: unknown): void {
    const index = this.workers.indexOf(handle);
    if (index < 0) return;
    this.workers.splice(index, 1);

    logger.error('parse worker failed', { error: errorMessage(error), remaining: this.workers.length });

    const task = handle.task;
    handle.task = null;
    if (task) {
      this.runInline(task, error);
    }

    if (this.workers.length === 0) {
      this.inlineOnly = true;
      for (const queued of this.queue.splice(0)) {
        this.runInline(queued, error);
      }
      return;
    }
    this.dispatch();
  }

  private runInline(task: ParseTask, cause: unknown): void {
    logger.debug('parsing inline after worker failure', { kind: task.request.kind, cause: errorMessage(cause) });
    try {
      task.resolve(parseInline(task.request.kind, task.request.text, task.request.options));
      this.completed++;
    } catch (error) {
      task.reject(error instanceof Error ? error : new Error(errorMessage(error)));
    }
  }
}

/** Shared inline parser for adapters built without a pool. */
export const inlineParser = new ParseWorkerPool({ threads: 0 });
