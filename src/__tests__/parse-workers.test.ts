import { describe, it, expect, vi, afterEach } from 'vitest';
import { prepareAttempt } from '../core/adapter-settings';
import { CsvAdapter } from '../services/adapters/csv-adapter';
import { JsonAdapter } from '../services/adapters/json-adapter';
import { ParseWorkerPool } from '../services/parse-workers';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

const CSV_SETTINGS = { delimiter: ',', quote: '"', fromLine: 1 };

const jsonParseMessage = (text: string): string => {
  try {
    JSON.parse(text);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
  throw new Error(`${text} parsed`);
};

describe('ParseWorkerPool', () => {
  const pools: ParseWorkerPool[] = [];
  const createPool = (threads: number) => {
    const pool = new ParseWorkerPool({ threads });
    pools.push(pool);
    return pool;
  };

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(pools.splice(0).map(pool => pool.close()));
  });

  it('parses inline without threads', async () => {
    const pool = createPool(0);

    expect(await pool.parseJson('{"ok": true}')).toEqual({ ok: true });
    expect(pool.stats()).toEqual({ threads: 0, busy: 0, queued: 0, completed: 1, inline: true });
  });

  it('parses JSON on a worker thread, not the caller thread', async () => {
    const pool = createPool(1);
    const text = '{"items": [1, 2, 3]}';
    const parseSpy = vi.spyOn(JSON, 'parse');

    const value = await pool.parseJson(text);

    expect(value).toEqual({ items: [1, 2, 3] });
    expect(parseSpy).not.toHaveBeenCalledWith(text);
    expect(pool.stats()).toEqual({ threads: 1, busy: 0, queued: 0, completed: 1, inline: false });
  });

  it('keeps the event loop turning while a worker parses', async () => {
    const pool = createPool(1);
    const text = JSON.stringify(Array.from({ length: 2000 }, (_, id) => ({ id, name: `item-${id}` })));

    let turns = 0;
    let done = false;
    const spin = (): void => {
      if (!done) {
        turns++;
        setImmediate(spin);
      }
    };
    setImmediate(spin);

    const value = await pool.parseJson(text);
    done = true;

    expect(Array.isArray(value) ? value.length : 0).toBe(2000);
    expect(turns).toBeGreaterThan(0);
  });

  it('parses CSV rows on a worker thread', async () => {
    const pool = createPool(1);

    const rows = await pool.parseCsv('id,name\n1,Ada\n\n2,Grace', CSV_SETTINGS);

    expect(rows).toEqual([['id', 'name'], ['1', 'Ada'], ['2', 'Grace']]);
  });

  it('rejects with the parser message from the worker', async () => {
    const pool = createPool(1);

    await expect(pool.parseJson('{')).rejects.toThrow(jsonParseMessage('{'));
    expect(pool.stats().inline).toBe(false);
  });

  it('queues parses beyond its thread count', async () => {
    const pool = createPool(1);

    const first = pool.parseJson('[1]');
    const second = pool.parseJson('[2]');

    expect(pool.stats()).toEqual({ threads: 1, busy: 1, queued: 1, completed: 0, inline: false });
    expect(await Promise.all([first, second])).toEqual([[1], [2]]);
    expect(pool.stats().completed).toBe(2);
  });

  it('rejects pending and later parses once closed', async () => {
    const pool = createPool(1);
    const pending = expect(pool.parseJson('[1]')).rejects.toThrow('Parse worker pool closed');

    await pool.close();

    await pending;
    await expect(pool.parseJson('[]')).rejects.toThrow('Parse worker pool closed');
    expect(pool.stats().threads).toBe(0);
  });

  it('backs the json and csv adapters', async () => {
    const pool = createPool(2);
    const csv = new CsvAdapter(prepareAttempt('csv', { source_type: 'string', data: 'sku,qty\nA1,4' }).settings, {
      parser: pool,
    });
    const json = new JsonAdapter(
      prepareAttempt('json', { source_type: 'string', data: '{"a": {"b": 1}}', flatten: true }).settings,
      { parser: pool }
    );

    expect(await csv.collect()).toEqual({ columns: ['sku', 'qty'], rows: [{ sku: 'A1', qty: '4' }] });

    const raw = await json.collect();
    expect((await json.validate(raw)).isValid).toBe(true);
    expect(await json.transform(raw)).toEqual({ 'a.b': 1 });
    expect(pool.stats().completed).toBe(2);
  });
});
