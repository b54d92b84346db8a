import { CsvAdapter } from './csv-adapter';
import { HtmlAdapter } from './html-adapter';
import { JsonAdapter } from './json-adapter';
import type { ParseWorkerPool } from '../parse-workers';
import { AdapterRegistry } from './registry';
import { RestAdapter, type FetchFn } from './rest-adapter';

export { AdapterRegistry, type AdapterFactory } from './registry';
export { CsvAdapter, type CsvTable } from './csv-adapter';
export { HtmlAdapter } from './html-adapter';
export { JsonAdapter } from './json-adapter';
export { RestAdapter, type FetchFn } from './rest-adapter';

export interface DefaultRegistryDeps {
  fetch?: FetchFn;
  /** Off-thread parsing for the json and csv adapters. */
  parser?: ParseWorkerPool;
}

/**
 * Registry with the built-in adapters: json, csv, rest, html.
 */
export function createDefaultRegistry(deps: DefaultRegistryDeps = {}): AdapterRegistry {
  const parserDeps = deps.parser ? { parser: deps.parser } : {};
  return new AdapterRegistry()
    .register('json', settings => new JsonAdapter(settings, parserDeps))
    .register('csv', settings => new CsvAdapter(settings, parserDeps))
    .register('rest', settings => new RestAdapter(settings, deps))
    .register('html', settings => new HtmlAdapter(settings, deps));
}
