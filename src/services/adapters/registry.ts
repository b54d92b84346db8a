/**
 * Adapter registry: adapter names to factories.
 *
 * @module services/adapters/registry
 */

import type { AdapterSettings } from '../../core/adapter-settings';
import { AdapterNotFoundError } from '../../core/errors';
import type { SourceAdapter } from '../../core/pipeline';

export type AdapterFactory = (settings: AdapterSettings) => SourceAdapter;

export class AdapterRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  register(name: string, factory: AdapterFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /**
   * @throws AdapterNotFoundError when `name` is not registered
   */
  create(name: string, settings: AdapterSettings): SourceAdapter {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new AdapterNotFoundError(name, this.list());
    }
    return factory(settings);
  }

  list(): string[] {
    return Array.from(this.factories.keys());
  }
}
