// packages/options-core/src/registry.ts

import { DEFAULT_SCHEME, type NamedOptionsConfigurer, type SchemeName } from "./types";

export interface OptionsRegistryConfig<T> {
  /** Returns a fresh, default-initialized record on every call. */
  create: () => T;
  /** Applied in order to every fresh record. */
  configurers: NamedOptionsConfigurer<T>[];
}

/**
 * Named options lifecycle: builds a record per scheme name on first use and
 * keeps it until invalidated. A configurer that throws leaves nothing cached.
 */
export class OptionsRegistry<T> {
  private readonly config: OptionsRegistryConfig<T>;
  private readonly cache = new Map<SchemeName, T>();

  constructor(config: OptionsRegistryConfig<T>) {
    this.config = config;
  }

  get(name: SchemeName = DEFAULT_SCHEME): T {
    const existing = this.cache.get(name);
    if (existing !== undefined) return existing;

    const options = this.config.create();
    for (const configurer of this.config.configurers) {
      configurer.configure(name, options);
    }

    this.cache.set(name, options);
    return options;
  }

  /** Drop one built record; the next `get` rebuilds it. */
  invalidate(name: SchemeName = DEFAULT_SCHEME): boolean {
    return this.cache.delete(name);
  }

  clear(): void {
    this.cache.clear();
  }

  has(name: SchemeName = DEFAULT_SCHEME): boolean {
    return this.cache.has(name);
  }
}
