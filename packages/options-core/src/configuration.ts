// packages/options-core/src/configuration.ts

/**
 * Read-only, hierarchical, string-keyed configuration tree.
 * Keys are case-insensitive; `:` separates path segments.
 */
export interface ConfigurationSection {
  /** Last path segment ("" for the root). */
  readonly key: string;
  /** Full `:`-delimited path ("" for the root). */
  readonly path: string;
  /** This node's own scalar value, if any. */
  readonly value: string | undefined;

  /** Scalar value at a relative path, e.g. `get("SigningKeys:0:Issuer")`. */
  get(key: string): string | undefined;
  /** Never null; a missing section is simply empty. */
  getSection(key: string): ConfigurationSection;
  getChildren(): ConfigurationSection[];
  /** True when the node has a value or any children. */
  exists(): boolean;
}

export const KEY_DELIMITER = ":";

/**
 * JSON-shaped input for `flattenObject`.
 */
export type ConfigurationValue =
  | string
  | number
  | boolean
  | null
  | ConfigurationValue[]
  | ConfigurationInput;

export interface ConfigurationInput {
  [key: string]: ConfigurationValue;
}

/** Flat `path → value` map; one layer of a configuration. */
export type ConfigurationLayer = ReadonlyMap<string, string>;

export interface EnvLike {
  [key: string]: string | undefined;
}

function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}${KEY_DELIMITER}${key}` : key;
}

/**
 * Flatten a JSON-like tree into `a:b:0`-style keys. Arrays use their index
 * as key; `null` becomes "".
 */
export function flattenObject(data: ConfigurationInput): ConfigurationLayer {
  const out = new Map<string, string>();

  const visit = (prefix: string, value: ConfigurationValue): void => {
    if (value === null) {
      out.set(prefix, "");
      return;
    }
    if (Array.isArray(value)) {
      value.forEach((item, index) => visit(joinPath(prefix, String(index)), item));
      return;
    }
    if (typeof value === "object") {
      for (const [key, child] of Object.entries(value)) {
        visit(joinPath(prefix, key), child);
      }
      return;
    }
    out.set(prefix, String(value));
  };

  for (const [key, value] of Object.entries(data)) {
    visit(key, value);
  }
  return out;
}

/**
 * Environment variables as a layer; `__` stands for `:`.
 * With a prefix, only matching variables are taken and the prefix is dropped.
 */
export function flattenEnv(env: EnvLike, prefix = ""): ConfigurationLayer {
  const out = new Map<string, string>();
  const lowerPrefix = prefix.toLowerCase();

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (lowerPrefix && !name.toLowerCase().startsWith(lowerPrefix)) continue;

    const key = name.slice(prefix.length).split("__").join(KEY_DELIMITER);
    if (key) out.set(key, value);
  }
  return out;
}

function isConfigurationValue(value: unknown): value is ConfigurationValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (Array.isArray(value)) return value.every(isConfigurationValue);
      return Object.values(value).every(isConfigurationValue);
    default:
      return false;
  }
}

/**
 * Parse a JSON configuration document. The root must be an object.
 */
export function parseConfigurationJson(text: string): ConfigurationInput {
  const parsed: unknown = JSON.parse(text);
  if (
    !isConfigurationValue(parsed) ||
    parsed === null ||
    typeof parsed !== "object" ||
    Array.isArray(parsed)
  ) {
    throw new Error("configuration document must be a JSON object");
  }
  return parsed;
}

/**
 * Child ordering: numeric keys numerically and first, everything else by
 * case-insensitive ordinal compare. Keeps array order intact.
 */
export function compareConfigurationKeys(a: string, b: string): number {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) return Number(a) - Number(b);
  if (aNum) return -1;
  if (bNum) return 1;

  const al = a.toLowerCase();
  const bl = b.toLowerCase();
  return al < bl ? -1 : al > bl ? 1 : 0;
}

interface Entry {
  path: string;
  value: string;
}

class ConfigurationStore {
  private readonly entries = new Map<string, Entry>();

  constructor(layers: ConfigurationLayer[]) {
    for (const layer of layers) {
      for (const [path, value] of layer) {
        this.entries.set(path.toLowerCase(), { path, value });
      }
    }
  }

  value(path: string): string | undefined {
    return this.entries.get(path.toLowerCase())?.value;
  }

  childKeys(path: string): string[] {
    const prefix = path ? `${path.toLowerCase()}${KEY_DELIMITER}` : "";
    // Case folding can change string length, so segments are picked by index.
    const depth = path ? path.split(KEY_DELIMITER).length : 0;
    const seen = new Map<string, string>();

    for (const [lowerPath, entry] of this.entries) {
      if (!lowerPath.startsWith(prefix) || lowerPath === prefix) continue;
      const segment = entry.path.split(KEY_DELIMITER)[depth];
      const lowerSegment = segment.toLowerCase();
      if (!seen.has(lowerSegment)) seen.set(lowerSegment, segment);
    }

    return [...seen.values()].sort(compareConfigurationKeys);
  }
}

class StoreSection implements ConfigurationSection {
  readonly key: string;
  readonly path: string;
  private readonly store: ConfigurationStore;

  constructor(store: ConfigurationStore, path: string) {
    this.store = store;
    this.path = path;
    const segments = path.split(KEY_DELIMITER);
    this.key = segments[segments.length - 1];
  }

  get value(): string | undefined {
    return this.path ? this.store.value(this.path) : undefined;
  }

  get(key: string): string | undefined {
    return this.store.value(joinPath(this.path, key));
  }

  getSection(key: string): ConfigurationSection {
    return new StoreSection(this.store, joinPath(this.path, key));
  }

  getChildren(): ConfigurationSection[] {
    return this.store
      .childKeys(this.path)
      .map((key) => new StoreSection(this.store, joinPath(this.path, key)));
  }

  exists(): boolean {
    return this.value !== undefined || this.getChildren().length > 0;
  }
}

/**
 * Merge layers into a configuration root; later layers win per key.
 * The result is a snapshot: layers are copied at construction time.
 */
export function createConfiguration(
  ...layers: ConfigurationLayer[]
): ConfigurationSection {
  return new StoreSection(new ConfigurationStore(layers), "");
}
