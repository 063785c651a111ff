import { CacheError, describeError } from "../errors";
import { createLogger } from "../log";
import type { CacheBackend } from "./storeBackends";

const log = createLogger("cache");

export interface KeyValueCacheOptions<T> {
  name: string;
  backend: CacheBackend;
  isValue: (value: unknown) => value is T;
}

/**
 * Plain key → value store on top of a persistence backend.
 * There is no expiry and no eviction: `set` overwrites, `get` returns what was last written.
 */
export class KeyValueCache<T> {
  readonly name: string;
  private readonly backend: CacheBackend;
  private readonly isValue: (value: unknown) => value is T;
  private readonly memory = new Map<string, T>();

  constructor(options: KeyValueCacheOptions<T>) {
    this.name = options.name;
    this.backend = options.backend;
    this.isValue = options.isValue;
  }

  async get(key: string): Promise<T | null> {
    const hit = this.memory.get(key);
    if (hit !== undefined) {
      log.debug(`${this.name} hit (memory)`, key);
      return hit;
    }
    let stored: unknown;
    try {
      stored = await this.backend.read(key);
    } catch (error) {
      throw new CacheError(`Cache read failed for ${key}: ${describeError(error)}`, { cause: error });
    }
    if (stored === undefined || stored === null) {
      log.debug(`${this.name} miss`, key);
      return null;
    }
    if (!this.isValue(stored)) {
      log.warn(`${this.name} entry ${key} has an unexpected shape, ignoring it.`);
      return null;
    }
    this.memory.set(key, stored);
    log.debug(`${this.name} hit (${this.backend.kind})`, key);
    return stored;
  }

  async set(key: string, value: T): Promise<void> {
    this.memory.set(key, value);
    try {
      await this.backend.write(key, value);
    } catch (error) {
      throw new CacheError(`Cache write failed for ${key}: ${describeError(error)}`, { cause: error });
    }
  }
}
