import { createLogger } from "../log";

const log = createLogger("cache");

const DB_STORE = "entries";

type PersistedEntry = { key: string; value: unknown; updatedAt: number };

export interface CacheBackend {
  readonly kind: "indexeddb" | "localstorage" | "memory";
  read(key: string): Promise<unknown>;
  write(key: string, value: unknown): Promise<void>;
}

type KeyValueStorage = Pick<Storage, "getItem" | "setItem">;

export class MemoryBackend implements CacheBackend {
  readonly kind = "memory";
  private entries = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async write(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  get size(): number {
    return this.entries.size;
  }
}

export class LocalStorageBackend implements CacheBackend {
  readonly kind = "localstorage";
  private readonly storage: KeyValueStorage;
  private readonly prefix: string;

  constructor(storage: KeyValueStorage, namespace: string) {
    this.storage = storage;
    this.prefix = `${namespace}:`;
  }

  async read(key: string): Promise<unknown> {
    const raw = this.storage.getItem(this.prefix + key);
    return raw === null ? undefined : JSON.parse(raw);
  }

  async write(key: string, value: unknown): Promise<void> {
    // setItem throws QuotaExceededError when a large street graph does not fit.
    this.storage.setItem(this.prefix + key, JSON.stringify(value));
  }
}

/**
 * IndexedDB store keyed by cache key. When the database cannot be opened
 * (private browsing, blocked upgrade) every call goes to the fallback backend.
 */
export class IndexedDbBackend implements CacheBackend {
  readonly kind = "indexeddb";
  private readonly dbPromise: Promise<IDBDatabase | null>;
  private readonly fallback: CacheBackend;

  constructor(dbName: string, fallback: CacheBackend) {
    this.fallback = fallback;
    this.dbPromise = openIndexedDb(dbName, DB_STORE);
  }

  async read(key: string): Promise<unknown> {
    const db = await this.dbPromise;
    if (!db) {
      return this.fallback.read(key);
    }
    const entry = await runRequest(db, "readonly", (store) => store.get(key));
    if (isPersistedEntry(entry)) {
      return entry.value;
    }
    return undefined;
  }

  async write(key: string, value: unknown): Promise<void> {
    const db = await this.dbPromise;
    if (!db) {
      return this.fallback.write(key, value);
    }
    const entry: PersistedEntry = { key, value, updatedAt: Date.now() };
    await runRequest(db, "readwrite", (store) => store.put(entry));
  }
}

export function createDefaultBackend(namespace: string): CacheBackend {
  const storage = resolveLocalStorage();
  const fallback: CacheBackend = storage ? new LocalStorageBackend(storage, namespace) : new MemoryBackend();
  if (typeof indexedDB !== "undefined") {
    return new IndexedDbBackend(namespace, fallback);
  }
  log.info(`IndexedDB unavailable, caching in ${fallback.kind}.`);
  return fallback;
}

function resolveLocalStorage(): Storage | null {
  try {
    if (typeof localStorage !== "undefined") {
      return localStorage;
    }
  } catch (error) {
    log.warn("localStorage is not accessible.", error);
  }
  return null;
}

function isPersistedEntry(value: unknown): value is PersistedEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    "value" in value &&
    typeof value.key === "string"
  );
}

function openIndexedDb(dbName: string, storeName: string): Promise<IDBDatabase | null> {
  return new Promise((resolve) => {
    const request = indexedDB.open(dbName, 1);
    request.onupgradeneeded = () => {
      const db = request.result;
      if (!db.objectStoreNames.contains(storeName)) {
        const store = db.createObjectStore(storeName, { keyPath: "key" });
        store.createIndex("updatedAt", "updatedAt", { unique: false });
      }
    };
    request.onsuccess = () => {
      resolve(request.result);
    };
    request.onerror = () => {
      log.warn(`IndexedDB "${dbName}" failed to open, using fallback storage.`, request.error);
      resolve(null);
    };
    request.onblocked = () => {
      log.warn(`IndexedDB "${dbName}" upgrade blocked, using fallback storage.`);
      resolve(null);
    };
  });
}

function runRequest(
  db: IDBDatabase,
  mode: IDBTransactionMode,
  action: (store: IDBObjectStore) => IDBRequest
): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const tx = db.transaction(DB_STORE, mode);
    const request = action(tx.objectStore(DB_STORE));
    let result: unknown;
    request.onsuccess = () => {
      result = request.result;
    };
    tx.oncomplete = () => resolve(result);
    tx.onabort = () => reject(tx.error ?? new Error("IndexedDB transaction aborted."));
    tx.onerror = () => reject(tx.error ?? request.error ?? new Error("IndexedDB request failed."));
  });
}
