import type { GraphStorage, StorageBatch } from './types';

const DEFAULT_DB_NAME = 'canvas-core';
const DB_VERSION = 2;
const NODE_STORE = 'nodes';
const EDGE_STORE = 'edges';
/** Out-of-line keys; holds the canvas document under DOCUMENT_KEY. */
const META_STORE = 'meta';
const DOCUMENT_KEY = 'document';

function requestToPromise<T>(req: IDBRequest<T>): Promise<T> {
  return new Promise((resolve, reject) => {
    req.onsuccess = () => resolve(req.result);
    req.onerror = () => reject(req.error ?? new Error('IndexedDB request failed.'));
  });
}

function txDone(tx: IDBTransaction): Promise<void> {
  return new Promise((resolve, reject) => {
    tx.oncomplete = () => resolve();
    tx.onerror = () => reject(tx.error ?? new Error('IndexedDB transaction failed.'));
    tx.onabort = () => reject(tx.error ?? new Error('IndexedDB transaction aborted.'));
  });
}

export type IndexedDbGraphStorageOptions = {
  /** Database name; one database per canvas document. */
  name?: string;
};

export class IndexedDbGraphStorage implements GraphStorage {
  private readonly name: string;
  private dbPromise: Promise<IDBDatabase> | null = null;

  constructor(options?: IndexedDbGraphStorageOptions) {
    this.name = options?.name ?? DEFAULT_DB_NAME;
  }

  async loadNodes(): Promise<unknown[]> {
    return this.readAll(NODE_STORE);
  }

  async loadEdges(): Promise<unknown[]> {
    return this.readAll(EDGE_STORE);
  }

  async loadDocument(): Promise<unknown> {
    const db = await this.open();
    const tx = db.transaction(META_STORE, 'readonly');
    const doc: unknown = await requestToPromise(tx.objectStore(META_STORE).get(DOCUMENT_KEY));
    await txDone(tx);
    return doc;
  }

  async commit(batch: StorageBatch): Promise<void> {
    const db = await this.open();
    const tx = db.transaction([NODE_STORE, EDGE_STORE, META_STORE], 'readwrite');
    const done = txDone(tx);
    const nodes = tx.objectStore(NODE_STORE);
    const edges = tx.objectStore(EDGE_STORE);
    try {
      if (batch.document) tx.objectStore(META_STORE).put(batch.document, DOCUMENT_KEY);
      for (const n of batch.upsertNodes) nodes.put(n);
      for (const e of batch.upsertEdges) edges.put(e);
      for (const id of batch.deleteNodeIds) nodes.delete(id);
      for (const id of batch.deleteEdgeIds) edges.delete(id);
    } catch (err) {
      // put() throws synchronously on uncloneable values; nothing may land
      tx.abort();
      await done.catch(() => undefined);
      throw err;
    }
    await done;
  }

  async close(): Promise<void> {
    const pending = this.dbPromise;
    this.dbPromise = null;
    if (!pending) return;
    const db = await pending;
    db.close();
  }

  private async readAll(storeName: string): Promise<unknown[]> {
    const db = await this.open();
    const tx = db.transaction(storeName, 'readonly');
    const rows: unknown[] = await requestToPromise(tx.objectStore(storeName).getAll());
    await txDone(tx);
    return rows;
  }

  private open(): Promise<IDBDatabase> {
    if (this.dbPromise) return this.dbPromise;
    if (typeof indexedDB === 'undefined') {
      return Promise.reject(new Error('IndexedDB is not available in this environment.'));
    }

    const opening = new Promise<IDBDatabase>((resolve, reject) => {
      const req = indexedDB.open(this.name, DB_VERSION);
      req.onupgradeneeded = () => {
        const db = req.result;
        if (!db.objectStoreNames.contains(NODE_STORE)) {
          db.createObjectStore(NODE_STORE, { keyPath: 'id' });
        }
        if (!db.objectStoreNames.contains(EDGE_STORE)) {
          db.createObjectStore(EDGE_STORE, { keyPath: 'id' });
        }
        if (!db.objectStoreNames.contains(META_STORE)) {
          db.createObjectStore(META_STORE);
        }
      };
      req.onsuccess = () => resolve(req.result);
      req.onerror = () => reject(req.error ?? new Error('Failed to open IndexedDB.'));
    });
    // a failed open is retried on the next call
    this.dbPromise = opening.catch((err: unknown) => {
      this.dbPromise = null;
      throw err;
    });
    return this.dbPromise;
  }
}
