import type { DocumentData, DocumentStore, StoredDocument } from '../DocumentStore';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

// Dates are rebuilt in the caller's realm so `instanceof Date` holds on read.
function copyValue(value: unknown): unknown {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    return value.map((item) => copyValue(item));
  }
  if (isPlainObject(value)) {
    return copyRecord(value);
  }
  return value;
}

function copyRecord(data: DocumentData): DocumentData {
  const copy: DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    copy[key] = copyValue(value);
  }
  return copy;
}

/**
 * Map-backed document store. Records are deep-copied on the way in and out,
 * so callers never share references with stored state.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, DocumentData>>();
  private nextId = 1;

  async create(collection: string, data: DocumentData): Promise<string> {
    const id = `${collection}-${this.nextId++}`;
    this.collectionOf(collection).set(id, copyRecord(data));
    return id;
  }

  async get(collection: string, id: string): Promise<StoredDocument | null> {
    const data = this.collections.get(collection)?.get(id);
    return data ? { id, data: copyRecord(data) } : null;
  }

  async set(collection: string, id: string, data: DocumentData): Promise<void> {
    this.collectionOf(collection).set(id, copyRecord(data));
  }

  async delete(collection: string, id: string): Promise<void> {
    this.collections.get(collection)?.delete(id);
  }

  async query(collection: string, field: string, value: unknown): Promise<StoredDocument[]> {
    const records = this.collections.get(collection);
    if (!records) return [];

    const matches: StoredDocument[] = [];
    records.forEach((data, id) => {
      if (data[field] === value) {
        matches.push({ id, data: copyRecord(data) });
      }
    });
    return matches;
  }

  private collectionOf(collection: string): Map<string, DocumentData> {
    let records = this.collections.get(collection);
    if (!records) {
      records = new Map();
      this.collections.set(collection, records);
    }
    return records;
  }
}
