export type DocumentData = Record<string, unknown>;

export type StoredDocument = {
  id: string;
  data: DocumentData;
};

/**
 * Keyed-record store. `set` replaces the whole record; there is no partial
 * update.
 */
export interface DocumentStore {
  create(collection: string, data: DocumentData): Promise<string>;
  get(collection: string, id: string): Promise<StoredDocument | null>;
  set(collection: string, id: string, data: DocumentData): Promise<void>;
  delete(collection: string, id: string): Promise<void>;
  query(collection: string, field: string, value: unknown): Promise<StoredDocument[]>;
}
