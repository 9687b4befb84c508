import {
  Timestamp,
  addDoc,
  collection,
  deleteDoc,
  doc,
  getDoc,
  getDocs,
  query,
  setDoc,
  where,
  type Firestore,
} from 'firebase/firestore';
import type { DocumentData, DocumentStore, StoredDocument } from './DocumentStore';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Replaces Firestore timestamps with `Date` so that records read back match
 * the shapes that were written.
 */
export function convertValue(value: unknown): unknown {
  if (value instanceof Timestamp) {
    return value.toDate();
  }

  if (Array.isArray(value)) {
    return value.map((item) => convertValue(item));
  }

  // GeoPoint, DocumentReference and Bytes values pass through untouched.
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, val]) => [key, convertValue(val)]),
    );
  }

  return value;
}

function toStoredDocument(id: string, data: DocumentData): StoredDocument {
  const converted: DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    converted[key] = convertValue(value);
  }
  return { id, data: converted };
}

export class FirestoreDocumentStore implements DocumentStore {
  constructor(private readonly db: Firestore) {}

  async create(collectionName: string, data: DocumentData): Promise<string> {
    const ref = await addDoc(collection(this.db, collectionName), data);
    return ref.id;
  }

  async get(collectionName: string, id: string): Promise<StoredDocument | null> {
    const snapshot = await getDoc(doc(this.db, collectionName, id));
    if (!snapshot.exists()) {
      return null;
    }
    return toStoredDocument(snapshot.id, snapshot.data());
  }

  async set(collectionName: string, id: string, data: DocumentData): Promise<void> {
    await setDoc(doc(this.db, collectionName, id), data);
  }

  async delete(collectionName: string, id: string): Promise<void> {
    await deleteDoc(doc(this.db, collectionName, id));
  }

  async query(collectionName: string, field: string, value: unknown): Promise<StoredDocument[]> {
    const snapshot = await getDocs(
      query(collection(this.db, collectionName), where(field, '==', value)),
    );
    return snapshot.docs.map((docSnapshot) =>
      toStoredDocument(docSnapshot.id, docSnapshot.data()),
    );
  }
}
