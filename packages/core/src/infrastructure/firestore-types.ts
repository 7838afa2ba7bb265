import type { Firestore, DocumentReference } from '@google-cloud/firestore';

/**
 * Where repositories open their collections.
 * - Top-level collections: pass `db` (Firestore)
 * - Nested under a document, e.g. one per test run: pass a DocumentReference
 */
export type FirestoreBase = Firestore | DocumentReference;

/** Root client of a FirestoreBase, for `runTransaction()`. */
export function getFirestoreClient(base: FirestoreBase): Firestore {
  if ('runTransaction' in base) {
    return base;
  }
  return base.firestore;
}
