/**
 * Common type definitions for the KV store.
 * These types are used across the storage engine and the command layer.
 */

import { StorageError } from './Errors';

/**
 * Outcome of a read. A miss is a normal outcome, not an error.
 */
export type GetResult =
  | { readonly kind: 'found'; readonly value: string }
  | { readonly kind: 'not_found' }
  | { readonly kind: 'error'; readonly error: StorageError };
