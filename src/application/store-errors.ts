import {
  AppError,
  BadRequestError,
  ConflictError,
  DatabaseError,
  InternalError,
} from '../domain/index.js';
import { StoreError } from './ports.js';

export interface StoreErrorMapping {
  /** Message for a uniqueness violation. */
  conflict?: string;
  /** Replaces the default BadRequest for a foreign-key violation. */
  foreignKey?: () => AppError;
}

/**
 * Maps a failure thrown by a store into the application taxonomy:
 * unique violation → Conflict, foreign-key violation → BadRequest (or the
 * caller's override), anything else → DatabaseError with a generic message.
 */
export function translateStoreError(err: unknown, mapping: StoreErrorMapping = {}): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof StoreError) {
    switch (err.reason) {
      case 'unique_violation':
        return new ConflictError(mapping.conflict ?? 'A resource with these attributes already exists');
      case 'foreign_key_violation':
        return mapping.foreignKey?.() ?? new BadRequestError('Referenced resource does not exist');
      case 'unknown':
        return new DatabaseError('A database error occurred', err);
    }
  }

  return new InternalError('An internal error occurred', err);
}

/** Runs one store call, rethrowing failures as AppErrors. */
export async function withStore<T>(op: () => Promise<T>, mapping?: StoreErrorMapping): Promise<T> {
  try {
    return await op();
  } catch (err: unknown) {
    throw translateStoreError(err, mapping);
  }
}
