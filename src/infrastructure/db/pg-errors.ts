import { StoreError } from '../../application/index.js';

/** PostgreSQL SQLSTATE codes the stores classify. */
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

interface PgErrorShape {
  code: string;
  message: string;
  constraint_name?: string;
}

function isPgError(value: unknown): value is PgErrorShape {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

/**
 * Finds the driver error behind `err`. Drizzle may wrap the postgres.js
 * error, so the `cause` chain is followed a few levels.
 */
function findPgError(err: unknown): PgErrorShape | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    if (isPgError(current) && /^[0-9A-Z]{5}$/.test(current.code)) return current;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

/** Classifies any failure raised while talking to PostgreSQL. */
export function toStoreError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;

  const pgError = findPgError(err);
  const constraint = pgError?.constraint_name;

  if (pgError?.code === UNIQUE_VIOLATION) {
    return new StoreError('unique_violation', pgError.message, { constraint, cause: err });
  }
  if (pgError?.code === FOREIGN_KEY_VIOLATION) {
    return new StoreError('foreign_key_violation', pgError.message, { constraint, cause: err });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new StoreError('unknown', message, { constraint, cause: err });
}

/** Runs one query, rethrowing failures as classified StoreErrors. */
export async function guarded<T>(query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (err: unknown) {
    throw toStoreError(err);
  }
}
