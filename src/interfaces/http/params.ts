import { BadRequestError } from '../../domain/index.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Largest id a PostgreSQL `serial` column can hold. */
const MAX_LOG_ID = 2_147_483_647;

export function parseSchemaId(raw: string): string {
  if (!UUID_RE.test(raw)) {
    throw new BadRequestError(`Invalid schema ID '${raw}': must be a valid UUID`);
  }
  return raw;
}

export function parseLogId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isInteger(id) || id < 1 || id > MAX_LOG_ID) {
    throw new BadRequestError(`Invalid log ID '${raw}': must be a positive integer`);
  }
  return id;
}

/** Path segment that must hold something other than whitespace. */
export function requireSegment(raw: string, label: string): string {
  if (raw.trim() === '') {
    throw new BadRequestError(`${label} cannot be empty`);
  }
  return raw;
}
