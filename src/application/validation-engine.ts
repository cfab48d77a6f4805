import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { Logger } from 'pino';
import { isJsonObject } from '../domain/index.js';
import type { FieldErrors } from '../domain/index.js';

// Both packages are CommonJS: the default import is `module.exports`,
// which carries the real export on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/** A compiled, reusable schema definition. */
export type Validator = ValidateFunction<unknown>;

/** One violation: JSON pointer into the instance plus a readable reason. */
export interface PathError {
  readonly path: string;
  readonly message: string;
}

/** Thrown by `compile` when a definition is not a usable JSON Schema. */
export class SchemaCompileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaCompileError';
  }
}

/**
 * Draft-07 JSON Schema compiler and checker.
 *
 * - `additionalProperties` is left at its Draft-07 default (allowed).
 * - Unknown keywords are tolerated; malformed known keywords fail the
 *   meta-schema check at compile time.
 * - Every violation is collected, never just the first.
 *
 * Ajv's own warnings (unknown formats, ignored keywords) go to `log` when
 * given and are dropped otherwise.
 */
export class ValidationEngine {
  private readonly ajv: InstanceType<typeof Ajv>;

  constructor(log?: Logger) {
    const ajvLog = log?.child({ component: 'ajv' });
    this.ajv = new Ajv({
      allErrors: true,
      strict: false,
      validateSchema: true,
      logger: ajvLog === undefined
        ? false
        : {
            log: (...args: unknown[]) => ajvLog.debug(args.map(String).join(' ')),
            warn: (...args: unknown[]) => ajvLog.warn(args.map(String).join(' ')),
            error: (...args: unknown[]) => ajvLog.error(args.map(String).join(' ')),
          },
    });
    addFormats(this.ajv);
  }

  compile(definition: unknown): Validator {
    if (!isJsonObject(definition)) {
      throw new SchemaCompileError('Schema definition must be a JSON object');
    }

    try {
      return this.ajv.compile(definition);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SchemaCompileError(`Invalid JSON Schema: ${reason}`, { cause: err });
    } finally {
      // Drop Ajv's cache entry (and any `$id` registration) so compiling
      // is free of side effects: two definitions sharing an `$id` must not
      // collide.
      this.ajv.removeSchema(definition);
    }
  }

  validate(validator: Validator, instance: unknown): PathError[] {
    if (validator(instance)) return [];
    return (validator.errors ?? []).map(toPathError);
  }
}

function toPathError(error: ErrorObject): PathError {
  let path = error.instancePath;

  // Point `required` failures at the missing property itself.
  if (error.keyword === 'required') {
    const missing: unknown = error.params['missingProperty'];
    if (typeof missing === 'string') {
      path = `${path}/${escapePointerToken(missing)}`;
    }
  }

  return {
    path,
    message: error.message ?? `failed '${error.keyword}' check`,
  };
}

function escapePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** `Validation error at '/a': must be string; Validation error at '/b': ...` */
export function formatPathErrors(errors: readonly PathError[]): string {
  return errors
    .map((e) => `Validation error at '${e.path}': ${e.message}`)
    .join('; ');
}

/** Groups messages by instance path. The document root is keyed `/`. */
export function pathErrorsToFieldErrors(errors: readonly PathError[]): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const e of errors) {
    const key = e.path === '' ? '/' : e.path;
    (fieldErrors[key] ??= []).push(e.message);
  }
  return fieldErrors;
}
