import type { ZodType, ZodTypeDef } from 'zod';
import type { EntityName } from './types.js';

/** Raw field mapping as it arrives from a form or request body. */
export type FieldInput = Record<string, unknown>;

export interface FieldError {
  field: string;
  message: string;
}

interface ChangesetBase<T> {
  entity: EntityName;
  /** The record the changes apply to; `undefined` for a new record. */
  data: T | undefined;
  /** Accepted subset of the input. Unknown keys are dropped. */
  params: FieldInput;
}

export interface ValidChangeset<T, F> extends ChangesetBase<T> {
  valid: true;
  fields: F;
  changes: Partial<F>;
}

export interface InvalidChangeset<T> extends ChangesetBase<T> {
  valid: false;
  errors: FieldError[];
}

export type Changeset<T, F> = ValidChangeset<T, F> | InvalidChangeset<T>;

export interface ChangesetDefinition<F> {
  entity: EntityName;
  schema: ZodType<F, ZodTypeDef, unknown>;
  fields: readonly (keyof F & string)[];
}

function setChange<F, K extends keyof F>(changes: Partial<F>, key: K, value: F[K]): void {
  changes[key] = value;
}

function readFields<F>(source: F, fields: readonly (keyof F & string)[]): FieldInput {
  const values: FieldInput = {};
  for (const field of fields) {
    if (source[field] !== undefined) {
      values[field] = source[field];
    }
  }
  return values;
}

export function buildChangeset<F, T extends F>(
  definition: ChangesetDefinition<F>,
  data: T | undefined,
  attrs: FieldInput = {},
): Changeset<T, F> {
  const { entity, schema, fields } = definition;
  const current: FieldInput = data === undefined ? {} : readFields<F>(data, fields);
  const params: FieldInput = {};
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(attrs, field)) {
      params[field] = attrs[field];
    }
  }

  const parsed = schema.safeParse({ ...current, ...params });
  if (!parsed.success) {
    return {
      entity,
      data,
      params,
      valid: false,
      errors: parsed.error.issues.map(issue => ({
        field: issue.path.join('.') || 'root',
        message: issue.message,
      })),
    };
  }

  const changes: Partial<F> = {};
  for (const field of fields) {
    const next = parsed.data[field];
    if (next !== current[field]) {
      setChange(changes, field, next);
    }
  }
  return { entity, data, params, valid: true, fields: parsed.data, changes };
}

export function hasChanges<T, F>(changeset: ValidChangeset<T, F>): boolean {
  return Object.keys(changeset.changes).length > 0;
}
