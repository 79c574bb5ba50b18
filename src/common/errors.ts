import type { InvalidChangeset } from './changeset.js';
import { ENTITY_LABELS, type EntityName } from './types.js';

/** Thrown by repositories when the backing store rejects a statement. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export type StorageAction = 'create' | 'update' | 'delete';

export interface NotFoundError {
  kind: 'not_found';
  entity: EntityName;
  message: string;
}

export interface ValidationError<T> {
  kind: 'validation';
  entity: EntityName;
  message: string;
  changeset: InvalidChangeset<T>;
}

export interface StorageError {
  kind: 'storage';
  entity: EntityName;
  action: StorageAction;
  message: string;
  cause?: string;
}

export type CourseError<T> = NotFoundError | ValidationError<T> | StorageError;

export function notFound(entity: EntityName): NotFoundError {
  return { kind: 'not_found', entity, message: `${ENTITY_LABELS[entity]} does not exist` };
}

export function validationFailure<T>(changeset: InvalidChangeset<T>): ValidationError<T> {
  return { kind: 'validation', entity: changeset.entity, message: 'Validation error', changeset };
}

export function storageFailure(entity: EntityName, action: StorageAction, cause?: unknown): StorageError {
  const failure: StorageError = {
    kind: 'storage',
    entity,
    action,
    message: `Unable to ${action} ${ENTITY_LABELS[entity].toLowerCase()}`,
  };
  if (cause !== undefined) {
    failure.cause = cause instanceof Error ? cause.message : String(cause);
  }
  return failure;
}
