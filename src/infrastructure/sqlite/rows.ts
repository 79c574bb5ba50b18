import { PersistenceError } from '../../common/errors.js';
import type { SQLiteRow } from './client.js';

export function readText(row: SQLiteRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new PersistenceError(`Expected text in column "${column}"`);
  }
  return value;
}

export function readOptionalText(row: SQLiteRow, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new PersistenceError(`Expected text in column "${column}"`);
  }
  return value;
}
