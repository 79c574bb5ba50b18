import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';
import initSqlJs, { type Database as SqlJsDatabase, type ParamsObject, type SqlValue } from 'sql.js';
import type { SqliteConfig } from '../../config/index.js';
import { PersistenceError } from '../../common/errors.js';
import { runMigrations } from './migrator.js';

const require = createRequire(import.meta.url);
const sqlJsRoot = path.dirname(require.resolve('sql.js/dist/sql-wasm.wasm'));
const SQL = await initSqlJs({ locateFile: (file: string) => path.join(sqlJsRoot, file) });

export const IN_MEMORY_DB = ':memory:';

export type SQLiteValue = SqlValue;

export type SQLiteRow = ParamsObject;

export interface RunResult {
  changes: number;
}

export interface SQLiteStatement {
  run(...parameters: SQLiteValue[]): RunResult;
  get(...parameters: SQLiteValue[]): SQLiteRow | undefined;
  all(...parameters: SQLiteValue[]): SQLiteRow[];
}

export interface SQLiteDatabase {
  prepare(sql: string): SQLiteStatement;
  exec(sql: string): void;
  close(): void;
}

export interface SQLiteClient {
  readonly filePath: string;
  getConnection(): SQLiteDatabase;
  close(): void;
}

function enableForeignKeys(db: SqlJsDatabase) {
  db.exec('PRAGMA foreign_keys = ON');
}

function toPersistenceError(error: unknown): PersistenceError {
  if (error instanceof PersistenceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(message, { cause: error });
}

function prepareStatement(db: SqlJsDatabase, sql: string) {
  try {
    return db.prepare(sql);
  } catch (error) {
    throw toPersistenceError(error);
  }
}

function withStatement<R>(
  db: SqlJsDatabase,
  sql: string,
  parameters: SQLiteValue[],
  use: (step: () => boolean, read: () => SQLiteRow) => R,
): R {
  const stmt = prepareStatement(db, sql);
  try {
    if (parameters.length > 0) stmt.bind(parameters);
    return use(() => stmt.step(), () => stmt.getAsObject());
  } catch (error) {
    throw toPersistenceError(error);
  } finally {
    stmt.free();
  }
}

function createAdapter(db: SqlJsDatabase, markDirty: () => void): SQLiteDatabase {
  return {
    prepare(sql: string): SQLiteStatement {
      return {
        run: (...parameters) => {
          withStatement(db, sql, parameters, step => step());
          const changes = db.getRowsModified();
          markDirty();
          return { changes };
        },
        get: (...parameters) => withStatement(db, sql, parameters, (step, read) => (step() ? read() : undefined)),
        all: (...parameters) =>
          withStatement(db, sql, parameters, (step, read) => {
            const rows: SQLiteRow[] = [];
            while (step()) {
              rows.push(read());
            }
            return rows;
          }),
      };
    },
    exec(sql: string) {
      try {
        db.exec(sql);
      } catch (error) {
        throw toPersistenceError(error);
      }
      markDirty();
    },
    close() {
      markDirty();
      db.close();
    },
  };
}

function openSqlJsDatabase(filePath: string): SqlJsDatabase {
  if (filePath !== IN_MEMORY_DB && fs.existsSync(filePath)) {
    return new SQL.Database(fs.readFileSync(filePath));
  }
  return new SQL.Database();
}

export function createSQLiteClient(config: SqliteConfig): SQLiteClient {
  const { filePath } = config;
  const persistent = filePath !== IN_MEMORY_DB;
  if (persistent) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  const db = openSqlJsDatabase(filePath);
  enableForeignKeys(db);

  // export() reopens the database, which resets connection pragmas
  const markDirty = () => {
    if (!persistent) return;
    fs.writeFileSync(filePath, Buffer.from(db.export()));
    enableForeignKeys(db);
  };

  const adapter = createAdapter(db, markDirty);
  runMigrations(adapter, config.migrationsDir);

  let closed = false;
  return {
    filePath,
    getConnection() {
      if (closed) {
        throw new PersistenceError(`SQLite database ${filePath} is closed`);
      }
      return adapter;
    },
    close() {
      if (closed) return;
      closed = true;
      adapter.close();
    },
  };
}
