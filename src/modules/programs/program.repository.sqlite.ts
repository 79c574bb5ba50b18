import type { Program } from '../../common/types.js';
import type { SQLiteClient, SQLiteRow } from '../../infrastructure/sqlite/client.js';
import { readOptionalText, readText } from '../../infrastructure/sqlite/rows.js';
import type { ProgramRepository } from './program.repository.js';

const PROGRAM_COLUMNS = 'id, name, code, description, created_at, updated_at';

export function rowToProgram(row: SQLiteRow, prefix = ''): Program {
  return {
    id: readText(row, `${prefix}id`),
    name: readText(row, `${prefix}name`),
    code: readText(row, `${prefix}code`),
    description: readOptionalText(row, `${prefix}description`),
    createdAt: readText(row, `${prefix}created_at`),
    updatedAt: readText(row, `${prefix}updated_at`),
  };
}

export function createSQLiteProgramRepository(client: SQLiteClient): ProgramRepository {
  return {
    list() {
      const db = client.getConnection();
      const rows = db.prepare(`
        SELECT ${PROGRAM_COLUMNS}
        FROM programs
        ORDER BY created_at DESC, rowid DESC
      `).all();
      return rows.map(row => rowToProgram(row));
    },
    getById(id) {
      const db = client.getConnection();
      const row = db.prepare(`SELECT ${PROGRAM_COLUMNS} FROM programs WHERE id = ?`).get(id);
      return row ? rowToProgram(row) : undefined;
    },
    insert(program) {
      const db = client.getConnection();
      db.prepare(`
        INSERT INTO programs (id, name, code, description, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        program.id,
        program.name,
        program.code,
        program.description ?? null,
        program.createdAt,
        program.updatedAt,
      );
    },
    update(program) {
      const db = client.getConnection();
      const { changes } = db.prepare(`
        UPDATE programs
        SET name = ?, code = ?, description = ?, updated_at = ?
        WHERE id = ?
      `).run(program.name, program.code, program.description ?? null, program.updatedAt, program.id);
      return changes > 0;
    },
    delete(id) {
      const db = client.getConnection();
      const { changes } = db.prepare('DELETE FROM programs WHERE id = ?').run(id);
      return changes > 0;
    },
  };
}
