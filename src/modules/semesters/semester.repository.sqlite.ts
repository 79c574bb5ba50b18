import type { Semester, SemesterWithProgram } from '../../common/types.js';
import type { SQLiteClient, SQLiteRow } from '../../infrastructure/sqlite/client.js';
import { readOptionalText, readText } from '../../infrastructure/sqlite/rows.js';
import { rowToProgram } from '../programs/program.repository.sqlite.js';
import type { SemesterRepository } from './semester.repository.js';

const SEMESTER_COLUMNS = 'id, program_id, name, starts_on, ends_on, created_at, updated_at';

function rowToSemester(row: SQLiteRow): Semester {
  return {
    id: readText(row, 'id'),
    programId: readText(row, 'program_id'),
    name: readText(row, 'name'),
    startsOn: readOptionalText(row, 'starts_on'),
    endsOn: readOptionalText(row, 'ends_on'),
    createdAt: readText(row, 'created_at'),
    updatedAt: readText(row, 'updated_at'),
  };
}

export function createSQLiteSemesterRepository(client: SQLiteClient): SemesterRepository {
  return {
    list() {
      const db = client.getConnection();
      return db.prepare(`SELECT ${SEMESTER_COLUMNS} FROM semesters ORDER BY rowid`).all().map(rowToSemester);
    },
    listByProgram(programId) {
      const db = client.getConnection();
      return db
        .prepare(`SELECT ${SEMESTER_COLUMNS} FROM semesters WHERE program_id = ? ORDER BY rowid`)
        .all(programId)
        .map(rowToSemester);
    },
    getById(id, programId): SemesterWithProgram | undefined {
      const db = client.getConnection();
      const row = db.prepare(`
        SELECT s.id, s.program_id, s.name, s.starts_on, s.ends_on, s.created_at, s.updated_at,
               p.id AS p_id, p.name AS p_name, p.code AS p_code, p.description AS p_description,
               p.created_at AS p_created_at, p.updated_at AS p_updated_at
        FROM semesters s
        JOIN programs p ON p.id = s.program_id
        WHERE s.id = ? AND s.program_id = ?
      `).get(id, programId);
      if (!row) {
        return undefined;
      }
      return { ...rowToSemester(row), program: rowToProgram(row, 'p_') };
    },
    insert(semester) {
      const db = client.getConnection();
      db.prepare(`
        INSERT INTO semesters (id, program_id, name, starts_on, ends_on, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        semester.id,
        semester.programId,
        semester.name,
        semester.startsOn ?? null,
        semester.endsOn ?? null,
        semester.createdAt,
        semester.updatedAt,
      );
    },
    update(semester) {
      const db = client.getConnection();
      const { changes } = db.prepare(`
        UPDATE semesters
        SET program_id = ?, name = ?, starts_on = ?, ends_on = ?, updated_at = ?
        WHERE id = ?
      `).run(
        semester.programId,
        semester.name,
        semester.startsOn ?? null,
        semester.endsOn ?? null,
        semester.updatedAt,
        semester.id,
      );
      return changes > 0;
    },
    delete(id) {
      const db = client.getConnection();
      return db.prepare('DELETE FROM semesters WHERE id = ?').run(id).changes > 0;
    },
  };
}
