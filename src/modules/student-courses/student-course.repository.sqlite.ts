import type { StudentCourse } from '../../common/types.js';
import type { SQLiteClient, SQLiteRow } from '../../infrastructure/sqlite/client.js';
import { readText } from '../../infrastructure/sqlite/rows.js';
import type { StudentCourseRepository } from './student-course.repository.js';

const STUDENT_COURSE_COLUMNS = 'id, student_id, course_id, created_at, updated_at';

function rowToStudentCourse(row: SQLiteRow): StudentCourse {
  return {
    id: readText(row, 'id'),
    studentId: readText(row, 'student_id'),
    courseId: readText(row, 'course_id'),
    createdAt: readText(row, 'created_at'),
    updatedAt: readText(row, 'updated_at'),
  };
}

export function createSQLiteStudentCourseRepository(client: SQLiteClient): StudentCourseRepository {
  return {
    list() {
      const db = client.getConnection();
      return db.prepare(`SELECT ${STUDENT_COURSE_COLUMNS} FROM student_courses ORDER BY rowid`).all().map(rowToStudentCourse);
    },
    getById(id) {
      const db = client.getConnection();
      const row = db.prepare(`SELECT ${STUDENT_COURSE_COLUMNS} FROM student_courses WHERE id = ?`).get(id);
      return row ? rowToStudentCourse(row) : undefined;
    },
    insert(studentCourse) {
      const db = client.getConnection();
      db.prepare(`
        INSERT INTO student_courses (id, student_id, course_id, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(
        studentCourse.id,
        studentCourse.studentId,
        studentCourse.courseId,
        studentCourse.createdAt,
        studentCourse.updatedAt,
      );
    },
    update(studentCourse) {
      const db = client.getConnection();
      const { changes } = db.prepare(`
        UPDATE student_courses SET student_id = ?, course_id = ?, updated_at = ? WHERE id = ?
      `).run(studentCourse.studentId, studentCourse.courseId, studentCourse.updatedAt, studentCourse.id);
      return changes > 0;
    },
    delete(id) {
      const db = client.getConnection();
      return db.prepare('DELETE FROM student_courses WHERE id = ?').run(id).changes > 0;
    },
  };
}
