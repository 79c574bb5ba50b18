import type { TeacherCourse } from '../../common/types.js';
import type { SQLiteClient, SQLiteRow } from '../../infrastructure/sqlite/client.js';
import { readText } from '../../infrastructure/sqlite/rows.js';
import type { TeacherCourseRepository } from './teacher-course.repository.js';

const TEACHER_COURSE_COLUMNS = 'id, teacher_id, course_id, created_at, updated_at';

function rowToTeacherCourse(row: SQLiteRow): TeacherCourse {
  return {
    id: readText(row, 'id'),
    teacherId: readText(row, 'teacher_id'),
    courseId: readText(row, 'course_id'),
    createdAt: readText(row, 'created_at'),
    updatedAt: readText(row, 'updated_at'),
  };
}

export function createSQLiteTeacherCourseRepository(client: SQLiteClient): TeacherCourseRepository {
  return {
    list() {
      const db = client.getConnection();
      return db.prepare(`SELECT ${TEACHER_COURSE_COLUMNS} FROM teacher_courses ORDER BY rowid`).all().map(rowToTeacherCourse);
    },
    getById(id) {
      const db = client.getConnection();
      const row = db.prepare(`SELECT ${TEACHER_COURSE_COLUMNS} FROM teacher_courses WHERE id = ?`).get(id);
      return row ? rowToTeacherCourse(row) : undefined;
    },
    insert(teacherCourse) {
      const db = client.getConnection();
      db.prepare(`
        INSERT INTO teacher_courses (id, teacher_id, course_id, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(
        teacherCourse.id,
        teacherCourse.teacherId,
        teacherCourse.courseId,
        teacherCourse.createdAt,
        teacherCourse.updatedAt,
      );
    },
    update(teacherCourse) {
      const db = client.getConnection();
      const { changes } = db.prepare(`
        UPDATE teacher_courses SET teacher_id = ?, course_id = ?, updated_at = ? WHERE id = ?
      `).run(teacherCourse.teacherId, teacherCourse.courseId, teacherCourse.updatedAt, teacherCourse.id);
      return changes > 0;
    },
    delete(id) {
      const db = client.getConnection();
      return db.prepare('DELETE FROM teacher_courses WHERE id = ?').run(id).changes > 0;
    },
  };
}
