import type { StudentCourse } from '../../common/types.js';
import { PersistenceError } from '../../common/errors.js';
import type { StudentCourseRepository } from './student-course.repository.js';

export function createInMemoryStudentCourseRepository(): StudentCourseRepository {
  const store = new Map<string, StudentCourse>();
  return {
    list() {
      return Array.from(store.values(), row => ({ ...row }));
    },
    getById(id) {
      const row = store.get(id);
      return row ? { ...row } : undefined;
    },
    insert(studentCourse) {
      if (store.has(studentCourse.id)) {
        throw new PersistenceError('UNIQUE constraint failed: student_courses.id');
      }
      store.set(studentCourse.id, { ...studentCourse });
    },
    update(studentCourse) {
      if (!store.has(studentCourse.id)) {
        return false;
      }
      store.set(studentCourse.id, { ...studentCourse });
      return true;
    },
    delete(id) {
      return store.delete(id);
    },
  };
}
