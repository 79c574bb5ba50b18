import type { TeacherCourse } from '../../common/types.js';
import { PersistenceError } from '../../common/errors.js';
import type { TeacherCourseRepository } from './teacher-course.repository.js';

export function createInMemoryTeacherCourseRepository(): TeacherCourseRepository {
  const store = new Map<string, TeacherCourse>();
  return {
    list() {
      return Array.from(store.values(), row => ({ ...row }));
    },
    getById(id) {
      const row = store.get(id);
      return row ? { ...row } : undefined;
    },
    insert(teacherCourse) {
      if (store.has(teacherCourse.id)) {
        throw new PersistenceError('UNIQUE constraint failed: teacher_courses.id');
      }
      store.set(teacherCourse.id, { ...teacherCourse });
    },
    update(teacherCourse) {
      if (!store.has(teacherCourse.id)) {
        return false;
      }
      store.set(teacherCourse.id, { ...teacherCourse });
      return true;
    },
    delete(id) {
      return store.delete(id);
    },
  };
}
