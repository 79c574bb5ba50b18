import type { TeacherCourse } from '../../common/types.js';

export interface TeacherCourseRepository {
  list(): TeacherCourse[];
  getById(id: string): TeacherCourse | undefined;
  insert(teacherCourse: TeacherCourse): void;
  update(teacherCourse: TeacherCourse): boolean;
  delete(id: string): boolean;
}

export { createInMemoryTeacherCourseRepository } from './teacher-course.repository.memory.js';
export { createSQLiteTeacherCourseRepository } from './teacher-course.repository.sqlite.js';
