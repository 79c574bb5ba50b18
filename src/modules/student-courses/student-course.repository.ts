import type { StudentCourse } from '../../common/types.js';

export interface StudentCourseRepository {
  list(): StudentCourse[];
  getById(id: string): StudentCourse | undefined;
  insert(studentCourse: StudentCourse): void;
  update(studentCourse: StudentCourse): boolean;
  delete(id: string): boolean;
}

export { createInMemoryStudentCourseRepository } from './student-course.repository.memory.js';
export { createSQLiteStudentCourseRepository } from './student-course.repository.sqlite.js';
