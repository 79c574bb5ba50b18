import type { AppConfig } from '../config/index.js';
import {
  createInMemoryProgramRepository,
  createSQLiteProgramRepository,
  type ProgramRepository,
} from '../modules/programs/program.repository.js';
import {
  createInMemorySemesterRepository,
  createSQLiteSemesterRepository,
  type SemesterRepository,
} from '../modules/semesters/semester.repository.js';
import {
  createInMemoryTeacherCourseRepository,
  createSQLiteTeacherCourseRepository,
  type TeacherCourseRepository,
} from '../modules/teacher-courses/teacher-course.repository.js';
import {
  createInMemoryStudentCourseRepository,
  createSQLiteStudentCourseRepository,
  type StudentCourseRepository,
} from '../modules/student-courses/student-course.repository.js';
import { createSQLiteClient } from './sqlite/client.js';

export interface RepositoryBundle {
  program: ProgramRepository;
  semester: SemesterRepository;
  teacherCourse: TeacherCourseRepository;
  studentCourse: StudentCourseRepository;
  dispose?: () => void | Promise<void>;
}

export function createInMemoryRepositoryBundle(): RepositoryBundle {
  let semester: SemesterRepository | undefined;
  const program = createInMemoryProgramRepository({
    hasDependents: programId => (semester?.listByProgram(programId).length ?? 0) > 0,
  });
  semester = createInMemorySemesterRepository(program);
  return {
    program,
    semester,
    teacherCourse: createInMemoryTeacherCourseRepository(),
    studentCourse: createInMemoryStudentCourseRepository(),
    dispose: () => {},
  };
}

export function createSQLiteRepositoryBundle(config: AppConfig): RepositoryBundle {
  const client = createSQLiteClient(config.persistence.sqlite);
  return {
    program: createSQLiteProgramRepository(client),
    semester: createSQLiteSemesterRepository(client),
    teacherCourse: createSQLiteTeacherCourseRepository(client),
    studentCourse: createSQLiteStudentCourseRepository(client),
    dispose: () => client.close(),
  };
}

export function createRepositoryBundleFromConfig(config: AppConfig): RepositoryBundle {
  switch (config.persistence.provider) {
    case 'memory':
      return createInMemoryRepositoryBundle();
    case 'sqlite':
    default:
      return createSQLiteRepositoryBundle(config);
  }
}
