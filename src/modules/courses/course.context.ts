import type { Changeset, FieldInput } from '../../common/changeset.js';
import { hasChanges } from '../../common/changeset.js';
import {
  notFound,
  storageFailure,
  validationFailure,
  type CourseError,
  type NotFoundError,
  type StorageAction,
  type StorageError,
  type ValidationError,
} from '../../common/errors.js';
import { createLogger, type Logger } from '../../common/logger.js';
import { err, ok, type Result } from '../../common/result.js';
import type {
  BaseEntity,
  EntityName,
  Program,
  ProgramFields,
  Semester,
  SemesterFields,
  SemesterWithProgram,
  StudentCourse,
  StudentCourseFields,
  TeacherCourse,
  TeacherCourseFields,
} from '../../common/types.js';
import type { RepositoryBundle } from '../../infrastructure/repositories.js';
import { createProgramRecord, programChangeset, updateProgramRecord } from '../programs/program.model.js';
import { createSemesterRecord, semesterChangeset, updateSemesterRecord } from '../semesters/semester.model.js';
import {
  createStudentCourseRecord,
  studentCourseChangeset,
  updateStudentCourseRecord,
} from '../student-courses/student-course.model.js';
import {
  createTeacherCourseRecord,
  teacherCourseChangeset,
  updateTeacherCourseRecord,
} from '../teacher-courses/teacher-course.model.js';

export type CreateResult<T> = Result<T, ValidationError<T> | StorageError>;
export type UpdateResult<T> = Result<T, ValidationError<T> | StorageError>;
export type DeleteResult<T> = Result<T, StorageError>;
export type LookupResult<T> = Result<T, NotFoundError>;

/**
 * Query and command functions over programs, semesters and course
 * assignments. Every function issues at most one statement and reports
 * failures as values.
 *
 * `updateX` and `deleteX` take a record the caller already holds; the
 * `…ById` variants look the record up first and hand a not-found result
 * back untouched, without validating or writing.
 */
export interface CourseContext {
  listPrograms(): Program[];
  getProgram(id: string): LookupResult<Program>;
  createProgram(attrs?: FieldInput): CreateResult<Program>;
  updateProgram(program: Program, attrs: FieldInput): UpdateResult<Program>;
  updateProgramById(id: string, attrs: FieldInput): Result<Program, CourseError<Program>>;
  deleteProgram(program: Program): DeleteResult<Program>;
  deleteProgramById(id: string): Result<Program, NotFoundError | StorageError>;
  changeProgram(program: Program, attrs?: FieldInput): Changeset<Program, ProgramFields>;

  listSemesters(): Semester[];
  listSemestersForProgram(programId: string): Semester[];
  getSemester(id: string, programId: string): LookupResult<SemesterWithProgram>;
  createSemester(attrs?: FieldInput): CreateResult<Semester>;
  updateSemester(semester: Semester, attrs: FieldInput): UpdateResult<Semester>;
  updateSemesterById(id: string, programId: string, attrs: FieldInput): Result<Semester, CourseError<Semester>>;
  deleteSemester(semester: Semester): DeleteResult<Semester>;
  deleteSemesterById(id: string, programId: string): Result<Semester, NotFoundError | StorageError>;
  changeSemester<T extends Semester>(semester: T, attrs?: FieldInput): Changeset<T, SemesterFields>;

  listTeacherCourses(): TeacherCourse[];
  getTeacherCourse(id: string): LookupResult<TeacherCourse>;
  createTeacherCourse(attrs?: FieldInput): CreateResult<TeacherCourse>;
  updateTeacherCourse(teacherCourse: TeacherCourse, attrs: FieldInput): UpdateResult<TeacherCourse>;
  updateTeacherCourseById(id: string, attrs: FieldInput): Result<TeacherCourse, CourseError<TeacherCourse>>;
  deleteTeacherCourse(teacherCourse: TeacherCourse): DeleteResult<TeacherCourse>;
  deleteTeacherCourseById(id: string): Result<TeacherCourse, NotFoundError | StorageError>;
  changeTeacherCourse(teacherCourse: TeacherCourse, attrs?: FieldInput): Changeset<TeacherCourse, TeacherCourseFields>;

  listStudentCourses(): StudentCourse[];
  getStudentCourse(id: string): LookupResult<StudentCourse>;
  createStudentCourse(attrs?: FieldInput): CreateResult<StudentCourse>;
  updateStudentCourse(studentCourse: StudentCourse, attrs: FieldInput): UpdateResult<StudentCourse>;
  updateStudentCourseById(id: string, attrs: FieldInput): Result<StudentCourse, CourseError<StudentCourse>>;
  deleteStudentCourse(studentCourse: StudentCourse): DeleteResult<StudentCourse>;
  deleteStudentCourseById(id: string): Result<StudentCourse, NotFoundError | StorageError>;
  changeStudentCourse(studentCourse: StudentCourse, attrs?: FieldInput): Changeset<StudentCourse, StudentCourseFields>;
}

export type CourseRepositories = Omit<RepositoryBundle, 'dispose'>;

export interface CourseContextOptions {
  repositories: CourseRepositories;
  logger?: Logger;
}

export function createCourseContext(options: CourseContextOptions): CourseContext {
  const { repositories } = options;
  const logger = options.logger ?? createLogger();

  function lookup<T>(entity: EntityName, record: T | undefined): LookupResult<T> {
    return record === undefined ? err(notFound(entity)) : ok(record);
  }

  function write<T extends BaseEntity>(
    entity: EntityName,
    action: StorageAction,
    record: T,
    statement: (record: T) => boolean | void,
  ): Result<T, StorageError> {
    let written: boolean | void;
    try {
      written = statement(record);
    } catch (error) {
      logger.error({ err: error, entity, action, id: record.id }, `Unable to ${action} ${entity}`);
      return err(storageFailure(entity, action, error));
    }
    if (written === false) {
      logger.warn({ entity, action, id: record.id }, `No ${entity} row affected`);
      return err(storageFailure(entity, action));
    }
    logger.debug({ entity, action, id: record.id }, 'Course record written');
    return ok(record);
  }

  function create<T extends BaseEntity, F>(
    changeset: Changeset<T, F>,
    build: (fields: F) => T,
    insert: (record: T) => void,
  ): CreateResult<T> {
    if (!changeset.valid) {
      return err(validationFailure(changeset));
    }
    return write(changeset.entity, 'create', build(changeset.fields), insert);
  }

  function update<T extends BaseEntity, S extends T, F>(
    changeset: Changeset<S, F>,
    record: S,
    build: (existing: S, fields: F) => T,
    save: (record: T) => boolean,
  ): UpdateResult<T> {
    if (!changeset.valid) {
      return err(validationFailure(changeset));
    }
    const next = build(record, changeset.fields);
    // unchanged rows are written too, keeping updatedAt; the affected-row count catches deleted records
    const row: T = hasChanges(changeset) ? next : { ...next, updatedAt: record.updatedAt };
    return write(changeset.entity, 'update', row, save);
  }

  const listPrograms = () => repositories.program.list();
  const getProgram = (id: string) => lookup('program', repositories.program.getById(id));
  const updateProgram = (program: Program, attrs: FieldInput) =>
    update(programChangeset(program, attrs), program, updateProgramRecord, record => repositories.program.update(record));
  const deleteProgram = (program: Program) =>
    write('program', 'delete', program, record => repositories.program.delete(record.id));

  const getSemester = (id: string, programId: string) =>
    lookup('semester', repositories.semester.getById(id, programId));
  const updateSemester = (semester: Semester, attrs: FieldInput) =>
    update(semesterChangeset(semester, attrs), semester, updateSemesterRecord, record => repositories.semester.update(record));
  const deleteSemester = (semester: Semester) =>
    write('semester', 'delete', semester, record => repositories.semester.delete(record.id));

  const getTeacherCourse = (id: string) => lookup('teacher_course', repositories.teacherCourse.getById(id));
  const updateTeacherCourse = (teacherCourse: TeacherCourse, attrs: FieldInput) =>
    update(
      teacherCourseChangeset(teacherCourse, attrs),
      teacherCourse,
      updateTeacherCourseRecord,
      record => repositories.teacherCourse.update(record),
    );
  const deleteTeacherCourse = (teacherCourse: TeacherCourse) =>
    write('teacher_course', 'delete', teacherCourse, record => repositories.teacherCourse.delete(record.id));

  const getStudentCourse = (id: string) => lookup('student_course', repositories.studentCourse.getById(id));
  const updateStudentCourse = (studentCourse: StudentCourse, attrs: FieldInput) =>
    update(
      studentCourseChangeset(studentCourse, attrs),
      studentCourse,
      updateStudentCourseRecord,
      record => repositories.studentCourse.update(record),
    );
  const deleteStudentCourse = (studentCourse: StudentCourse) =>
    write('student_course', 'delete', studentCourse, record => repositories.studentCourse.delete(record.id));

  return {
    listPrograms,
    getProgram,
    createProgram(attrs = {}) {
      return create(programChangeset(undefined, attrs), createProgramRecord, record => repositories.program.insert(record));
    },
    updateProgram,
    updateProgramById(id, attrs) {
      const found = getProgram(id);
      if (!found.ok) return found;
      return updateProgram(found.value, attrs);
    },
    deleteProgram,
    deleteProgramById(id) {
      const found = getProgram(id);
      if (!found.ok) return found;
      return deleteProgram(found.value);
    },
    changeProgram(program, attrs = {}) {
      return programChangeset(program, attrs);
    },

    listSemesters: () => repositories.semester.list(),
    listSemestersForProgram: programId => repositories.semester.listByProgram(programId),
    getSemester,
    createSemester(attrs = {}) {
      return create(semesterChangeset(undefined, attrs), createSemesterRecord, record => repositories.semester.insert(record));
    },
    updateSemester,
    updateSemesterById(id, programId, attrs) {
      const found = getSemester(id, programId);
      if (!found.ok) return found;
      return updateSemester(found.value, attrs);
    },
    deleteSemester,
    deleteSemesterById(id, programId) {
      const found = getSemester(id, programId);
      if (!found.ok) return found;
      return deleteSemester(found.value);
    },
    changeSemester(semester, attrs = {}) {
      return semesterChangeset(semester, attrs);
    },

    listTeacherCourses: () => repositories.teacherCourse.list(),
    getTeacherCourse,
    createTeacherCourse(attrs = {}) {
      return create(
        teacherCourseChangeset(undefined, attrs),
        createTeacherCourseRecord,
        record => repositories.teacherCourse.insert(record),
      );
    },
    updateTeacherCourse,
    updateTeacherCourseById(id, attrs) {
      const found = getTeacherCourse(id);
      if (!found.ok) return found;
      return updateTeacherCourse(found.value, attrs);
    },
    deleteTeacherCourse,
    deleteTeacherCourseById(id) {
      const found = getTeacherCourse(id);
      if (!found.ok) return found;
      return deleteTeacherCourse(found.value);
    },
    changeTeacherCourse(teacherCourse, attrs = {}) {
      return teacherCourseChangeset(teacherCourse, attrs);
    },

    listStudentCourses: () => repositories.studentCourse.list(),
    getStudentCourse,
    createStudentCourse(attrs = {}) {
      return create(
        studentCourseChangeset(undefined, attrs),
        createStudentCourseRecord,
        record => repositories.studentCourse.insert(record),
      );
    },
    updateStudentCourse,
    updateStudentCourseById(id, attrs) {
      const found = getStudentCourse(id);
      if (!found.ok) return found;
      return updateStudentCourse(found.value, attrs);
    },
    deleteStudentCourse,
    deleteStudentCourseById(id) {
      const found = getStudentCourse(id);
      if (!found.ok) return found;
      return deleteStudentCourse(found.value);
    },
    changeStudentCourse(studentCourse, attrs = {}) {
      return studentCourseChangeset(studentCourse, attrs);
    },
  };
}
