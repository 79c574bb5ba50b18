import type { Semester, SemesterWithProgram } from '../../common/types.js';

export interface SemesterRepository {
  list(): Semester[];
  listByProgram(programId: string): Semester[];
  /** Matches on both ids and attaches the parent program. */
  getById(id: string, programId: string): SemesterWithProgram | undefined;
  insert(semester: Semester): void;
  update(semester: Semester): boolean;
  delete(id: string): boolean;
}

export { createInMemorySemesterRepository } from './semester.repository.memory.js';
export { createSQLiteSemesterRepository } from './semester.repository.sqlite.js';
