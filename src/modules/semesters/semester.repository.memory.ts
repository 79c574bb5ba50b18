import type { Semester } from '../../common/types.js';
import { PersistenceError } from '../../common/errors.js';
import type { ProgramRepository } from '../programs/program.repository.js';
import type { SemesterRepository } from './semester.repository.js';

export function createInMemorySemesterRepository(programs: Pick<ProgramRepository, 'getById'>): SemesterRepository {
  const store = new Map<string, Semester>();

  function assertProgramExists(semester: Semester) {
    if (!programs.getById(semester.programId)) {
      throw new PersistenceError('FOREIGN KEY constraint failed');
    }
  }

  return {
    list() {
      return Array.from(store.values(), semester => ({ ...semester }));
    },
    listByProgram(programId) {
      return Array.from(store.values())
        .filter(semester => semester.programId === programId)
        .map(semester => ({ ...semester }));
    },
    getById(id, programId) {
      const semester = store.get(id);
      if (!semester || semester.programId !== programId) {
        return undefined;
      }
      const program = programs.getById(programId);
      return program ? { ...semester, program } : undefined;
    },
    insert(semester) {
      if (store.has(semester.id)) {
        throw new PersistenceError('UNIQUE constraint failed: semesters.id');
      }
      assertProgramExists(semester);
      store.set(semester.id, { ...semester });
    },
    update(semester) {
      if (!store.has(semester.id)) {
        return false;
      }
      assertProgramExists(semester);
      store.set(semester.id, { ...semester });
      return true;
    },
    delete(id) {
      return store.delete(id);
    },
  };
}
