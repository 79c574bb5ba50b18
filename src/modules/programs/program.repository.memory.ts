import type { Program } from '../../common/types.js';
import { PersistenceError } from '../../common/errors.js';
import type { ProgramRepository } from './program.repository.js';

export interface InMemoryProgramRepositoryOptions {
  /** Reports rows that still reference a program, mirroring the semesters foreign key. */
  hasDependents?: (programId: string) => boolean;
}

export function createInMemoryProgramRepository(options: InMemoryProgramRepositoryOptions = {}): ProgramRepository {
  const store = new Map<string, Program>();
  return {
    list() {
      // reversed first so the stable sort keeps later inserts ahead on equal timestamps
      return Array.from(store.values(), program => ({ ...program }))
        .reverse()
        .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    },
    getById(id) {
      const program = store.get(id);
      return program ? { ...program } : undefined;
    },
    insert(program) {
      if (store.has(program.id)) {
        throw new PersistenceError(`UNIQUE constraint failed: programs.id`);
      }
      store.set(program.id, { ...program });
    },
    update(program) {
      if (!store.has(program.id)) {
        return false;
      }
      store.set(program.id, { ...program });
      return true;
    },
    delete(id) {
      if (!store.has(id)) {
        return false;
      }
      if (options.hasDependents?.(id)) {
        throw new PersistenceError('FOREIGN KEY constraint failed');
      }
      return store.delete(id);
    },
  };
}
