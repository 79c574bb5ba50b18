import type { Program } from '../../common/types.js';

export interface ProgramRepository {
  /** Newest first. */
  list(): Program[];
  getById(id: string): Program | undefined;
  insert(program: Program): void;
  /** Returns false when no row matched. */
  update(program: Program): boolean;
  delete(id: string): boolean;
}

export { createInMemoryProgramRepository } from './program.repository.memory.js';
export { createSQLiteProgramRepository } from './program.repository.sqlite.js';
