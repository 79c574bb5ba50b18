import { afterEach, describe, expect, it } from 'vitest';
import { createInMemoryRepositoryBundle, type RepositoryBundle } from '../../../infrastructure/repositories.js';
import { createTestSQLiteBundle } from '../../../testing/sqlite.js';
import type { Program, Semester } from '../../../common/types.js';

const NOW = '2026-01-01T00:00:00.000Z';

const physics: Program = { id: 'p1', name: 'Physics', code: 'PHY', createdAt: NOW, updatedAt: NOW };
const chemistry: Program = { id: 'p2', name: 'Chemistry', code: 'CHE', description: 'Wet lab', createdAt: NOW, updatedAt: NOW };

function semester(id: string, programId: string, overrides: Partial<Semester> = {}): Semester {
  return { id, programId, name: `Semester ${id}`, createdAt: NOW, updatedAt: NOW, ...overrides };
}

const bundles: Array<[string, () => RepositoryBundle]> = [
  ['memory', createInMemoryRepositoryBundle],
  ['sqlite', createTestSQLiteBundle],
];

describe.each(bundles)('%s semester repository', (_name, createBundle) => {
  let bundle: RepositoryBundle;

  function setup() {
    bundle = createBundle();
    bundle.program.insert(physics);
    bundle.program.insert(chemistry);
    return bundle.semester;
  }

  afterEach(async () => {
    await bundle.dispose?.();
  });

  it('looks a semester up by id and program id with its program attached', () => {
    const repository = setup();
    const fall = semester('s1', 'p2', { startsOn: '2026-09-01', endsOn: '2026-12-18' });
    repository.insert(fall);

    expect(repository.getById('s1', 'p2')).toEqual({ ...fall, program: chemistry });
    expect(repository.getById('s1', 'p1')).toBeUndefined();
    expect(repository.getById('missing', 'p2')).toBeUndefined();
  });

  it('lists all semesters and those of one program in insertion order', () => {
    const repository = setup();
    repository.insert(semester('s1', 'p1'));
    repository.insert(semester('s2', 'p2'));
    repository.insert(semester('s3', 'p1'));

    expect(repository.list().map(s => s.id)).toEqual(['s1', 's2', 's3']);
    expect(repository.listByProgram('p1').map(s => s.id)).toEqual(['s1', 's3']);
    expect(repository.listByProgram('p3')).toEqual([]);
  });

  it('rejects semesters of an unknown program', () => {
    const repository = setup();
    repository.insert(semester('s1', 'p1'));

    expect(() => repository.insert(semester('s2', 'p9'))).toThrow('FOREIGN KEY constraint failed');
    expect(() => repository.update(semester('s1', 'p9'))).toThrow('FOREIGN KEY constraint failed');
  });

  it('keeps a program with semesters from being deleted', () => {
    const repository = setup();
    repository.insert(semester('s1', 'p1'));

    expect(() => bundle.program.delete('p1')).toThrow('FOREIGN KEY constraint failed');
    expect(repository.delete('s1')).toBe(true);
    expect(repository.delete('s1')).toBe(false);
    expect(bundle.program.delete('p1')).toBe(true);
  });
});
