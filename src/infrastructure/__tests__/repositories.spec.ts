import { describe, expect, it } from 'vitest';
import { createRepositoryBundleFromConfig } from '../repositories.js';
import { createTestConfig } from '../../testing/sqlite.js';

describe('createRepositoryBundleFromConfig', () => {
  it('returns in-memory bundle when provider is memory', () => {
    const bundle = createRepositoryBundleFromConfig(createTestConfig('memory'));
    expect(typeof bundle.program.list).toBe('function');
    expect(typeof bundle.semester.getById).toBe('function');
    expect(typeof bundle.teacherCourse.insert).toBe('function');
    expect(typeof bundle.studentCourse.delete).toBe('function');
    expect(bundle.program.list()).toEqual([]);
  });

  it('returns sqlite bundle when provider is sqlite', () => {
    const bundle = createRepositoryBundleFromConfig(createTestConfig('sqlite'));
    expect(bundle.program.list()).toEqual([]);
    expect(bundle.semester.list()).toEqual([]);
    expect(bundle.teacherCourse.list()).toEqual([]);
    expect(bundle.studentCourse.list()).toEqual([]);
    expect(typeof bundle.dispose).toBe('function');
    bundle.dispose?.();
  });

  it('links in-memory programs and semesters like the foreign key does', () => {
    const bundle = createRepositoryBundleFromConfig(createTestConfig('memory'));
    const now = '2026-01-01T00:00:00.000Z';
    bundle.program.insert({ id: 'p1', name: 'Physics', code: 'PHY', createdAt: now, updatedAt: now });
    bundle.semester.insert({ id: 's1', programId: 'p1', name: 'Fall', createdAt: now, updatedAt: now });

    expect(() => bundle.semester.insert({ id: 's2', programId: 'p2', name: 'Fall', createdAt: now, updatedAt: now })).toThrow(
      'FOREIGN KEY constraint failed',
    );
    expect(() => bundle.program.delete('p1')).toThrow('FOREIGN KEY constraint failed');
    expect(bundle.semester.delete('s1')).toBe(true);
    expect(bundle.program.delete('p1')).toBe(true);
  });
});
