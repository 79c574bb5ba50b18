import { afterEach, describe, expect, it } from 'vitest';
import { buildApp } from '../app.js';
import { createTestSQLiteBundle } from '../testing/sqlite.js';

describe('buildApp', () => {
  let app: ReturnType<typeof buildApp> | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('answers the health check', async () => {
    app = buildApp({ logLevel: 'silent' });

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('documents every resource in the OpenAPI document', async () => {
    app = buildApp({ logLevel: 'silent', publicUrl: 'https://courses.example.test' });

    const response = await app.inject({ method: 'GET', url: '/docs/json' });

    expect(response.statusCode).toBe(200);
    const document = response.json();
    expect(document.info.title).toBe('Course Context API');
    expect(document.servers).toEqual([{ url: 'https://courses.example.test', description: 'Local dev server' }]);
    expect(Object.keys(document.paths)).toEqual(
      expect.arrayContaining([
        '/programs/{id}',
        '/semesters',
        '/programs/{programId}/semesters',
        '/programs/{programId}/semesters/{id}',
        '/teacher-courses/{id}',
        '/student-courses/{id}',
      ]),
    );
  });

  it('serves programs and semesters from a SQLite bundle', async () => {
    app = buildApp({ logLevel: 'silent', repositories: createTestSQLiteBundle() });

    const program = await app.inject({ method: 'POST', url: '/programs', payload: { name: 'Physics', code: 'phy' } });
    expect(program.statusCode).toBe(201);
    const { id: programId } = program.json();

    const semester = await app.inject({
      method: 'POST',
      url: `/programs/${programId}/semesters`,
      payload: { name: 'Fall 2026', startsOn: '2026-09-01', endsOn: '2026-12-18' },
    });
    expect(semester.statusCode).toBe(201);

    const programs = await app.inject({ method: 'GET', url: '/programs' });
    expect(programs.json()).toEqual([program.json()]);

    const semesters = await app.inject({ method: 'GET', url: `/programs/${programId}/semesters` });
    expect(semesters.json()).toEqual([semester.json()]);

    const blocked = await app.inject({ method: 'DELETE', url: `/programs/${programId}` });
    expect(blocked.statusCode).toBe(409);
  });

  it('returns 404 for unknown routes', async () => {
    app = buildApp({ logLevel: 'silent' });

    const response = await app.inject({ method: 'GET', url: '/unknown' });

    expect(response.statusCode).toBe(404);
  });
});
