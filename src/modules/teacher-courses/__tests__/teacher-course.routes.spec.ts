import Fastify from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { teacherCourseRoutes } from '../teacher-course.routes.js';
import { createCourseContext, type CourseContext } from '../../courses/course.context.js';
import { createInMemoryRepositoryBundle } from '../../../infrastructure/repositories.js';
import { createLogger } from '../../../common/logger.js';

async function buildTestApp(context: CourseContext) {
  const app = Fastify();
  await app.register(teacherCourseRoutes, { prefix: '/teacher-courses', context });
  return app;
}

describe('teacherCourseRoutes', () => {
  let context: CourseContext;
  let app: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    context = createCourseContext({ repositories: createInMemoryRepositoryBundle(), logger: createLogger('silent') });
    app = await buildTestApp(context);
  });

  afterEach(async () => {
    await app.close();
  });

  it('assigns a teacher to a course and lists the assignment', async () => {
    const created = await app.inject({
      method: 'POST',
      url: '/teacher-courses',
      payload: { teacherId: 'teacher-1', courseId: 'course-1' },
    });
    expect(created.statusCode).toBe(201);
    const body = created.json();
    expect(body).toMatchObject({ teacherId: 'teacher-1', courseId: 'course-1' });

    const list = await app.inject({ method: 'GET', url: '/teacher-courses' });
    expect(list.json()).toEqual([body]);

    const single = await app.inject({ method: 'GET', url: `/teacher-courses/${body.id}` });
    expect(single.json()).toEqual(body);
  });

  it('returns field errors for a missing course', async () => {
    const response = await app.inject({ method: 'POST', url: '/teacher-courses', payload: { teacherId: 'teacher-1' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Validation error', details: ['courseId: Required'] });
  });

  it('updates and removes an assignment', async () => {
    const assignment = context.createTeacherCourse({ teacherId: 'teacher-1', courseId: 'course-1' });
    if (!assignment.ok) throw new Error('seed failed');
    const url = `/teacher-courses/${assignment.value.id}`;

    const updated = await app.inject({ method: 'PUT', url, payload: { courseId: 'course-2' } });
    expect(updated.statusCode).toBe(200);
    expect(updated.json()).toMatchObject({ teacherId: 'teacher-1', courseId: 'course-2' });

    expect((await app.inject({ method: 'DELETE', url })).statusCode).toBe(204);
    const missing = await app.inject({ method: 'GET', url });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'Teacher course does not exist' });
  });
});
