import Fastify from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { studentCourseRoutes } from '../student-course.routes.js';
import { createCourseContext, type CourseContext } from '../../courses/course.context.js';
import { createInMemoryRepositoryBundle } from '../../../infrastructure/repositories.js';
import { createLogger } from '../../../common/logger.js';

async function buildTestApp(context: CourseContext) {
  const app = Fastify();
  await app.register(studentCourseRoutes, { prefix: '/student-courses', context });
  return app;
}

describe('studentCourseRoutes', () => {
  let context: CourseContext;
  let app: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    context = createCourseContext({ repositories: createInMemoryRepositoryBundle(), logger: createLogger('silent') });
    app = await buildTestApp(context);
  });

  afterEach(async () => {
    await app.close();
  });

  it('enrols a student in a course', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/student-courses',
      payload: { studentId: 'student-1', courseId: 'course-1', grade: 'A' },
    });

    expect(response.statusCode).toBe(201);
    const body = response.json();
    expect(body).toMatchObject({ studentId: 'student-1', courseId: 'course-1' });
    expect(body).not.toHaveProperty('grade');
    expect(context.listStudentCourses()).toEqual([body]);
  });

  it('rejects a blank student id on update', async () => {
    const enrolment = context.createStudentCourse({ studentId: 'student-1', courseId: 'course-1' });
    if (!enrolment.ok) throw new Error('seed failed');

    const response = await app.inject({
      method: 'PUT',
      url: `/student-courses/${enrolment.value.id}`,
      payload: { studentId: '  ' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Validation error', details: ['studentId: is required'] });
  });

  it('removes an enrolment once', async () => {
    const enrolment = context.createStudentCourse({ studentId: 'student-1', courseId: 'course-1' });
    if (!enrolment.ok) throw new Error('seed failed');
    const url = `/student-courses/${enrolment.value.id}`;

    expect((await app.inject({ method: 'DELETE', url })).statusCode).toBe(204);
    const again = await app.inject({ method: 'DELETE', url });
    expect(again.statusCode).toBe(404);
    expect(again.json()).toEqual({ error: 'Student course does not exist' });
  });
});
