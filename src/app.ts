import Fastify, { type FastifyError } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { LogLevel } from './common/logger.js';
import { createCourseContext } from './modules/courses/course.context.js';
import { programRoutes } from './modules/programs/program.routes.js';
import { semesterRoutes } from './modules/semesters/semester.routes.js';
import { teacherCourseRoutes } from './modules/teacher-courses/teacher-course.routes.js';
import { studentCourseRoutes } from './modules/student-courses/student-course.routes.js';
import {
  createInMemoryRepositoryBundle,
  type RepositoryBundle,
} from './infrastructure/repositories.js';
import pkg from '../package.json' with { type: 'json' };

export interface AppDependencies {
  repositories?: RepositoryBundle;
  logLevel?: LogLevel;
  publicUrl?: string;
}

const apiVersion = typeof pkg?.version === 'string' ? pkg.version : '0.0.0';

export function buildApp(deps: AppDependencies = {}) {
  const app = Fastify({ logger: { level: deps.logLevel ?? 'info' } });
  const repositories = deps.repositories ?? createInMemoryRepositoryBundle();
  const context = createCourseContext({ repositories, logger: app.log });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Course Context API',
        description: 'Programs, semesters and course assignments',
        version: apiVersion,
      },
      servers: [{ url: deps.publicUrl ?? 'http://localhost:3000', description: 'Local dev server' }],
    },
  });

  app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
    staticCSP: true,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled request error');
      return reply.code(statusCode).send({ error: 'Internal Server Error' });
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  // Routes
  app.register(programRoutes, { prefix: '/programs', context });
  app.register(semesterRoutes, { context });
  app.register(teacherCourseRoutes, { prefix: '/teacher-courses', context });
  app.register(studentCourseRoutes, { prefix: '/student-courses', context });

  app.addHook('onClose', async () => {
    if (repositories.dispose) {
      await repositories.dispose();
    }
  });

  app.get('/health', async () => ({ status: 'ok' }));
  return app;
}
