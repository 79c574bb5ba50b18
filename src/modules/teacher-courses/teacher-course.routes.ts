import type { FastifyInstance } from 'fastify';
import type { CourseContext } from '../courses/course.context.js';
import {
  idParamsSchema,
  passThroughValidator,
  readFieldInput,
  sendCourseError,
} from '../../common/fastify-schema.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { teacherCourseSchema } from './teacher-course.model.js';

const createTeacherCourseBodySchema = toJsonSchema(teacherCourseSchema, 'CreateTeacherCourseRequest');
const updateTeacherCourseBodySchema = toJsonSchema(teacherCourseSchema.partial(), 'UpdateTeacherCourseRequest');

export interface TeacherCourseRoutesOptions {
  context: CourseContext;
}

export async function teacherCourseRoutes(app: FastifyInstance, options: TeacherCourseRoutesOptions) {
  const { context } = options;

  app.get('/', {
    schema: { tags: ['Teacher courses'], summary: 'List teacher course assignments' },
  }, async () => context.listTeacherCourses());

  app.get<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Teacher courses'], summary: 'Get a teacher course assignment', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.getTeacherCourse(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.post('/', {
    schema: { tags: ['Teacher courses'], summary: 'Assign a teacher to a course', body: createTeacherCourseBodySchema },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.createTeacherCourse(attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(201).send(result.value);
  });

  app.put<{ Params: { id: string } }>('/:id', {
    schema: {
      tags: ['Teacher courses'],
      summary: 'Update a teacher course assignment',
      params: idParamsSchema,
      body: updateTeacherCourseBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.updateTeacherCourseById(req.params.id, attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.delete<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Teacher courses'], summary: 'Remove a teacher course assignment', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.deleteTeacherCourseById(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(204).send();
  });
}
