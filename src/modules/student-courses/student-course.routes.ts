import type { FastifyInstance } from 'fastify';
import type { CourseContext } from '../courses/course.context.js';
import {
  idParamsSchema,
  passThroughValidator,
  readFieldInput,
  sendCourseError,
} from '../../common/fastify-schema.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { studentCourseSchema } from './student-course.model.js';

const createStudentCourseBodySchema = toJsonSchema(studentCourseSchema, 'CreateStudentCourseRequest');
const updateStudentCourseBodySchema = toJsonSchema(studentCourseSchema.partial(), 'UpdateStudentCourseRequest');

export interface StudentCourseRoutesOptions {
  context: CourseContext;
}

export async function studentCourseRoutes(app: FastifyInstance, options: StudentCourseRoutesOptions) {
  const { context } = options;

  app.get('/', {
    schema: { tags: ['Student courses'], summary: 'List student course assignments' },
  }, async () => context.listStudentCourses());

  app.get<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Student courses'], summary: 'Get a student course assignment', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.getStudentCourse(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.post('/', {
    schema: { tags: ['Student courses'], summary: 'Enrol a student in a course', body: createStudentCourseBodySchema },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.createStudentCourse(attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(201).send(result.value);
  });

  app.put<{ Params: { id: string } }>('/:id', {
    schema: {
      tags: ['Student courses'],
      summary: 'Update a student course assignment',
      params: idParamsSchema,
      body: updateStudentCourseBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.updateStudentCourseById(req.params.id, attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.delete<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Student courses'], summary: 'Remove a student course assignment', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.deleteStudentCourseById(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(204).send();
  });
}
