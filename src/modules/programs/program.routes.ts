import type { FastifyInstance } from 'fastify';
import type { CourseContext } from '../courses/course.context.js';
import {
  idParamsSchema,
  passThroughValidator,
  readFieldInput,
  sendCourseError,
} from '../../common/fastify-schema.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { programSchema } from './program.model.js';

const createProgramBodySchema = toJsonSchema(programSchema, 'CreateProgramRequest');
const updateProgramBodySchema = toJsonSchema(programSchema.partial(), 'UpdateProgramRequest');

export interface ProgramRoutesOptions {
  context: CourseContext;
}

export async function programRoutes(app: FastifyInstance, options: ProgramRoutesOptions) {
  const { context } = options;

  app.get('/', {
    schema: { tags: ['Programs'], summary: 'List programs, newest first' },
  }, async () => context.listPrograms());

  app.get<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Programs'], summary: 'Get a program', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.getProgram(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.post('/', {
    schema: { tags: ['Programs'], summary: 'Create a program', body: createProgramBodySchema },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.createProgram(attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(201).send(result.value);
  });

  app.put<{ Params: { id: string } }>('/:id', {
    schema: {
      tags: ['Programs'],
      summary: 'Update a program',
      params: idParamsSchema,
      body: updateProgramBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.updateProgramById(req.params.id, attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.delete<{ Params: { id: string } }>('/:id', {
    schema: { tags: ['Programs'], summary: 'Delete a program without semesters', params: idParamsSchema },
  }, async (req, reply) => {
    const result = context.deleteProgramById(req.params.id);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(204).send();
  });
}
