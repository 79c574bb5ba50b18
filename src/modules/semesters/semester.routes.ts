import type { FastifyInstance } from 'fastify';
import type { CourseContext } from '../courses/course.context.js';
import { passThroughValidator, readFieldInput, sendCourseError } from '../../common/fastify-schema.js';
import { toJsonSchema } from '../../common/zod-json-schema.js';
import { semesterShape } from './semester.model.js';

const semesterBodySchema = semesterShape.omit({ programId: true });
const createSemesterBodySchema = toJsonSchema(semesterBodySchema, 'CreateSemesterRequest');
const updateSemesterBodySchema = toJsonSchema(semesterShape.partial(), 'UpdateSemesterRequest');

const programParamsSchema = {
  type: 'object',
  required: ['programId'],
  properties: { programId: { type: 'string' } },
} as const;

const semesterParamsSchema = {
  type: 'object',
  required: ['programId', 'id'],
  properties: { programId: { type: 'string' }, id: { type: 'string' } },
} as const;

interface ProgramParams {
  programId: string;
}

interface SemesterParams extends ProgramParams {
  id: string;
}

export interface SemesterRoutesOptions {
  context: CourseContext;
}

export async function semesterRoutes(app: FastifyInstance, options: SemesterRoutesOptions) {
  const { context } = options;

  app.get('/semesters', {
    schema: { tags: ['Semesters'], summary: 'List semesters of every program' },
  }, async () => context.listSemesters());

  app.get<{ Params: ProgramParams }>('/programs/:programId/semesters', {
    schema: { tags: ['Semesters'], summary: 'List semesters of a program', params: programParamsSchema },
  }, async (req, reply) => {
    const program = context.getProgram(req.params.programId);
    if (!program.ok) return sendCourseError(reply, program.error);
    return context.listSemestersForProgram(program.value.id);
  });

  app.get<{ Params: SemesterParams }>('/programs/:programId/semesters/:id', {
    schema: { tags: ['Semesters'], summary: 'Get a semester with its program', params: semesterParamsSchema },
  }, async (req, reply) => {
    const result = context.getSemester(req.params.id, req.params.programId);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.post<{ Params: ProgramParams }>('/programs/:programId/semesters', {
    schema: {
      tags: ['Semesters'],
      summary: 'Create a semester in a program',
      params: programParamsSchema,
      body: createSemesterBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const program = context.getProgram(req.params.programId);
    if (!program.ok) return sendCourseError(reply, program.error);
    const result = context.createSemester({ ...attrs, programId: program.value.id });
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(201).send(result.value);
  });

  app.put<{ Params: SemesterParams }>('/programs/:programId/semesters/:id', {
    schema: {
      tags: ['Semesters'],
      summary: 'Update a semester',
      params: semesterParamsSchema,
      body: updateSemesterBodySchema,
    },
    attachValidation: true,
    validatorCompiler: passThroughValidator,
  }, async (req, reply) => {
    const attrs = readFieldInput(req.body, reply);
    if (!attrs) return;
    const result = context.updateSemesterById(req.params.id, req.params.programId, attrs);
    if (!result.ok) return sendCourseError(reply, result.error);
    return result.value;
  });

  app.delete<{ Params: SemesterParams }>('/programs/:programId/semesters/:id', {
    schema: { tags: ['Semesters'], summary: 'Delete a semester', params: semesterParamsSchema },
  }, async (req, reply) => {
    const result = context.deleteSemesterById(req.params.id, req.params.programId);
    if (!result.ok) return sendCourseError(reply, result.error);
    return reply.code(204).send();
  });
}
