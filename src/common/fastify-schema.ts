import type { FastifyReply, FastifySchema, FastifySchemaCompiler } from 'fastify';
import { z } from 'zod';
import type { FieldInput } from './changeset.js';
import type { CourseError } from './errors.js';

// Bodies are validated by the changesets; Fastify only documents them.
export const passThroughValidator: FastifySchemaCompiler<FastifySchema> = () => {
  return data => ({ value: data });
};

export const idParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string' } },
} as const;

const fieldInputSchema = z.record(z.unknown());

export function readFieldInput(body: unknown, reply: FastifyReply): FieldInput | undefined {
  const parsed = fieldInputSchema.safeParse(body ?? {});
  if (!parsed.success) {
    reply.code(400).send({ error: 'Validation error', details: ['root: Expected an object body'] });
    return undefined;
  }
  return parsed.data;
}

const STATUS_BY_KIND: Record<CourseError<unknown>['kind'], number> = {
  not_found: 404,
  validation: 400,
  storage: 409,
};

export function sendCourseError(reply: FastifyReply, error: CourseError<unknown>) {
  reply.code(STATUS_BY_KIND[error.kind]);
  if (error.kind === 'validation') {
    return reply.send({
      error: error.message,
      details: error.changeset.errors.map(issue => `${issue.field}: ${issue.message}`),
    });
  }
  return reply.send({ error: error.message });
}
