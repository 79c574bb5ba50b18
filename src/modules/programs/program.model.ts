import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { buildChangeset, type Changeset, type ChangesetDefinition, type FieldInput } from '../../common/changeset.js';
import { optionalText, requiredText } from '../../common/field-schemas.js';
import type { Program, ProgramFields } from '../../common/types.js';

export const programSchema = z.object({
  name: requiredText(120),
  code: requiredText(20).transform(code => code.toUpperCase()),
  description: optionalText(500),
});

const programDefinition: ChangesetDefinition<ProgramFields> = {
  entity: 'program',
  schema: programSchema,
  fields: programSchema.keyof().options,
};

export function programChangeset(program: Program | undefined, attrs: FieldInput = {}): Changeset<Program, ProgramFields> {
  return buildChangeset(programDefinition, program, attrs);
}

export function createProgramRecord(fields: ProgramFields): Program {
  const now = new Date().toISOString();
  return {
    id: uuid(),
    name: fields.name,
    code: fields.code,
    description: fields.description,
    createdAt: now,
    updatedAt: now,
  };
}

export function updateProgramRecord(existing: Program, fields: ProgramFields): Program {
  return {
    id: existing.id,
    name: fields.name,
    code: fields.code,
    description: fields.description,
    createdAt: existing.createdAt,
    updatedAt: new Date().toISOString(),
  };
}
