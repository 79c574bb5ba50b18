import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { buildChangeset, type Changeset, type ChangesetDefinition, type FieldInput } from '../../common/changeset.js';
import { identifier, optionalDate, requiredText } from '../../common/field-schemas.js';
import type { Semester, SemesterFields } from '../../common/types.js';

export const semesterShape = z.object({
  programId: identifier(),
  name: requiredText(120),
  startsOn: optionalDate(),
  endsOn: optionalDate(),
});

// ISO dates compare correctly as strings
const semesterSchema = semesterShape.refine(
  fields => !fields.startsOn || !fields.endsOn || fields.startsOn <= fields.endsOn,
  { message: 'must not be before startsOn', path: ['endsOn'] },
);

const semesterDefinition: ChangesetDefinition<SemesterFields> = {
  entity: 'semester',
  schema: semesterSchema,
  fields: semesterShape.keyof().options,
};

export function semesterChangeset<T extends Semester>(semester: T | undefined, attrs: FieldInput = {}): Changeset<T, SemesterFields> {
  return buildChangeset(semesterDefinition, semester, attrs);
}

export function createSemesterRecord(fields: SemesterFields): Semester {
  const now = new Date().toISOString();
  return {
    id: uuid(),
    programId: fields.programId,
    name: fields.name,
    startsOn: fields.startsOn,
    endsOn: fields.endsOn,
    createdAt: now,
    updatedAt: now,
  };
}

/** Builds the stored row only; a preloaded `program` is not carried over. */
export function updateSemesterRecord(existing: Semester, fields: SemesterFields): Semester {
  return {
    id: existing.id,
    programId: fields.programId,
    name: fields.name,
    startsOn: fields.startsOn,
    endsOn: fields.endsOn,
    createdAt: existing.createdAt,
    updatedAt: new Date().toISOString(),
  };
}
