import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { buildChangeset, type Changeset, type ChangesetDefinition, type FieldInput } from '../../common/changeset.js';
import { identifier } from '../../common/field-schemas.js';
import type { StudentCourse, StudentCourseFields } from '../../common/types.js';

export const studentCourseSchema = z.object({
  studentId: identifier(),
  courseId: identifier(),
});

const studentCourseDefinition: ChangesetDefinition<StudentCourseFields> = {
  entity: 'student_course',
  schema: studentCourseSchema,
  fields: studentCourseSchema.keyof().options,
};

export function studentCourseChangeset(
  studentCourse: StudentCourse | undefined,
  attrs: FieldInput = {},
): Changeset<StudentCourse, StudentCourseFields> {
  return buildChangeset(studentCourseDefinition, studentCourse, attrs);
}

export function createStudentCourseRecord(fields: StudentCourseFields): StudentCourse {
  const now = new Date().toISOString();
  return { id: uuid(), studentId: fields.studentId, courseId: fields.courseId, createdAt: now, updatedAt: now };
}

export function updateStudentCourseRecord(existing: StudentCourse, fields: StudentCourseFields): StudentCourse {
  return {
    id: existing.id,
    studentId: fields.studentId,
    courseId: fields.courseId,
    createdAt: existing.createdAt,
    updatedAt: new Date().toISOString(),
  };
}
