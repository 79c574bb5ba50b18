import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { buildChangeset, type Changeset, type ChangesetDefinition, type FieldInput } from '../../common/changeset.js';
import { identifier } from '../../common/field-schemas.js';
import type { TeacherCourse, TeacherCourseFields } from '../../common/types.js';

export const teacherCourseSchema = z.object({
  teacherId: identifier(),
  courseId: identifier(),
});

const teacherCourseDefinition: ChangesetDefinition<TeacherCourseFields> = {
  entity: 'teacher_course',
  schema: teacherCourseSchema,
  fields: teacherCourseSchema.keyof().options,
};

export function teacherCourseChangeset(
  teacherCourse: TeacherCourse | undefined,
  attrs: FieldInput = {},
): Changeset<TeacherCourse, TeacherCourseFields> {
  return buildChangeset(teacherCourseDefinition, teacherCourse, attrs);
}

export function createTeacherCourseRecord(fields: TeacherCourseFields): TeacherCourse {
  const now = new Date().toISOString();
  return { id: uuid(), teacherId: fields.teacherId, courseId: fields.courseId, createdAt: now, updatedAt: now };
}

export function updateTeacherCourseRecord(existing: TeacherCourse, fields: TeacherCourseFields): TeacherCourse {
  return {
    id: existing.id,
    teacherId: fields.teacherId,
    courseId: fields.courseId,
    createdAt: existing.createdAt,
    updatedAt: new Date().toISOString(),
  };
}
