import type { FieldInput } from '../common/changeset.js';
import type { Result } from '../common/result.js';
import type { CourseContext } from '../modules/courses/course.context.js';

const DEMO_PROGRAM = {
  name: 'Computer Science',
  code: 'CS',
  description: 'Demo program created on first start',
};

const DEMO_SEMESTERS: FieldInput[] = [
  { name: 'Fall 2026', startsOn: '2026-09-01', endsOn: '2026-12-18' },
  { name: 'Spring 2027', startsOn: '2027-01-11', endsOn: '2027-05-07' },
];

function unwrapSeed<T>(label: string, result: Result<T, { message: string }>): T {
  if (!result.ok) {
    throw new Error(`Unable to seed ${label}: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Creates a demo program with two semesters and one assignment of each
 * kind. Does nothing when a program already exists; returns whether it
 * wrote anything.
 */
export function seedDemoData(context: CourseContext): boolean {
  if (context.listPrograms().length > 0) {
    return false;
  }
  const program = unwrapSeed('program', context.createProgram(DEMO_PROGRAM));
  for (const semester of DEMO_SEMESTERS) {
    unwrapSeed('semester', context.createSemester({ ...semester, programId: program.id }));
  }
  unwrapSeed('teacher course', context.createTeacherCourse({ teacherId: 'teacher-demo', courseId: 'course-cs101' }));
  unwrapSeed('student course', context.createStudentCourse({ studentId: 'student-demo', courseId: 'course-cs101' }));
  return true;
}
