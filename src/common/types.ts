export interface BaseEntity { id: string; createdAt: string; updatedAt: string; }

export const ENTITY_NAMES = ['program', 'semester', 'teacher_course', 'student_course'] as const;

export type EntityName = (typeof ENTITY_NAMES)[number];

export const ENTITY_LABELS: Record<EntityName, string> = {
	program: 'Program',
	semester: 'Semester',
	teacher_course: 'Teacher course',
	student_course: 'Student course',
};

export type ProgramFields = {
	name: string;
	/** Short catalogue code, stored upper-cased. */
	code: string;
	description?: string;
};

export interface Program extends BaseEntity, ProgramFields {}

export type SemesterFields = {
	programId: string;
	name: string;
	/** Calendar dates as `YYYY-MM-DD`. */
	startsOn?: string;
	endsOn?: string;
};

export interface Semester extends BaseEntity, SemesterFields {}

export interface SemesterWithProgram extends Semester {
	program: Program;
}

export type TeacherCourseFields = {
	teacherId: string;
	courseId: string;
};

export interface TeacherCourse extends BaseEntity, TeacherCourseFields {}

export type StudentCourseFields = {
	studentId: string;
	courseId: string;
};

export interface StudentCourse extends BaseEntity, StudentCourseFields {}
