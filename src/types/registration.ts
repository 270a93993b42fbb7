import type { LetterGrade } from './grades';

export enum SectionStatus {
	OPEN = 'OPEN',
	CLOSED = 'CLOSED'
}

export enum EnrollmentStatus {
	ACTIVE = 'ACTIVE',
	DROPPED = 'DROPPED',
	COMPLETED = 'COMPLETED'
}

export interface Section {
	id: string;
	courseCode: string;
	courseTitle: string;
	credits: number;
	instructorId: string | null;
	capacity: number;
	enrolledCount: number;
	status: SectionStatus;
	/** e.g. "Mon/Wed/Fri 10:00-11:30", or "TBA" */
	scheduleText: string | null;
	dropDeadline: Date | null;
	term?: string;
}

export interface Enrollment {
	id: string;
	studentId: string;
	sectionId: string;
	status: EnrollmentStatus;
	finalGrade: LetterGrade | null;
	enrolledAt: Date;
	droppedAt: Date | null;
}

export interface EnrollmentWithSection {
	enrollment: Enrollment;
	section: Section;
}

export type ServiceResult<T = undefined> =
	| { success: true; message: string; data: T }
	| { success: false; message: string };
