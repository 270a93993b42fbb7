import type { AssessmentRecord } from '@/types/assessment';
import type { LetterGrade } from '@/types/grades';
import type { Enrollment, EnrollmentStatus, Section } from '@/types/registration';

/**
 * Data-access collaborator behind the registration and grading services.
 * Implementations wrap a relational store; rejections are storage failures
 * and propagate to the caller.
 */
export interface AcademicRecordsStore {
	findSection(sectionId: string): Promise<Section | null>;
	/** ACTIVE enrollments in listing order. */
	findActiveEnrollments(studentId: string): Promise<Enrollment[]>;
	findEnrollments(studentId: string, status?: EnrollmentStatus): Promise<Enrollment[]>;
	findEnrollment(studentId: string, sectionId: string): Promise<Enrollment | null>;
	findEnrollmentsBySection(sectionId: string, status?: EnrollmentStatus): Promise<Enrollment[]>;

	createEnrollment(studentId: string, sectionId: string): Promise<string>;
	/** Back to ACTIVE, with the drop time and any final grade cleared. */
	reactivateEnrollment(enrollmentId: string): Promise<void>;
	markDropped(enrollmentId: string): Promise<void>;
	incrementSectionCount(sectionId: string): Promise<void>;
	decrementSectionCount(sectionId: string): Promise<void>;

	getAssessmentRecord(studentId: string, sectionId: string): Promise<AssessmentRecord | null>;
	getAssessmentRecordsBySection(sectionId: string): Promise<AssessmentRecord[]>;
	upsertAssessmentRecord(record: AssessmentRecord): Promise<void>;
	/** Records the letter and moves the enrollment to COMPLETED. */
	setFinalGrade(enrollmentId: string, letter: LetterGrade): Promise<void>;

	isMaintenanceModeActive(): Promise<boolean>;
	setMaintenanceMode(enabled: boolean): Promise<void>;

	/**
	 * Runs `fn` exclusively against other work on the same student's
	 * enrollments. Callers that also need a section lock take it inside.
	 */
	withStudentLock<T>(studentId: string, fn: () => Promise<T>): Promise<T>;
	/**
	 * Runs `fn` with exclusive write access to one section row, so the
	 * capacity check and the seat-count update cannot interleave with another
	 * registration for the same section.
	 */
	withSectionLock<T>(sectionId: string, fn: () => Promise<T>): Promise<T>;
}
