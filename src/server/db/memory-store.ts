import type { AssessmentRecord } from '@/types/assessment';
import type { LetterGrade } from '@/types/grades';
import { EnrollmentStatus, type Enrollment, type Section } from '@/types/registration';
import type { AcademicRecordsStore } from './types';

interface InMemoryStoreOptions {
	sections?: Section[];
	enrollments?: Enrollment[];
	assessmentRecords?: AssessmentRecord[];
	maintenanceMode?: boolean;
	now?: () => Date;
}

function assessmentKey(studentId: string, sectionId: string): string {
	return `${studentId}:${sectionId}`;
}

/**
 * In-process store with the same semantics as the relational schema: one
 * enrollment row per (student, section), seat counts kept on the section row.
 */
export class InMemoryAcademicRecordsStore implements AcademicRecordsStore {
	private sections = new Map<string, Section>();
	private enrollments = new Map<string, Enrollment>();
	private assessments = new Map<string, AssessmentRecord>();
	private locks = new Map<string, Promise<void>>();
	private maintenanceMode: boolean;
	private nextEnrollmentId = 1;
	private readonly now: () => Date;

	constructor(options: InMemoryStoreOptions = {}) {
		this.now = options.now ?? (() => new Date());
		this.maintenanceMode = options.maintenanceMode ?? false;
		options.sections?.forEach(section => this.addSection(section));
		options.enrollments?.forEach(enrollment => {
			this.enrollments.set(enrollment.id, { ...enrollment });
		});
		options.assessmentRecords?.forEach(record => {
			this.assessments.set(assessmentKey(record.studentId, record.sectionId), { ...record });
		});
	}

	addSection(section: Section): void {
		this.sections.set(section.id, { ...section });
	}

	async findSection(sectionId: string): Promise<Section | null> {
		const section = this.sections.get(sectionId);
		return section ? { ...section } : null;
	}

	async findActiveEnrollments(studentId: string): Promise<Enrollment[]> {
		return this.findEnrollments(studentId, EnrollmentStatus.ACTIVE);
	}

	async findEnrollments(studentId: string, status?: EnrollmentStatus): Promise<Enrollment[]> {
		return Array.from(this.enrollments.values())
			.filter(e => e.studentId === studentId && (status === undefined || e.status === status))
			.map(e => ({ ...e }));
	}

	async findEnrollment(studentId: string, sectionId: string): Promise<Enrollment | null> {
		for (const enrollment of this.enrollments.values()) {
			if (enrollment.studentId === studentId && enrollment.sectionId === sectionId) {
				return { ...enrollment };
			}
		}
		return null;
	}

	async findEnrollmentsBySection(sectionId: string, status?: EnrollmentStatus): Promise<Enrollment[]> {
		return Array.from(this.enrollments.values())
			.filter(e => e.sectionId === sectionId && (status === undefined || e.status === status))
			.map(e => ({ ...e }));
	}

	async createEnrollment(studentId: string, sectionId: string): Promise<string> {
		if (await this.findEnrollment(studentId, sectionId)) {
			throw new Error(`Enrollment already exists for student ${studentId} in section ${sectionId}`);
		}

		const id = String(this.nextEnrollmentId++);
		this.enrollments.set(id, {
			id,
			studentId,
			sectionId,
			status: EnrollmentStatus.ACTIVE,
			finalGrade: null,
			enrolledAt: this.now(),
			droppedAt: null
		});
		return id;
	}

	async reactivateEnrollment(enrollmentId: string): Promise<void> {
		const enrollment = this.requireEnrollment(enrollmentId);
		enrollment.status = EnrollmentStatus.ACTIVE;
		enrollment.enrolledAt = this.now();
		enrollment.droppedAt = null;
		enrollment.finalGrade = null;
	}

	async markDropped(enrollmentId: string): Promise<void> {
		const enrollment = this.requireEnrollment(enrollmentId);
		enrollment.status = EnrollmentStatus.DROPPED;
		enrollment.droppedAt = this.now();
	}

	async incrementSectionCount(sectionId: string): Promise<void> {
		const section = this.requireSection(sectionId);
		if (section.enrolledCount >= section.capacity) {
			throw new Error(`Section ${sectionId} is already at capacity`);
		}
		section.enrolledCount++;
	}

	async decrementSectionCount(sectionId: string): Promise<void> {
		const section = this.requireSection(sectionId);
		section.enrolledCount = Math.max(0, section.enrolledCount - 1);
	}

	async getAssessmentRecord(studentId: string, sectionId: string): Promise<AssessmentRecord | null> {
		const record = this.assessments.get(assessmentKey(studentId, sectionId));
		return record ? { ...record } : null;
	}

	async getAssessmentRecordsBySection(sectionId: string): Promise<AssessmentRecord[]> {
		return Array.from(this.assessments.values())
			.filter(record => record.sectionId === sectionId)
			.map(record => ({ ...record }));
	}

	async upsertAssessmentRecord(record: AssessmentRecord): Promise<void> {
		this.assessments.set(assessmentKey(record.studentId, record.sectionId), { ...record });
	}

	async setFinalGrade(enrollmentId: string, letter: LetterGrade): Promise<void> {
		const enrollment = this.requireEnrollment(enrollmentId);
		enrollment.finalGrade = letter;
		enrollment.status = EnrollmentStatus.COMPLETED;
	}

	async isMaintenanceModeActive(): Promise<boolean> {
		return this.maintenanceMode;
	}

	async setMaintenanceMode(enabled: boolean): Promise<void> {
		this.maintenanceMode = enabled;
	}

	async withStudentLock<T>(studentId: string, fn: () => Promise<T>): Promise<T> {
		return this.withLock(`student:${studentId}`, fn);
	}

	async withSectionLock<T>(sectionId: string, fn: () => Promise<T>): Promise<T> {
		return this.withLock(`section:${sectionId}`, fn);
	}

	private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.locks.get(key) ?? Promise.resolve();
		const run = previous.then(fn);
		const settled = run.then(
			() => undefined,
			() => undefined
		);
		this.locks.set(key, settled);

		try {
			return await run;
		} finally {
			if (this.locks.get(key) === settled) {
				this.locks.delete(key);
			}
		}
	}

	private requireSection(sectionId: string): Section {
		const section = this.sections.get(sectionId);
		if (!section) throw new Error(`Section ${sectionId} not found`);
		return section;
	}

	private requireEnrollment(enrollmentId: string): Enrollment {
		const enrollment = this.enrollments.get(enrollmentId);
		if (!enrollment) throw new Error(`Enrollment ${enrollmentId} not found`);
		return enrollment;
	}
}
