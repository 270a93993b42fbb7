import { canAccessSection } from '@/lib/access';
import { classStatistics, isComplete, letterGradeFor, letterGrade, percentage, totalScore } from '@/lib/grading';
import { serviceError, serviceSuccess } from '@/lib/service-result';
import type { AcademicRecordsStore } from '@/server/db/types';
import type { Role } from '@/types/access';
import type { AssessmentComponents, AssessmentRecord } from '@/types/assessment';
import { NOT_GRADED, type ClassStatistics, type FinalGradeResult, type GradeBucket } from '@/types/grades';
import { EnrollmentStatus, type Enrollment, type Section, type ServiceResult } from '@/types/registration';
import { GradeValidationService } from './GradeValidationService';
import type { MaintenanceModeService } from './MaintenanceModeService';

const NOT_YOUR_SECTION = 'Access denied: This is not your section';

export interface SectionGradeRow {
	enrollmentId: string;
	studentId: string;
	status: EnrollmentStatus;
	assessment: AssessmentRecord | null;
	totalScore: number | null;
	computedGrade: GradeBucket;
	finalGrade: Enrollment['finalGrade'];
}

export class InstructorGradingService {
	private validator: GradeValidationService;

	constructor(
		private store: AcademicRecordsStore,
		private maintenance: MaintenanceModeService
	) {
		this.validator = new GradeValidationService(store);
	}

	async enterGrade(
		instructorId: string,
		studentId: string,
		sectionId: string,
		components: AssessmentComponents
	): Promise<ServiceResult> {
		const denial = await this.checkWriteAccess(instructorId);
		if (denial) return denial;

		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const validation = await this.validator.validateGradeEntry({ studentId, sectionId, components });
		if (!validation.isValid) {
			return serviceError(validation.errors.join('; '));
		}

		await this.store.upsertAssessmentRecord({ studentId, sectionId, ...components });
		return serviceSuccess('Grades saved successfully');
	}

	async computeFinalGrade(
		instructorId: string,
		studentId: string,
		sectionId: string
	): Promise<ServiceResult<FinalGradeResult>> {
		const denial = await this.checkWriteAccess(instructorId);
		if (denial) return denial;

		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const record = await this.store.getAssessmentRecord(studentId, sectionId);
		if (!record) {
			return serviceError('No grades entered yet');
		}
		if (!isComplete(record)) {
			return serviceError('All grade components (quiz, midterm, final) must be entered');
		}

		const enrollment = await this.store.findEnrollment(studentId, sectionId);
		if (!enrollment || enrollment.status === EnrollmentStatus.DROPPED) {
			return serviceError('Student is not enrolled in this section');
		}

		const pct = percentage(record);
		const letter = letterGrade(pct);
		await this.store.setFinalGrade(enrollment.id, letter);

		return serviceSuccess(`Final grade computed: ${letter} (${pct.toFixed(2)}%)`, {
			letter,
			percentage: pct
		});
	}

	/** Per-student outcome messages, keyed by student id. */
	async computeAllFinalGrades(
		instructorId: string,
		sectionId: string
	): Promise<ServiceResult<Record<string, string>>> {
		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const enrollments = await this.store.findEnrollmentsBySection(sectionId);
		const results: Record<string, string> = {};

		for (const enrollment of enrollments) {
			if (enrollment.status === EnrollmentStatus.DROPPED) continue;
			const result = await this.computeFinalGrade(instructorId, enrollment.studentId, sectionId);
			results[enrollment.studentId] = result.message;
		}

		return serviceSuccess('Final grades computed for all students', results);
	}

	async getSectionRoster(instructorId: string, sectionId: string): Promise<ServiceResult<Enrollment[]>> {
		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const roster = await this.store.findEnrollmentsBySection(sectionId, EnrollmentStatus.ACTIVE);
		return serviceSuccess('Roster retrieved', roster);
	}

	async getSectionGrades(instructorId: string, sectionId: string): Promise<ServiceResult<SectionGradeRow[]>> {
		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const [enrollments, records] = await Promise.all([
			this.store.findEnrollmentsBySection(sectionId),
			this.store.getAssessmentRecordsBySection(sectionId)
		]);
		const recordsByStudent = new Map(records.map(record => [record.studentId, record]));

		const rows = enrollments.map((enrollment): SectionGradeRow => {
			const assessment = recordsByStudent.get(enrollment.studentId) ?? null;
			return {
				enrollmentId: enrollment.id,
				studentId: enrollment.studentId,
				status: enrollment.status,
				assessment,
				totalScore: assessment ? totalScore(assessment) : null,
				computedGrade: assessment ? letterGradeFor(assessment) : NOT_GRADED,
				finalGrade: enrollment.finalGrade
			};
		});

		return serviceSuccess('Grades retrieved', rows);
	}

	async getClassStatistics(instructorId: string, sectionId: string): Promise<ServiceResult<ClassStatistics>> {
		if (!(await this.ownedSection(instructorId, sectionId))) {
			return serviceError(NOT_YOUR_SECTION);
		}

		const [enrollments, records] = await Promise.all([
			this.store.findEnrollmentsBySection(sectionId),
			this.store.getAssessmentRecordsBySection(sectionId)
		]);

		return serviceSuccess('Statistics computed', classStatistics(enrollments, records));
	}

	private async checkWriteAccess(instructorId: string): Promise<ServiceResult<never> | null> {
		const access = await this.maintenance.check({ kind: 'INSTRUCTOR', instructorId }, true);
		return access.allowed ? null : serviceError(access.reason);
	}

	private async ownedSection(instructorId: string, sectionId: string): Promise<Section | null> {
		const section = await this.store.findSection(sectionId);
		const role: Role = { kind: 'INSTRUCTOR', instructorId };
		return section && canAccessSection(role, section.instructorId) ? section : null;
	}
}
