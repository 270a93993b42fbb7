import { gradingConfig } from '@/config/grading';
import type { AcademicRecordsStore } from '@/server/db/types';
import type {
	AssessmentComponentKey,
	AssessmentComponents,
	GradeEntry,
	ValidationResult
} from '@/types/assessment';
import { EnrollmentStatus } from '@/types/registration';

const COMPONENT_KEYS: AssessmentComponentKey[] = ['quiz', 'midterm', 'final'];

export class GradeValidationService {

	constructor(private store: Pick<AcademicRecordsStore, 'findEnrollment'>) {}

	validateComponents(components: AssessmentComponents): ValidationResult {
		const errors: string[] = [];

		for (const key of COMPONENT_KEYS) {
			const value = components[key];
			if (value === null) continue;

			const { label, max } = gradingConfig.components[key];
			if (!Number.isFinite(value) || value < 0 || value > max) {
				errors.push(`${label} score must be between 0 and ${max}`);
			}
		}

		return {
			isValid: errors.length === 0,
			errors
		};
	}

	async validateGradeEntry(entry: GradeEntry): Promise<ValidationResult> {
		const { errors } = this.validateComponents(entry.components);

		const enrollment = await this.store.findEnrollment(entry.studentId, entry.sectionId);

		if (!enrollment) {
			errors.push('Student is not enrolled in this section');
		} else if (enrollment.status === EnrollmentStatus.DROPPED) {
			errors.push('Cannot enter grades for a dropped enrollment');
		}

		return {
			isValid: errors.length === 0,
			errors
		};
	}
}
