import { cgpa } from '@/lib/grading';
import type { AcademicRecordsStore } from '@/server/db/types';
import type { CgpaEntry, TranscriptRecord } from '@/types/grades';
import { EnrollmentStatus } from '@/types/registration';

export class TranscriptService {
	constructor(private store: AcademicRecordsStore) {}

	async getTranscript(studentId: string): Promise<TranscriptRecord[]> {
		const completed = await this.store.findEnrollments(studentId, EnrollmentStatus.COMPLETED);
		const records: TranscriptRecord[] = [];

		for (const enrollment of completed) {
			if (!enrollment.finalGrade) continue;

			const section = await this.store.findSection(enrollment.sectionId);
			if (!section) continue;

			records.push({
				enrollmentId: enrollment.id,
				courseCode: section.courseCode,
				courseTitle: section.courseTitle,
				credits: section.credits,
				grade: enrollment.finalGrade,
				term: section.term
			});
		}

		return records;
	}

	/** Over every enrollment that carries a final letter grade. */
	async getCgpa(studentId: string): Promise<number> {
		const enrollments = await this.store.findEnrollments(studentId);
		const entries: CgpaEntry[] = [];

		for (const enrollment of enrollments) {
			const section = await this.store.findSection(enrollment.sectionId);
			if (!section) continue;
			entries.push({ finalGrade: enrollment.finalGrade, credits: section.credits });
		}

		return cgpa(entries);
	}
}
