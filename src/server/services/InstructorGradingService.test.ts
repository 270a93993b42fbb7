import { beforeEach, describe, expect, it } from 'vitest';
import { MAINTENANCE_DENIAL_REASON } from '@/lib/access';
import { InMemoryAcademicRecordsStore } from '@/server/db/memory-store';
import { makeEnrollment, makeSection } from '@/test/fixtures';
import { EnrollmentStatus } from '@/types/registration';
import { InstructorGradingService } from './InstructorGradingService';
import { MaintenanceModeService } from './MaintenanceModeService';

describe('InstructorGradingService', () => {
	let store: InMemoryAcademicRecordsStore;
	let maintenance: MaintenanceModeService;
	let grading: InstructorGradingService;

	beforeEach(() => {
		store = new InMemoryAcademicRecordsStore({
			sections: [
				makeSection({ id: 'sec-1', instructorId: 'inst-1' }),
				makeSection({ id: 'sec-2', instructorId: 'inst-2' })
			],
			enrollments: [
				makeEnrollment({ id: 'e1', studentId: 'stu-1', sectionId: 'sec-1' }),
				makeEnrollment({ id: 'e2', studentId: 'stu-2', sectionId: 'sec-1' }),
				makeEnrollment({ id: 'e3', studentId: 'stu-3', sectionId: 'sec-1', status: EnrollmentStatus.DROPPED })
			]
		});
		maintenance = new MaintenanceModeService(store);
		grading = new InstructorGradingService(store, maintenance);
	});

	describe('enterGrade', () => {
		it('saves partial components', async () => {
			expect(
				await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 18, midterm: null, final: null })
			).toEqual({ success: true, message: 'Grades saved successfully', data: undefined });

			expect(await store.getAssessmentRecord('stu-1', 'sec-1')).toEqual({
				studentId: 'stu-1',
				sectionId: 'sec-1',
				quiz: 18,
				midterm: null,
				final: null
			});
		});

		it('refuses another instructor', async () => {
			expect(
				(await grading.enterGrade('inst-2', 'stu-1', 'sec-1', { quiz: 18, midterm: null, final: null })).message
			).toBe('Access denied: This is not your section');
		});

		it('joins validation errors into one message', async () => {
			expect(
				(await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 25, midterm: 31, final: null })).message
			).toBe('Quiz score must be between 0 and 20; Midterm score must be between 0 and 30');
			expect(await store.getAssessmentRecord('stu-1', 'sec-1')).toBeNull();
		});

		it('is blocked during maintenance', async () => {
			await store.setMaintenanceMode(true);
			expect(
				(await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 18, midterm: null, final: null })).message
			).toBe(MAINTENANCE_DENIAL_REASON);
		});
	});

	describe('computeFinalGrade', () => {
		it('requires an assessment record', async () => {
			expect((await grading.computeFinalGrade('inst-1', 'stu-1', 'sec-1')).message).toBe('No grades entered yet');
		});

		it('requires every component', async () => {
			await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 18, midterm: 25, final: null });
			expect((await grading.computeFinalGrade('inst-1', 'stu-1', 'sec-1')).message).toBe(
				'All grade components (quiz, midterm, final) must be entered'
			);
		});

		it('stores the letter and completes the enrollment', async () => {
			await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 18, midterm: 25.5, final: 44 });

			expect(await grading.computeFinalGrade('inst-1', 'stu-1', 'sec-1')).toEqual({
				success: true,
				message: 'Final grade computed: A (87.50%)',
				data: { letter: 'A', percentage: 87.5 }
			});
			expect(await store.findEnrollment('stu-1', 'sec-1')).toMatchObject({
				status: EnrollmentStatus.COMPLETED,
				finalGrade: 'A'
			});
		});
	});

	describe('section-wide operations', () => {
		beforeEach(async () => {
			await grading.enterGrade('inst-1', 'stu-1', 'sec-1', { quiz: 19, midterm: 28, final: 45 });
			await grading.enterGrade('inst-1', 'stu-2', 'sec-1', { quiz: 12, midterm: null, final: null });
		});

		it('computes final grades for every non-dropped student', async () => {
			expect(await grading.computeAllFinalGrades('inst-1', 'sec-1')).toEqual({
				success: true,
				message: 'Final grades computed for all students',
				data: {
					'stu-1': 'Final grade computed: A+ (92.00%)',
					'stu-2': 'All grade components (quiz, midterm, final) must be entered'
				}
			});
		});

		it('returns the active roster', async () => {
			const roster = await grading.getSectionRoster('inst-1', 'sec-1');
			expect(roster.success && roster.data.map(e => e.studentId)).toEqual(['stu-1', 'stu-2']);
		});

		it('lists grades with computed letters', async () => {
			const grades = await grading.getSectionGrades('inst-1', 'sec-1');
			if (!grades.success) throw new Error(grades.message);

			expect(grades.data.map(row => [row.studentId, row.totalScore, row.computedGrade])).toEqual([
				['stu-1', 92, 'A+'],
				['stu-2', 12, 'N/A'],
				['stu-3', null, 'N/A']
			]);
		});

		it('summarizes the class from complete records and final letters', async () => {
			await grading.computeFinalGrade('inst-1', 'stu-1', 'sec-1');

			const stats = await grading.getClassStatistics('inst-1', 'sec-1');
			if (!stats.success) throw new Error(stats.message);

			expect(stats.data).toMatchObject({
				totalStudents: 3,
				gradedCount: 1,
				averageScore: 92,
				minScore: 92,
				maxScore: 92
			});
			expect(stats.data.distributionByLetter['A+']).toBe(1);
			expect(stats.data.distributionByLetter['N/A']).toBe(2);
		});

		it('hides section data from other instructors', async () => {
			expect((await grading.getClassStatistics('inst-2', 'sec-1')).message).toBe(
				'Access denied: This is not your section'
			);
			expect((await grading.getSectionRoster('inst-1', 'sec-2')).message).toBe(
				'Access denied: This is not your section'
			);
		});
	});
});
