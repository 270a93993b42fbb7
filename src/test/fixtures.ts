import { EnrollmentStatus, SectionStatus, type Enrollment, type Section } from '@/types/registration';

export function makeSection(overrides: Partial<Section> & Pick<Section, 'id'>): Section {
	return {
		courseCode: `CS${overrides.id}`,
		courseTitle: 'Test Course',
		credits: 4,
		instructorId: 'inst-1',
		capacity: 30,
		enrolledCount: 0,
		status: SectionStatus.OPEN,
		scheduleText: 'TBA',
		dropDeadline: null,
		...overrides
	};
}

export function makeEnrollment(
	overrides: Partial<Enrollment> & Pick<Enrollment, 'id' | 'studentId' | 'sectionId'>
): Enrollment {
	return {
		status: EnrollmentStatus.ACTIVE,
		finalGrade: null,
		enrolledAt: new Date(2026, 7, 20, 9, 0),
		droppedAt: null,
		...overrides
	};
}
