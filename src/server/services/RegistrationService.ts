import { format, isAfter } from 'date-fns';
import { schedulesConflict } from '@/lib/conflicts';
import { isUnscheduled } from '@/lib/schedule';
import { serviceError, serviceSuccess } from '@/lib/service-result';
import type { AcademicRecordsStore } from '@/server/db/types';
import {
	EnrollmentStatus,
	SectionStatus,
	type Enrollment,
	type EnrollmentWithSection,
	type Section,
	type ServiceResult
} from '@/types/registration';
import type { MaintenanceModeService } from './MaintenanceModeService';

export const DROP_DEADLINE_FORMAT = 'yyyy-MM-dd HH:mm';

interface RegistrationServiceOptions {
	now?: () => Date;
}

export function hasSeats(section: Section): boolean {
	return section.enrolledCount < section.capacity;
}

export function canDrop(section: Section, now: Date): boolean {
	if (!section.dropDeadline) return true;
	return !isAfter(now, section.dropDeadline);
}

export class RegistrationService {
	private readonly now: () => Date;

	constructor(
		private store: AcademicRecordsStore,
		private maintenance: MaintenanceModeService,
		options: RegistrationServiceOptions = {}
	) {
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Checks run in a fixed order and stop at the first failure. Every check
	 * happens before any write, so a rejected registration changes nothing.
	 * Runs under the student's lock, then the section's.
	 */
	async register(studentId: string, sectionId: string): Promise<ServiceResult<{ enrollmentId: string }>> {
		const access = await this.maintenance.check({ kind: 'STUDENT', studentId }, true);
		if (!access.allowed) {
			return serviceError(access.reason);
		}

		return this.withRegistrationLocks(studentId, sectionId, async () => {
			const section = await this.store.findSection(sectionId);
			if (!section) {
				return serviceError('Section not found');
			}

			const existing = await this.store.findEnrollment(studentId, sectionId);
			if (existing?.status === EnrollmentStatus.ACTIVE) {
				return serviceError('You are already registered for this section');
			}
			if (existing?.status === EnrollmentStatus.COMPLETED) {
				return serviceError('You have already completed this section');
			}

			if (section.status === SectionStatus.CLOSED) {
				return serviceError('Section is closed. Registration not available.');
			}

			if (!hasSeats(section)) {
				return serviceError(`Section is full (Capacity: ${section.capacity})`);
			}

			const clash = await this.findScheduleClash(studentId, section);
			if (clash) {
				return serviceError(
					`Time clash detected! You already have ${clash.courseCode} at ${clash.scheduleText}. ` +
						`Cannot register for course ${section.courseCode}`
				);
			}

			let enrollmentId: string;
			if (existing?.status === EnrollmentStatus.DROPPED) {
				await this.store.reactivateEnrollment(existing.id);
				enrollmentId = existing.id;
			} else {
				enrollmentId = await this.store.createEnrollment(studentId, sectionId);
			}
			await this.store.incrementSectionCount(sectionId);

			return serviceSuccess(
				`Successfully registered for ${section.courseCode} - ${section.courseTitle}`,
				{ enrollmentId }
			);
		});
	}

	async drop(studentId: string, sectionId: string): Promise<ServiceResult<{ enrollmentId: string }>> {
		const access = await this.maintenance.check({ kind: 'STUDENT', studentId }, true);
		if (!access.allowed) {
			return serviceError(access.reason);
		}

		return this.withRegistrationLocks(studentId, sectionId, async () => {
			const enrollment = await this.store.findEnrollment(studentId, sectionId);
			if (!enrollment || enrollment.status !== EnrollmentStatus.ACTIVE) {
				return serviceError('You are not enrolled in this section');
			}

			const section = await this.store.findSection(sectionId);
			if (!section) {
				return serviceError('Section not found');
			}
			if (section.dropDeadline && !canDrop(section, this.now())) {
				return serviceError(
					`Cannot drop this section. Drop deadline has passed (${format(section.dropDeadline, DROP_DEADLINE_FORMAT)})`
				);
			}

			await this.store.markDropped(enrollment.id);
			await this.store.decrementSectionCount(sectionId);

			return serviceSuccess(`Successfully dropped ${section.courseCode}`, {
				enrollmentId: enrollment.id
			});
		});
	}

	async getTimetable(studentId: string): Promise<EnrollmentWithSection[]> {
		return this.withSections(await this.store.findActiveEnrollments(studentId));
	}

	async getAllEnrollments(studentId: string): Promise<EnrollmentWithSection[]> {
		return this.withSections(await this.store.findEnrollments(studentId));
	}

	/** Student first, then section; every caller takes them in this order. */
	private withRegistrationLocks<T>(studentId: string, sectionId: string, fn: () => Promise<T>): Promise<T> {
		return this.store.withStudentLock(studentId, () => this.store.withSectionLock(sectionId, fn));
	}

	/**
	 * First section among the student's active enrollments whose timetable
	 * clashes with `target`, in enrollment listing order.
	 */
	private async findScheduleClash(studentId: string, target: Section): Promise<Section | null> {
		if (isUnscheduled(target.scheduleText)) return null;

		const activeEnrollments = await this.store.findActiveEnrollments(studentId);
		for (const enrollment of activeEnrollments) {
			const enrolledSection = await this.store.findSection(enrollment.sectionId);
			if (!enrolledSection) continue;

			if (schedulesConflict(target.scheduleText, enrolledSection.scheduleText)) {
				return enrolledSection;
			}
		}

		return null;
	}

	private async withSections(enrollments: Enrollment[]): Promise<EnrollmentWithSection[]> {
		const rows: EnrollmentWithSection[] = [];
		for (const enrollment of enrollments) {
			const section = await this.store.findSection(enrollment.sectionId);
			if (section) rows.push({ enrollment, section });
		}
		return rows;
	}
}
