import type { AccessDecision, Role } from '@/types/access';

export const MAINTENANCE_DENIAL_REASON =
	'Operation blocked: System is in maintenance mode. Only viewing is allowed.';

/**
 * Reads are always allowed and administrators are never blocked. Everyone else
 * is refused writes while maintenance mode is on.
 */
export function authorize(
	role: Role,
	isWriteOperation: boolean,
	maintenanceModeActive: boolean
): AccessDecision {
	if (!isWriteOperation) return { allowed: true };
	if (role.kind === 'ADMIN') return { allowed: true };
	if (maintenanceModeActive) {
		return { allowed: false, reason: MAINTENANCE_DENIAL_REASON };
	}
	return { allowed: true };
}

export function canAccessStudentData(role: Role, targetStudentId: string): boolean {
	switch (role.kind) {
		case 'ADMIN':
			return true;
		case 'STUDENT':
			return role.studentId === targetStudentId;
		case 'INSTRUCTOR':
			return false;
	}
}

export function canAccessSection(role: Role, sectionInstructorId: string | null): boolean {
	switch (role.kind) {
		case 'ADMIN':
			return true;
		case 'INSTRUCTOR':
			return sectionInstructorId !== null && role.instructorId === sectionInstructorId;
		case 'STUDENT':
			return false;
	}
}
