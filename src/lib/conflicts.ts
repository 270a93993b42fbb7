import type { ScheduleSlot } from '@/types/schedule';
import { isUnscheduled, parseSchedule } from './schedule';

/**
 * Half-open overlap test with boundary touches excluded: 11:00-12:00 and
 * 12:00-13:00 do not overlap.
 */
export function timeRangesOverlap(start1: number, end1: number, start2: number, end2: number): boolean {
	const overlaps = start1 < end2 && start2 < end1;
	const touchingEdge = end1 === start2 || end2 === start1;

	return overlaps && !touchingEdge;
}

export function sharesDay(a: ScheduleSlot, b: ScheduleSlot): boolean {
	for (const day of a.days) {
		if (b.days.has(day)) return true;
	}
	return false;
}

export function slotsConflict(a: ScheduleSlot, b: ScheduleSlot): boolean {
	return sharesDay(a, b) && timeRangesOverlap(a.startMinute, a.endMinute, b.startMinute, b.endMinute);
}

/**
 * Schedule text that is unscheduled or cannot be parsed never conflicts, so a
 * registration is not blocked by bad timetable data.
 */
export function schedulesConflict(textA: string | null | undefined, textB: string | null | undefined): boolean {
	if (isUnscheduled(textA) || isUnscheduled(textB)) return false;

	const a = parseSchedule(textA);
	const b = parseSchedule(textB);
	if (!a.ok || !b.ok) return false;

	return slotsConflict(a.slot, b.slot);
}
