import type { ScheduleParseResult, ScheduleSlot, Weekday } from '@/types/schedule';

const DAY_NAME_PATTERN = /^(mon|monday|tue|tuesday|wed|wednesday|thu|thursday|fri|friday|sat|saturday|sun|sunday)$/;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

const WEEKDAY_CODES = new Map<string, Weekday>([
	['mon', 'Mon'],
	['tue', 'Tue'],
	['wed', 'Wed'],
	['thu', 'Thu'],
	['fri', 'Fri'],
	['sat', 'Sat'],
	['sun', 'Sun']
]);

export const WEEK_ORDER: readonly Weekday[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

/**
 * Empty, blank and "TBA" schedules mean the section has no meeting time yet.
 * Such sections never clash with anything, so callers check this before
 * parsing.
 */
export function isUnscheduled(text: string | null | undefined): boolean {
	if (text == null) return true;
	const trimmed = text.trim();
	return trimmed === '' || trimmed.toUpperCase() === 'TBA';
}

export function parseWeekday(token: string): Weekday | null {
	const clean = token.replace(/[^a-zA-Z]/g, '').toLowerCase();
	if (!DAY_NAME_PATTERN.test(clean)) return null;
	return WEEKDAY_CODES.get(clean.slice(0, 3)) ?? null;
}

/**
 * Parses "H:MM" or "HH:MM" (24-hour) into minutes since midnight.
 */
export function parseClockTime(value: string): number | null {
	const match = CLOCK_PATTERN.exec(value.trim());
	if (!match) return null;

	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (hours > 23 || minutes > 59) return null;

	return hours * 60 + minutes;
}

function unparseable(reason: string): ScheduleParseResult {
	return { ok: false, reason };
}

/**
 * Parses a weekly schedule such as "Mon/Wed/Fri 10:00-11:30".
 *
 * The last whitespace-separated token is the time range. Everything before it
 * is re-joined and split on "/" into day tokens; tokens that are not weekday
 * names are skipped. Never throws: malformed input comes back as
 * `{ ok: false }`.
 */
export function parseSchedule(text: string | null | undefined): ScheduleParseResult {
	if (text == null || text.trim() === '') {
		return unparseable('Schedule is empty');
	}

	const parts = text.trim().split(/\s+/);
	if (parts.length < 2) {
		return unparseable(`Expected "<days> <start>-<end>" but got "${text.trim()}"`);
	}

	const timeRange = parts[parts.length - 1];
	const days = new Set<Weekday>();
	for (const token of parts.slice(0, -1).join(' ').split('/')) {
		const day = parseWeekday(token);
		if (day) days.add(day);
	}

	if (days.size === 0) {
		return unparseable('No recognizable weekday');
	}

	const bounds = timeRange.split('-');
	if (bounds.length !== 2) {
		return unparseable(`Invalid time range "${timeRange}"`);
	}

	const startMinute = parseClockTime(bounds[0]);
	const endMinute = parseClockTime(bounds[1]);
	if (startMinute === null || endMinute === null) {
		return unparseable(`Invalid time range "${timeRange}"`);
	}

	// Zero-length and inverted ranges are rejected
	if (startMinute >= endMinute) {
		return unparseable(`Start time must be before end time in "${timeRange}"`);
	}

	return { ok: true, slot: { days, startMinute, endMinute } };
}

function formatClockTime(minutes: number): string {
	const hours = Math.floor(minutes / 60);
	return `${String(hours).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`;
}

/** Canonical text for a slot, days in week order: "Mon/Wed 09:00-10:15". */
export function formatSlot(slot: ScheduleSlot): string {
	const days = WEEK_ORDER.filter(day => slot.days.has(day)).join('/');
	return `${days} ${formatClockTime(slot.startMinute)}-${formatClockTime(slot.endMinute)}`;
}
