export type Weekday = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri' | 'Sat' | 'Sun';

export interface ScheduleSlot {
	days: ReadonlySet<Weekday>;
	/** Minutes since midnight. */
	startMinute: number;
	endMinute: number;
}

export type ScheduleParseResult =
	| { ok: true; slot: ScheduleSlot }
	| { ok: false; reason: string };
