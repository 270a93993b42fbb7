export { parseSchedule, isUnscheduled, formatSlot } from './lib/schedule';
export { schedulesConflict, slotsConflict, timeRangesOverlap } from './lib/conflicts';
export { authorize, canAccessSection, canAccessStudentData, MAINTENANCE_DENIAL_REASON } from './lib/access';
export {
	cgpa,
	classStatistics,
	gpaPoints,
	isComplete,
	letterGrade,
	letterGradeFor,
	percentage,
	totalScore
} from './lib/grading';
export { InMemoryAcademicRecordsStore } from './server/db/memory-store';
export type { AcademicRecordsStore } from './server/db/types';
export { createAcademicRecordsServices, type AcademicRecordsServices } from './server/services';
export { appRouter, createCaller, type AppRouter } from './server/api/root';
export { createTRPCContext, type Session } from './server/api/trpc';
export * from './types/access';
export * from './types/assessment';
export * from './types/grades';
export * from './types/registration';
export * from './types/schedule';
