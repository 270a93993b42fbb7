import type { AcademicRecordsStore } from '@/server/db/types';
import { InstructorGradingService } from './InstructorGradingService';
import { MaintenanceModeService } from './MaintenanceModeService';
import { RegistrationService } from './RegistrationService';
import { TranscriptService } from './TranscriptService';

export interface AcademicRecordsServices {
	maintenance: MaintenanceModeService;
	registration: RegistrationService;
	grading: InstructorGradingService;
	transcripts: TranscriptService;
}

export function createAcademicRecordsServices(
	store: AcademicRecordsStore,
	options: { now?: () => Date } = {}
): AcademicRecordsServices {
	const maintenance = new MaintenanceModeService(store);

	return {
		maintenance,
		registration: new RegistrationService(store, maintenance, options),
		grading: new InstructorGradingService(store, maintenance),
		transcripts: new TranscriptService(store)
	};
}
