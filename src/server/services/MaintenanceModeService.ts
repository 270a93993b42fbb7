import { authorize } from '@/lib/access';
import { serviceError, serviceSuccess } from '@/lib/service-result';
import type { AcademicRecordsStore } from '@/server/db/types';
import type { AccessDecision, Role } from '@/types/access';
import type { ServiceResult } from '@/types/registration';
import { CacheManager } from './CacheManager';

const MAINTENANCE_MODE_KEY = 'maintenance-mode';

type MaintenanceStore = Pick<AcademicRecordsStore, 'isMaintenanceModeActive' | 'setMaintenanceMode'>;

/**
 * Holds the global maintenance flag. Reads are served from the cache until it
 * expires or an administrator toggles the flag; a flag changed directly in the
 * store is only seen after `refresh()`.
 */
export class MaintenanceModeService {
	constructor(
		private store: MaintenanceStore,
		private cache: CacheManager<boolean> = new CacheManager<boolean>()
	) {}

	async isActive(): Promise<boolean> {
		const cached = this.cache.get(MAINTENANCE_MODE_KEY);
		if (cached !== null) return cached;
		return this.refresh();
	}

	async refresh(): Promise<boolean> {
		const active = await this.store.isMaintenanceModeActive();
		this.cache.set(MAINTENANCE_MODE_KEY, active);
		return active;
	}

	async setMaintenanceMode(actor: Role, enabled: boolean): Promise<ServiceResult<{ enabled: boolean }>> {
		if (actor.kind !== 'ADMIN') {
			return serviceError('Only administrators can change maintenance mode');
		}

		await this.store.setMaintenanceMode(enabled);
		this.cache.set(MAINTENANCE_MODE_KEY, enabled);

		return serviceSuccess(`Maintenance mode ${enabled ? 'enabled' : 'disabled'}`, { enabled });
	}

	async check(role: Role, isWriteOperation: boolean): Promise<AccessDecision> {
		return authorize(role, isWriteOperation, await this.isActive());
	}
}
