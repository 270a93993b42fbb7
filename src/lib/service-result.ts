import type { ServiceResult } from '@/types/registration';

export function serviceSuccess(message: string): ServiceResult;
export function serviceSuccess<T>(message: string, data: T): ServiceResult<T>;
export function serviceSuccess<T>(message: string, data?: T): ServiceResult<T | undefined> {
	return { success: true, message, data };
}

export function serviceError(message: string): ServiceResult<never> {
	return { success: false, message };
}
