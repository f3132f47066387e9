import { Boom, isBoom } from '@hapi/boom'
import { MAX_TIMER_DELAY_MS } from '../Defaults'

export enum CollectorErrorReason {
	invalidConfig = 400,
	directoryAccess = 503
}

export interface DirectoryAccessErrorData {
	directory: string
	/** errno code reported by the filesystem, e.g. ENOENT or EACCES */
	code?: string
}

export interface InvalidConfigErrorData {
	field: string
	value: unknown
}

// fs errors may come from another realm (e.g. a vm context), so narrow on shape, not instanceof
const errnoCode = (error: unknown): string | undefined => {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code
	}

	return undefined
}

const errorMessage = (error: unknown): string => {
	if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
		return error.message
	}

	return String(error)
}

/**
 * The session directory could not be opened or listed.
 * This is the only failure a sweep reports.
 */
export const makeDirectoryAccessError = (directory: string, error: unknown) => {
	const code = errnoCode(error)
	const reason = errorMessage(error)
	return new Boom<DirectoryAccessErrorData>(`Unable to read session directory: ${reason}`, {
		statusCode: CollectorErrorReason.directoryAccess,
		data: { directory, code }
	})
}

export const makeInvalidConfigError = (field: string, value: unknown, expectation: string) =>
	new Boom<InvalidConfigErrorData>(`Invalid ${field} (${String(value)}): ${expectation}`, {
		statusCode: CollectorErrorReason.invalidConfig,
		data: { field, value }
	})

export const isDirectoryAccessError = (error: unknown): error is Boom<DirectoryAccessErrorData> =>
	isBoom(error, CollectorErrorReason.directoryAccess)

export const isInvalidConfigError = (error: unknown): error is Boom<InvalidConfigErrorData> =>
	isBoom(error, CollectorErrorReason.invalidConfig)

export const assertValidMaxAge = (maxAgeMs: number) => {
	if (!Number.isFinite(maxAgeMs) || maxAgeMs < 0) {
		throw makeInvalidConfigError('maxAgeMs', maxAgeMs, 'expected a finite number of milliseconds >= 0')
	}
}

export const assertValidInterval = (intervalMs: number) => {
	if (!Number.isInteger(intervalMs) || intervalMs < 1 || intervalMs > MAX_TIMER_DELAY_MS) {
		throw makeInvalidConfigError(
			'intervalMs',
			intervalMs,
			`expected a whole number of milliseconds between 1 and ${MAX_TIMER_DELAY_MS}`
		)
	}
}

export const assertValidPrefix = (prefix: string) => {
	if (!prefix || prefix.includes('/') || prefix.includes('\\')) {
		throw makeInvalidConfigError('prefix', prefix, 'expected a non-empty file name prefix')
	}
}
