import type { SessionCollectorConfig } from '../Types'

/** session files older than this are removed */
export const DEFAULT_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000

/** time between two scheduled sweeps */
export const DEFAULT_INTERVAL_MS = 60 * 60 * 1000

/** naming convention shared with the filesystem session store */
export const SESSION_FILE_PREFIX = 'session_'

/** largest delay Node timers accept; longer ones are clamped to 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/**
 * Reads a whole millisecond count from an env-style string.
 * Falls back when it is unset, not a plain number (e.g. `7d`) or outside `[min, max]`.
 */
export const parseDurationMs = (
	value: string | undefined,
	fallback: number,
	min = 0,
	max = Number.MAX_SAFE_INTEGER
): number => {
	if (!value?.trim()) {
		return fallback
	}

	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
		return fallback
	}

	return parsed
}

export const DEFAULT_SESSION_COLLECTOR_CONFIG: SessionCollectorConfig = {
	maxAgeMs: parseDurationMs(process.env.SESSION_GC_MAX_AGE_MS, DEFAULT_MAX_AGE_MS),
	intervalMs: parseDurationMs(process.env.SESSION_GC_INTERVAL_MS, DEFAULT_INTERVAL_MS, 1, MAX_TIMER_DELAY_MS),
	prefix: SESSION_FILE_PREFIX
}
