import {
	DEFAULT_INTERVAL_MS,
	DEFAULT_MAX_AGE_MS,
	DEFAULT_SESSION_COLLECTOR_CONFIG,
	MAX_TIMER_DELAY_MS,
	parseDurationMs,
	SESSION_FILE_PREFIX
} from '../../Defaults'
import { assertValidInterval, assertValidMaxAge, assertValidPrefix } from '../../Utils/collector-errors'

describe('Defaults', () => {
	it('should default to a week of retention swept hourly', () => {
		expect(DEFAULT_MAX_AGE_MS).toBe(168 * 3600000)
		expect(DEFAULT_INTERVAL_MS).toBe(3600000)
		expect(SESSION_FILE_PREFIX).toBe('session_')
	})

	it('should always produce a config the collector accepts', () => {
		expect(() => assertValidMaxAge(DEFAULT_SESSION_COLLECTOR_CONFIG.maxAgeMs)).not.toThrow()
		expect(() => assertValidInterval(DEFAULT_SESSION_COLLECTOR_CONFIG.intervalMs)).not.toThrow()
		expect(() => assertValidPrefix(DEFAULT_SESSION_COLLECTOR_CONFIG.prefix)).not.toThrow()
	})

	describe('parseDurationMs', () => {
		it('should parse a millisecond count', () => {
			expect(parseDurationMs('1800000', 5)).toBe(1800000)
		})

		it('should fall back when unset or empty', () => {
			expect(parseDurationMs(undefined, 5)).toBe(5)
			expect(parseDurationMs('', 5)).toBe(5)
		})

		it('should accept exponent notation for whole numbers', () => {
			expect(parseDurationMs('6.048e8', 1)).toBe(604800000)
		})

		it('should fall back on garbage', () => {
			expect(parseDurationMs('soon', 5)).toBe(5)
			expect(parseDurationMs('   ', 5)).toBe(5)
		})

		it('should fall back on values with a unit suffix instead of keeping the leading digits', () => {
			expect(parseDurationMs('7d', DEFAULT_MAX_AGE_MS)).toBe(DEFAULT_MAX_AGE_MS)
			expect(parseDurationMs('1h', DEFAULT_INTERVAL_MS)).toBe(DEFAULT_INTERVAL_MS)
			expect(parseDurationMs('1e3x', 5)).toBe(5)
		})

		it('should fall back on fractions and values outside the range', () => {
			expect(parseDurationMs('1.5', 5)).toBe(5)
			expect(parseDurationMs('-10', 5)).toBe(5)
			expect(parseDurationMs('0', 5, 1)).toBe(5)
			expect(parseDurationMs(String(MAX_TIMER_DELAY_MS + 1), 5, 1, MAX_TIMER_DELAY_MS)).toBe(5)
			expect(parseDurationMs(String(MAX_TIMER_DELAY_MS), 5, 1, MAX_TIMER_DELAY_MS)).toBe(MAX_TIMER_DELAY_MS)
		})
	})
})
