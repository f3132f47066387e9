import { DEFAULT_SESSION_COLLECTOR_CONFIG } from '../Defaults'
import type { SessionCollector, SessionCollectorConfig, SessionCollectStats } from '../Types'
import { assertValidInterval, assertValidMaxAge, assertValidPrefix } from '../Utils/collector-errors'
import defaultLogger, { type ILogger } from '../Utils/logger'
import { makeMutex } from '../Utils/make-mutex'
import { sweepSessionDirectory } from './sweep-directory'

/**
 * Creates a garbage collector for a filesystem session store.
 *
 * The store writes one `session_*` file per session and never deletes
 * expired ones. The collector removes those whose modification time is
 * older than `maxAgeMs`, either on demand via `collect()` or every
 * `intervalMs` once `start()` is called.
 *
 * All sweeps, manual or scheduled, run one at a time. A scheduled tick
 * that fires while the previous scheduled sweep is still pending is
 * skipped rather than queued.
 *
 * @example
 * const gc = makeSessionCollector('/var/lib/app/sessions')
 * 	.setMaxAge(12 * 60 * 60 * 1000)
 * 	.setInterval(30 * 60 * 1000)
 * 	.start()
 *
 * // on shutdown
 * gc.stop()
 *
 * @param directory - directory holding the session files, not checked until the first sweep
 * @param logger - structured logger, pino by default
 * @param config - overrides for the env-derived defaults
 */
export const makeSessionCollector = (
	directory: string,
	logger: ILogger = defaultLogger.child({ class: 'session-collector' }),
	config: Partial<SessionCollectorConfig> = {}
): SessionCollector => {
	const settings: SessionCollectorConfig = { ...DEFAULT_SESSION_COLLECTOR_CONFIG, ...config }
	assertValidMaxAge(settings.maxAgeMs)
	assertValidInterval(settings.intervalMs)
	assertValidPrefix(settings.prefix)

	let { maxAgeMs, intervalMs } = settings
	const { prefix } = settings

	const sweepMutex = makeMutex()
	let schedule: ReturnType<typeof setInterval> | null = null
	// schedules whose last tick is still queued or running
	const pendingSchedules = new Set<ReturnType<typeof setInterval>>()

	const stats = {
		lastCollectAt: 0,
		totalCollections: 0,
		totalDeleted: 0,
		skippedTicks: 0
	}

	const runSweep = async (sweepMaxAgeMs: number): Promise<SessionCollectStats> => {
		const result = await sweepSessionDirectory({ directory, maxAgeMs: sweepMaxAgeMs, prefix, logger })

		stats.lastCollectAt = Date.now()
		stats.totalCollections++
		stats.totalDeleted += result.totalDeleted

		logger.debug({ directory, maxAgeMs: sweepMaxAgeMs, ...result }, 'session collection finished')
		return result
	}

	/**
	 * Queued on every tick of `handle`. Dropped once the collector has been
	 * stopped or restarted with a different schedule.
	 */
	const onTick = (handle: ReturnType<typeof setInterval>) => {
		if (pendingSchedules.has(handle)) {
			stats.skippedTicks++
			logger.debug({ directory }, 'previous scheduled collection still pending, skipping tick')
			return
		}

		pendingSchedules.add(handle)
		const sweepMaxAgeMs = maxAgeMs
		sweepMutex
			.mutex(async () => {
				if (schedule !== handle) {
					return
				}

				await runSweep(sweepMaxAgeMs)
			})
			.finally(() => {
				pendingSchedules.delete(handle)
			})
			.catch(error => {
				logger.warn({ error, directory }, 'scheduled session collection failed')
			})
	}

	const collector: SessionCollector = {
		directory,

		setMaxAge(newMaxAgeMs) {
			assertValidMaxAge(newMaxAgeMs)
			maxAgeMs = newMaxAgeMs
			return collector
		},

		setInterval(newIntervalMs) {
			assertValidInterval(newIntervalMs)
			intervalMs = newIntervalMs
			return collector
		},

		start() {
			if (schedule) {
				return collector
			}

			const handle = setInterval(() => onTick(handle), intervalMs)
			// never hold the host process open
			handle.unref()
			schedule = handle

			logger.info({ directory, intervalMs, maxAgeMs, prefix }, 'session collector started')

			return collector
		},

		stop() {
			if (!schedule) {
				return
			}

			clearInterval(schedule)
			schedule = null
			logger.info({ directory }, 'session collector stopped')
		},

		collect() {
			// the age threshold in force when the sweep was requested
			const sweepMaxAgeMs = maxAgeMs
			return sweepMutex.mutex(() => runSweep(sweepMaxAgeMs))
		},

		isRunning() {
			return schedule !== null
		},

		getStats() {
			return {
				directory,
				running: schedule !== null,
				collecting: sweepMutex.isLocked(),
				maxAgeMs,
				intervalMs,
				prefix,
				...stats
			}
		}
	}

	return collector
}
