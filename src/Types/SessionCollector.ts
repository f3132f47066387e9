/**
 * Session collector configuration
 */
export interface SessionCollectorConfig {
	/** files whose mtime is older than this are deleted */
	maxAgeMs: number
	/** period of the automatic sweep, read at start() */
	intervalMs: number
	/** only directory entries whose name starts with this are considered */
	prefix: string
}

/**
 * Result of a single sweep
 */
export interface SessionCollectStats {
	/** entries listed in the directory */
	totalScanned: number
	/** non-directory entries carrying the session prefix */
	candidates: number
	totalDeleted: number
	/** entries that vanished or could not be removed */
	errors: number
	durationMs: number
}

/**
 * Lifetime counters of a collector instance
 */
export interface SessionCollectorStats {
	directory: string
	running: boolean
	collecting: boolean
	maxAgeMs: number
	intervalMs: number
	prefix: string
	/** unix ms of the last completed sweep, 0 if none */
	lastCollectAt: number
	totalCollections: number
	totalDeleted: number
	/** ticks dropped because the previous scheduled sweep had not finished */
	skippedTicks: number
}

export interface SessionCollector {
	readonly directory: string
	setMaxAge(maxAgeMs: number): SessionCollector
	setInterval(intervalMs: number): SessionCollector
	start(): SessionCollector
	stop(): void
	collect(): Promise<SessionCollectStats>
	isRunning(): boolean
	getStats(): SessionCollectorStats
}
