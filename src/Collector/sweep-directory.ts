import { lstat, readdir, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import type { SessionCollectStats } from '../Types'
import { makeDirectoryAccessError } from '../Utils/collector-errors'
import type { ILogger } from '../Utils/logger'

export interface SweepOptions {
	directory: string
	maxAgeMs: number
	prefix: string
	logger: ILogger
}

const listEntries = async (directory: string) => {
	try {
		return await readdir(directory, { withFileTypes: true })
	} catch (error) {
		throw makeDirectoryAccessError(directory, error)
	}
}

/**
 * One pass over the session directory.
 *
 * Every entry that is not a directory, carries the session prefix and was
 * last modified more than `maxAgeMs` ago is unlinked. Entries that vanish
 * or refuse to be removed are counted and skipped; only a directory that
 * cannot be listed rejects.
 */
export const sweepSessionDirectory = async ({
	directory,
	maxAgeMs,
	prefix,
	logger
}: SweepOptions): Promise<SessionCollectStats> => {
	const startTime = Date.now()
	const entries = await listEntries(directory)

	// one clock reading for the whole pass
	const now = Date.now()
	const stats: SessionCollectStats = {
		totalScanned: entries.length,
		candidates: 0,
		totalDeleted: 0,
		errors: 0,
		durationMs: 0
	}

	for (const entry of entries) {
		if (entry.isDirectory() || !entry.name.startsWith(prefix)) {
			continue
		}

		stats.candidates++
		const path = join(directory, entry.name)

		let modifiedAtMs: number
		try {
			modifiedAtMs = (await lstat(path)).mtimeMs
		} catch (error) {
			// removed by someone else after listing
			logger.debug({ error, path }, 'session file disappeared before stat')
			stats.errors++
			continue
		}

		const ageMs = now - modifiedAtMs
		if (ageMs <= maxAgeMs) {
			continue
		}

		try {
			await unlink(path)
			stats.totalDeleted++
			logger.trace({ path, ageMs }, 'removed expired session file')
		} catch (error) {
			logger.debug({ error, path }, 'failed to remove expired session file')
			stats.errors++
		}
	}

	stats.durationMs = Date.now() - startTime
	return stats
}
