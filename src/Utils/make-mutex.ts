/**
 * Serializes async tasks in call order.
 * A task that throws rejects only its own caller; the queue keeps draining.
 */
export const makeMutex = () => {
	let tail: Promise<void> = Promise.resolve()
	let pending = 0

	return {
		mutex<T>(code: () => Promise<T> | T): Promise<T> {
			pending += 1
			const run = tail.then(code).finally(() => {
				pending -= 1
			})
			// the rejection belongs to the caller holding `run`
			tail = run.then(
				() => undefined,
				() => undefined
			)
			return run
		},
		/** true while a task is running or waiting for its turn */
		isLocked(): boolean {
			return pending > 0
		}
	}
}

export type Mutex = ReturnType<typeof makeMutex>
