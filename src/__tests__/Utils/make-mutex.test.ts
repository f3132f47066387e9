import { makeMutex } from '../../Utils/make-mutex'

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

describe('makeMutex', () => {
	it('should run tasks one at a time in call order', async () => {
		const { mutex } = makeMutex()
		const events: string[] = []

		const task = (name: string, ms: number) =>
			mutex(async () => {
				events.push(`${name}:start`)
				await delay(ms)
				events.push(`${name}:end`)
				return name
			})

		const results = await Promise.all([task('a', 30), task('b', 0), task('c', 10)])

		expect(results).toEqual(['a', 'b', 'c'])
		expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
	})

	it('should hand a rejection to its caller and keep the queue going', async () => {
		const { mutex } = makeMutex()

		const failing = mutex(async () => {
			throw new Error('boom')
		})
		const next = mutex(() => 42)

		await expect(failing).rejects.toThrow('boom')
		await expect(next).resolves.toBe(42)
	})

	it('should report whether work is pending', async () => {
		const { mutex, isLocked } = makeMutex()

		expect(isLocked()).toBe(false)
		const running = mutex(() => delay(10))
		expect(isLocked()).toBe(true)
		await running
		expect(isLocked()).toBe(false)
	})
})
