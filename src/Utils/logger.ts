import P from 'pino'

export interface ILogger {
	level: string
	child(obj: Record<string, unknown>): ILogger
	trace(obj: unknown, msg?: string): void
	debug(obj: unknown, msg?: string): void
	info(obj: unknown, msg?: string): void
	warn(obj: unknown, msg?: string): void
	error(obj: unknown, msg?: string): void
}

export default P({
	level: process.env.SESSION_GC_LOG_LEVEL || 'info',
	timestamp: () => `,"time":"${new Date().toJSON()}"`
})
