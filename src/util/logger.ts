import pino from 'pino'
import type { Logger } from 'pino'
import { randomUUID } from 'crypto'

export type { Logger }

export const logger = pino({
	level: process.env.LOG_LEVEL || 'info',
	serializers: {
		err: pino.stdSerializers.err,
	},
	formatters: {
		level: label => ({ level: label }),
	},
})

export function createCorrelationId(): string {
	return randomUUID()
}

// Per-request child logger, passed down into pipeline stages and provider calls
export function getCorrelationLogger(
	correlationId: string,
	additionalContext?: Record<string, unknown>
): Logger {
	return logger.child({
		correlationId,
		...additionalContext,
	})
}
