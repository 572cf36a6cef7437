// src/types/errors.ts
import type { Interpretation } from './interpretation.js'
import type { SessionStage } from './session.js'
import { logger } from '../util/logger.js'

export abstract class DomainError extends Error {
	abstract readonly code: string
	abstract readonly userMessage: string

	constructor(
		message: string,
		public readonly context?: Record<string, unknown>,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = this.constructor.name
	}
}

export class NotFoundError extends DomainError {
	readonly code = 'SESSION_NOT_FOUND'
	readonly userMessage = 'The requested dream session does not exist.'
}

const STAGE_HINTS: Record<SessionStage, string> = {
	created: 'Create the session from a dream recording first.',
	interpreted: 'Run the interpretation stage for this session first.',
	reframed: 'Run the reframing stage for this session first.',
}

export class PreconditionError extends DomainError {
	readonly code = 'STAGE_PRECONDITION_FAILED'
	readonly userMessage: string

	constructor(
		message: string,
		public readonly requiredStage: SessionStage,
		context?: Record<string, unknown>
	) {
		super(message, { ...context, requiredStage })
		this.userMessage = STAGE_HINTS[requiredStage]
	}
}

export class ValidationError extends DomainError {
	readonly code = 'VALIDATION_ERROR'
	readonly userMessage = 'The request is invalid. Check the submitted data.'
}

export interface ProviderFailure {
	status?: number
	timedOut?: boolean
	// The provider answered, but with a body of the wrong shape
	malformed?: boolean
}

// Raised by capability adapters; stages wrap it into their own error
export class ProviderError extends DomainError {
	readonly code = 'PROVIDER_ERROR'
	readonly userMessage = 'An upstream AI service is unavailable. Please try again later.'

	constructor(
		message: string,
		public readonly provider: string,
		public readonly details: ProviderFailure = {},
		options?: { cause?: unknown }
	) {
		super(message, { provider, ...details }, options)
	}

	get timedOut(): boolean {
		return this.details.timedOut === true
	}

	get malformed(): boolean {
		return this.details.malformed === true
	}
}

// Where a stage failure came from: the provider call itself, its timeout,
// or local parsing of the provider's reply
export type FailureOrigin = 'provider' | 'timeout' | 'parse'

export function originOf(error: unknown): FailureOrigin {
	if (error instanceof ProviderError) {
		if (error.timedOut) return 'timeout'
		if (error.malformed) return 'parse'
	}
	return 'provider'
}

export abstract class StageError extends DomainError {
	readonly userMessage =
		'The dream service is temporarily unavailable. Please try again later.'

	constructor(
		message: string,
		public readonly origin: FailureOrigin,
		context?: Record<string, unknown>,
		options?: { cause?: unknown }
	) {
		super(message, { ...context, origin }, options)
	}
}

export class TranscriptionError extends StageError {
	readonly code = 'TRANSCRIPTION_FAILED'
}

export class InterpretationError extends StageError {
	readonly code = 'INTERPRETATION_FAILED'
}

export class ReframingError extends StageError {
	readonly code = 'REFRAMING_FAILED'
}

export type ImageKind = 'original' | 'healing'

// Interpretation succeeded but imagery did not; the interpretation travels with the error
export class ImageGenerationError extends StageError {
	readonly code = 'IMAGE_GENERATION_FAILED'

	constructor(
		message: string,
		origin: FailureOrigin,
		public readonly interpretation: Interpretation,
		public readonly failed: ImageKind[],
		options?: { cause?: unknown }
	) {
		super(message, origin, { failed }, options)
	}
}

export function mapErrorToUserMessage(error: Error): string {
	if (error instanceof DomainError) {
		return error.userMessage
	}

	logger.error({ err: error }, 'Unmapped error occurred')
	return 'An internal error occurred. Please try again later.'
}
