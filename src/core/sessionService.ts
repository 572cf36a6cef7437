import type { SessionStore } from '../db/store.js'
import {
	ImageGenerationError,
	NotFoundError,
	PreconditionError,
	ValidationError,
} from '../types/errors.js'
import type { Reframing } from '../types/reframing.js'
import type { DreamSession, GeneratedImagePair } from '../types/session.js'
import { logger as rootLogger, type Logger } from '../util/logger.js'
import type { DreamPipeline, InterpretOutcome } from './pipeline.js'

export interface InterpretResult {
	session: DreamSession
	images: GeneratedImagePair
}

export interface ReframeResult {
	session: DreamSession
	reframing: Reframing
}

/**
 * Boundary between transport and pipeline: loads the session, enforces stage
 * preconditions against the persisted state and commits each stage's result.
 * A stage that fails writes nothing, except that an interpretation whose
 * images failed is still kept (without an image pair).
 */
export class DreamSessionService {
	constructor(
		private readonly pipeline: DreamPipeline,
		private readonly store: SessionStore
	) {}

	async createFromAudio(
		audio: Buffer,
		log: Logger = rootLogger
	): Promise<DreamSession> {
		const dreamText = await this.pipeline.transcribe(audio, log)
		const session = await this.store.create(dreamText)
		log.info({ sessionId: session.id }, 'Dream session created from audio')
		return session
	}

	async createFromText(
		text: string,
		log: Logger = rootLogger
	): Promise<DreamSession> {
		const dreamText = text.trim()
		if (!dreamText) throw new ValidationError('Dream text is empty')

		const session = await this.store.create(dreamText)
		log.info({ sessionId: session.id }, 'Dream session created from text')
		return session
	}

	async get(id: string): Promise<DreamSession> {
		const session = await this.store.get(id)
		if (!session) {
			throw new NotFoundError(`Session ${id} not found`, { sessionId: id })
		}
		return session
	}

	async interpret(
		id: string,
		log: Logger = rootLogger
	): Promise<InterpretResult> {
		const session = await this.get(id)
		if (!session.dreamText.trim()) {
			throw new PreconditionError(
				`Dream text missing for session ${id}`,
				'created',
				{ sessionId: id }
			)
		}

		let outcome: InterpretOutcome
		try {
			outcome = await this.pipeline.interpret(session.dreamText, log)
		} catch (err) {
			if (err instanceof ImageGenerationError) {
				await this.commitInterpretation(id, err, log)
			}
			throw err
		}

		const images: GeneratedImagePair = {
			originalUrl: outcome.originalImageUrl,
			healingUrl: outcome.healingImageUrl,
		}
		const updated = await this.store.saveInterpretation(
			id,
			outcome.interpretation,
			images
		)
		if (!updated) {
			throw new NotFoundError(`Session ${id} disappeared`, { sessionId: id })
		}

		log.info(
			{ sessionId: id, imageRuns: updated.generatedImages.length },
			'Interpretation stored'
		)
		return { session: updated, images }
	}

	async reframe(id: string, log: Logger = rootLogger): Promise<ReframeResult> {
		const session = await this.get(id)
		if (!session.interpretation) {
			log.warn({ sessionId: id }, 'Reframe requested before interpretation')
			throw new PreconditionError(
				`Interpretation must be performed for session ${id} before reframing`,
				'interpreted',
				{ sessionId: id }
			)
		}

		const reframing = await this.pipeline.reframe(
			session.dreamText,
			session.interpretation,
			log
		)
		const updated = await this.store.saveReframing(id, reframing)
		if (!updated) {
			throw new NotFoundError(`Session ${id} disappeared`, { sessionId: id })
		}

		log.info({ sessionId: id }, 'Reframing stored')
		return { session: updated, reframing }
	}

	// Partial success: keep the interpretation, record no image pair.
	// Never throws; the caller rethrows the image error, which carries the interpretation.
	private async commitInterpretation(
		id: string,
		err: ImageGenerationError,
		log: Logger
	): Promise<void> {
		let updated: DreamSession | null
		try {
			updated = await this.store.saveInterpretation(id, err.interpretation, null)
		} catch (storeErr) {
			log.error(
				{ err: storeErr, sessionId: id },
				'Failed to store interpretation after image failure'
			)
			return
		}

		if (!updated) {
			log.warn(
				{ sessionId: id },
				'Session disappeared before interpretation could be stored'
			)
			return
		}
		log.warn(
			{ sessionId: id, failed: err.failed },
			'Interpretation stored without images'
		)
	}
}
