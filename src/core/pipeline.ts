// src/core/pipeline.ts
import {
	ImageGenerationError,
	originOf,
	PreconditionError,
	TranscriptionError,
	ValidationError,
	type ImageKind,
} from '../types/errors.js'
import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'
import { logger as rootLogger, type Logger } from '../util/logger.js'
import { trackCapabilityCall, trackStage } from '../util/metrics.js'
import type { ImageGenerator, SpeechToText } from './capabilities.js'
import type { InterpretationEngine } from './interpreter.js'
import type { ReframingEngine } from './reframer.js'
import type { RetrievalService } from './retrieval.js'

export const HEALING_PROMPT_PREFIX =
	'A peaceful, positive, hopeful, and healing interpretation of: '

// Pure and deterministic; never delegated to the model
export function healingImagePrompt(interpretation: Interpretation): string {
	return HEALING_PROMPT_PREFIX + interpretation.image_prompt_healing
}

export interface PipelineDeps {
	speechToText: SpeechToText
	retrieval: RetrievalService
	interpreter: InterpretationEngine
	reframer: ReframingEngine
	images: ImageGenerator
	retrievalK: number
}

export interface InterpretOutcome {
	interpretation: Interpretation
	originalImageUrl: string
	healingImageUrl: string
}

/**
 * Stage sequencing for a dream session. Stages take plain data and return
 * plain data or a typed failure; reading and writing the session record is
 * left to the caller. No retries happen here.
 */
export class DreamPipeline {
	constructor(private readonly deps: PipelineDeps) {}

	async transcribe(audio: Buffer, log: Logger = rootLogger): Promise<string> {
		if (audio.length === 0) {
			throw new ValidationError('Audio payload is empty')
		}

		log.info({ bytes: audio.length }, 'Stage transcribe: calling speech-to-text')
		let transcript: string
		try {
			transcript = await trackCapabilityCall(
				'transcription',
				this.deps.speechToText.transcribe(audio)
			)
		} catch (err) {
			trackStage('transcribe', 'error')
			throw new TranscriptionError(
				'Speech-to-text call failed',
				originOf(err),
				{ bytes: audio.length },
				{ cause: err }
			)
		}

		const dreamText = transcript.trim()
		if (!dreamText) {
			trackStage('transcribe', 'error')
			throw new TranscriptionError('Transcript is empty', 'parse', {
				bytes: audio.length,
			})
		}

		trackStage('transcribe', 'success')
		log.info({ chars: dreamText.length }, 'Stage transcribe: done')
		return dreamText
	}

	async interpret(
		dreamText: string,
		log: Logger = rootLogger
	): Promise<InterpretOutcome> {
		if (!dreamText.trim()) {
			throw new PreconditionError('Dream text is empty', 'created')
		}

		log.info('Stage interpret: retrieving related knowledge')
		const context = await this.deps.retrieval.retrieve(
			dreamText,
			this.deps.retrievalK,
			log
		)

		let interpretation: Interpretation
		try {
			interpretation = await this.deps.interpreter.interpret(dreamText, context, log)
		} catch (err) {
			trackStage('interpret', 'error')
			throw err
		}
		log.info(
			{ keywords: interpretation.keywords.length, contextChunks: context.length },
			'Stage interpret: interpretation ready, generating images'
		)

		const [original, healing] = await Promise.allSettled([
			trackCapabilityCall(
				'image_generation',
				this.deps.images.generate(interpretation.image_prompt_original)
			),
			trackCapabilityCall(
				'image_generation',
				this.deps.images.generate(healingImagePrompt(interpretation))
			),
		])

		if (original.status === 'rejected' || healing.status === 'rejected') {
			const failed: ImageKind[] = []
			let cause: unknown
			if (original.status === 'rejected') {
				failed.push('original')
				cause = original.reason
			}
			if (healing.status === 'rejected') {
				failed.push('healing')
				cause ??= healing.reason
			}

			trackStage('interpret', 'partial')
			log.error({ err: cause, failed }, 'Stage interpret: image generation failed')
			throw new ImageGenerationError(
				`Image generation failed for: ${failed.join(', ')}`,
				originOf(cause),
				interpretation,
				failed,
				{ cause }
			)
		}

		trackStage('interpret', 'success')
		log.info('Stage interpret: done')
		return {
			interpretation,
			originalImageUrl: original.value,
			healingImageUrl: healing.value,
		}
	}

	async reframe(
		dreamText: string,
		interpretation: Interpretation | null | undefined,
		log: Logger = rootLogger
	): Promise<Reframing> {
		if (!interpretation) {
			throw new PreconditionError(
				'Reframing requires an interpretation',
				'interpreted'
			)
		}

		log.info('Stage reframe: calling reframing engine')
		try {
			const reframing = await this.deps.reframer.reframe(
				dreamText,
				interpretation,
				log
			)
			trackStage('reframe', 'success')
			log.info(
				{ suggestions: reframing.rescripting_suggestions.length },
				'Stage reframe: done'
			)
			return reframing
		} catch (err) {
			trackStage('reframe', 'error')
			throw err
		}
	}
}
