import { originOf, ReframingError } from '../types/errors.js'
import type { Interpretation } from '../types/interpretation.js'
import { ReframingSchema, type Reframing } from '../types/reframing.js'
import { logger as rootLogger, type Logger } from '../util/logger.js'
import { trackCapabilityCall } from '../util/metrics.js'
import type { LanguageModel } from './capabilities.js'
import { logPromptUsage } from './promptVersioning.js'
import { buildReframingPrompt, REFRAMING_PROMPT } from './prompts.js'
import { parseStructuredReply } from './structured.js'

// Imagery rescripting pass over an already interpreted dream
export class ReframingEngine {
	constructor(private readonly model: LanguageModel) {}

	async reframe(
		dreamText: string,
		interpretation: Interpretation,
		log: Logger = rootLogger
	): Promise<Reframing> {
		logPromptUsage(REFRAMING_PROMPT, log, 'reframe')

		let reply: string
		try {
			reply = await trackCapabilityCall(
				'language_model',
				this.model.complete(buildReframingPrompt(dreamText, interpretation), 'json')
			)
		} catch (err) {
			throw new ReframingError(
				'Language model call failed during reframing',
				originOf(err),
				undefined,
				{ cause: err }
			)
		}

		const parsed = parseStructuredReply(reply, ReframingSchema)
		if (!parsed.success) {
			log.warn({ reason: parsed.reason }, 'Malformed reframing reply')
			throw new ReframingError(
				`Malformed reframing reply: ${parsed.reason}`,
				'parse',
				{ replyLength: reply.length }
			)
		}
		return parsed.data
	}
}
