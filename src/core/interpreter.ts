import { InterpretationError, originOf } from '../types/errors.js'
import {
	InterpretationSchema,
	type Interpretation,
} from '../types/interpretation.js'
import { logger as rootLogger, type Logger } from '../util/logger.js'
import { trackCapabilityCall } from '../util/metrics.js'
import type { LanguageModel } from './capabilities.js'
import { logPromptUsage } from './promptVersioning.js'
import { buildInterpretationPrompt, INTERPRETATION_PROMPT } from './prompts.js'
import { parseStructuredReply } from './structured.js'

export class InterpretationEngine {
	constructor(private readonly model: LanguageModel) {}

	async interpret(
		dreamText: string,
		context: string[],
		log: Logger = rootLogger
	): Promise<Interpretation> {
		const prompt = buildInterpretationPrompt(dreamText, context)
		logPromptUsage(INTERPRETATION_PROMPT, log, 'interpret', {
			contextChunks: context.length,
		})

		let reply: string
		try {
			reply = await trackCapabilityCall(
				'language_model',
				this.model.complete(prompt, 'json')
			)
		} catch (err) {
			throw new InterpretationError(
				'Language model call failed during interpretation',
				originOf(err),
				undefined,
				{ cause: err }
			)
		}

		const parsed = parseStructuredReply(reply, InterpretationSchema)
		if (!parsed.success) {
			log.warn({ reason: parsed.reason }, 'Malformed interpretation reply')
			throw new InterpretationError(
				`Malformed interpretation reply: ${parsed.reason}`,
				'parse',
				{ replyLength: reply.length }
			)
		}
		return parsed.data
	}
}
