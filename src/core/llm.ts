// src/core/llm.ts
import { z } from 'zod'
import { ProviderError } from '../types/errors.js'
import type {
	ChatPrompt,
	LanguageModel,
	ResponseFormat,
} from './capabilities.js'
import type { OpenAIHttpClient } from './openai.js'

const ChatCompletionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({ content: z.string().nullable() }),
			})
		)
		.min(1),
})

export interface ChatModelOptions {
	model: string
	temperature?: number
	maxTokens?: number
}

// ---- OpenAI chat completions ----
export class OpenAIChatModel implements LanguageModel {
	constructor(
		private readonly client: OpenAIHttpClient,
		private readonly options: ChatModelOptions
	) {}

	async complete(
		prompt: ChatPrompt,
		responseFormat: ResponseFormat
	): Promise<string> {
		const body = {
			model: this.options.model,
			messages: [
				{ role: 'system', content: prompt.system },
				{ role: 'user', content: prompt.user },
			],
			temperature: this.options.temperature ?? 0.7,
			max_tokens: this.options.maxTokens ?? 1500,
			...(responseFormat === 'json'
				? { response_format: { type: 'json_object' } }
				: {}),
		}

		const json = await this.client.postJson('/chat/completions', body)
		const parsed = ChatCompletionSchema.safeParse(json)
		const content = parsed.success ? parsed.data.choices[0].message.content : null
		if (!content) {
			throw new ProviderError('OpenAI: empty response', 'openai', {
				malformed: true,
			})
		}
		return content
	}
}
