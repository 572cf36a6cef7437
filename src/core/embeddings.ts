import { z } from 'zod'
import { ProviderError } from '../types/errors.js'
import type { Embedder } from './capabilities.js'
import type { OpenAIHttpClient } from './openai.js'

const EmbeddingResponseSchema = z.object({
	data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
})

/**
 * Embeddings over the OpenAI-compatible /embeddings endpoint.
 * Used by both the corpus indexer and request-time retrieval, so the
 * same model must be configured for both.
 */
export class OpenAIEmbedder implements Embedder {
	constructor(
		private readonly client: OpenAIHttpClient,
		private readonly model: string
	) {}

	async embed(text: string): Promise<number[]> {
		const json = await this.client.postJson('/embeddings', {
			model: this.model,
			input: text,
		})
		const parsed = EmbeddingResponseSchema.safeParse(json)
		if (!parsed.success) {
			throw new ProviderError(
				`Unexpected embedding response format: ${JSON.stringify(json).slice(0, 200)}`,
				'openai',
				{ malformed: true }
			)
		}
		return parsed.data.data[0].embedding
	}
}
