import { z } from 'zod'
import { ProviderError } from '../types/errors.js'
import type { ImageGenerator } from './capabilities.js'
import type { OpenAIHttpClient } from './openai.js'

const ImageResponseSchema = z.object({
	data: z.array(z.object({ url: z.string().url() })).min(1),
})

export interface ImageOptions {
	model: string
	size: string
	quality: 'standard' | 'hd'
}

export class DalleImageGenerator implements ImageGenerator {
	constructor(
		private readonly client: OpenAIHttpClient,
		private readonly options: ImageOptions
	) {}

	async generate(prompt: string): Promise<string> {
		const json = await this.client.postJson('/images/generations', {
			model: this.options.model,
			prompt,
			n: 1,
			size: this.options.size,
			quality: this.options.quality,
		})
		const parsed = ImageResponseSchema.safeParse(json)
		if (!parsed.success) {
			throw new ProviderError('Image response has no URL', 'openai', {
				malformed: true,
			})
		}
		return parsed.data.data[0].url
	}
}
