import { z } from 'zod'
import { ProviderError } from '../types/errors.js'
import type { SpeechToText } from './capabilities.js'
import type { OpenAIHttpClient } from './openai.js'

const TranscriptionResponseSchema = z.object({ text: z.string() })

// The file name matters to the provider: its extension selects the decoder
const AUDIO_FILE_NAME = 'dream_audio.wav'

export class WhisperSpeechToText implements SpeechToText {
	constructor(
		private readonly client: OpenAIHttpClient,
		private readonly model: string
	) {}

	async transcribe(audio: Buffer): Promise<string> {
		const form = new FormData()
		form.append('model', this.model)
		form.append('file', new Blob([new Uint8Array(audio)]), AUDIO_FILE_NAME)

		const json = await this.client.postForm('/audio/transcriptions', form)
		const parsed = TranscriptionResponseSchema.safeParse(json)
		if (!parsed.success) {
			throw new ProviderError('Transcription response has no text', 'openai', {
				malformed: true,
			})
		}
		return parsed.data.text
	}
}
