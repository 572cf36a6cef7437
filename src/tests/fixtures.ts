// Shared test data and in-process stand-ins for the external capabilities
import { createServer, type RequestListener } from 'http'
import { vi } from 'vitest'
import type {
	ChatPrompt,
	Embedder,
	ImageGenerator,
	LanguageModel,
	ResponseFormat,
	SpeechToText,
} from '../core/capabilities.js'
import { InterpretationEngine } from '../core/interpreter.js'
import { DreamPipeline } from '../core/pipeline.js'
import { ReframingEngine } from '../core/reframer.js'
import { RetrievalService } from '../core/retrieval.js'
import { InMemoryVectorIndex } from '../rag/memoryIndex.js'
import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'

export function makeInterpretation(
	overrides: Partial<Interpretation> = {}
): Interpretation {
	return {
		summary: 'The dreamer flies over snowy mountains at dawn.',
		keywords: ['flying', 'mountains', 'dawn'],
		symbolism_analysis: 'Flying often stands for freedom and perspective.',
		emotional_context: 'Mostly joyful, with a flicker of fear of falling.',
		potential_implications: 'A wish to rise above current daily pressures.',
		image_prompt_original: 'a lone figure soaring over jagged snowy peaks at dawn',
		image_prompt_healing: 'a figure gliding calmly over sunlit mountains',
		...overrides,
	}
}

export function makeReframing(overrides: Partial<Reframing> = {}): Reframing {
	return {
		explanation: 'Imagery rescripting changes a distressing dream image while awake.',
		negative_elements_identified: ['fear of falling'],
		rescripting_suggestions: [
			{
				element: 'fear of falling',
				original_image_description: 'the wind suddenly drops and the dreamer dips',
				new_image_suggestion: 'a warm updraft lifts the dreamer gently higher',
			},
		],
		actionable_insights: 'Rehearse the new image for a few minutes before sleep.',
		...overrides,
	}
}

export function stubSpeech(transcript = 'I dreamed of flying over mountains.') {
	return {
		transcribe: vi.fn(async (_audio: Buffer) => transcript),
	} satisfies SpeechToText
}

// Replies are consumed in order; the last one repeats
export function stubModel(...replies: string[]) {
	let call = 0
	return {
		complete: vi.fn(async (_prompt: ChatPrompt, _format: ResponseFormat) => {
			const reply = replies[Math.min(call, replies.length - 1)]
			call++
			return reply
		}),
	} satisfies LanguageModel
}

export function stubImages() {
	let n = 0
	return {
		generate: vi.fn(async (_prompt: string) => {
			n++
			return `https://images.test/${n}.png`
		}),
	} satisfies ImageGenerator
}

// Deterministic bag-of-letters embedding, enough to rank texts by overlap
export function letterEmbedder() {
	return {
		embed: vi.fn(async (text: string) => {
			const vector = new Array<number>(26).fill(0)
			for (const ch of text.toLowerCase()) {
				const i = ch.charCodeAt(0) - 97
				if (i >= 0 && i < 26) vector[i]++
			}
			return vector
		}),
	} satisfies Embedder
}

export interface PipelineStubs {
	speech?: SpeechToText
	model?: LanguageModel
	images?: ImageGenerator
	embedder?: Embedder
	index?: InMemoryVectorIndex
	retrievalK?: number
}

export function buildTestPipeline(stubs: PipelineStubs = {}): DreamPipeline {
	const model =
		stubs.model ??
		stubModel(JSON.stringify(makeInterpretation()), JSON.stringify(makeReframing()))
	return new DreamPipeline({
		speechToText: stubs.speech ?? stubSpeech(),
		retrieval: new RetrievalService(
			stubs.embedder ?? letterEmbedder(),
			stubs.index ?? new InMemoryVectorIndex()
		),
		interpreter: new InterpretationEngine(model),
		reframer: new ReframingEngine(model),
		images: stubs.images ?? stubImages(),
		retrievalK: stubs.retrievalK ?? 3,
	})
}

export interface LocalServer {
	url: string
	close(): Promise<void>
}

// Plain HTTP server on an ephemeral loopback port, for transport-level behaviour
export async function startLocalServer(handler: RequestListener): Promise<LocalServer> {
	const server = createServer(handler)
	await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve))

	const address = server.address()
	if (!address || typeof address === 'string') throw new Error('Server has no port')

	return {
		url: `http://127.0.0.1:${address.port}`,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.closeAllConnections()
				server.close(err => (err ? reject(err) : resolve()))
			}),
	}
}
