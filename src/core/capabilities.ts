// Contracts of the external capabilities the pipeline consumes.
// Adapters live next to this file; tests substitute in-process stubs.

export interface SpeechToText {
	transcribe(audio: Buffer): Promise<string>
}

export interface Embedder {
	embed(text: string): Promise<number[]>
}

export interface ScoredChunk {
	text: string
	score: number
}

export interface VectorIndex {
	/** Nearest-first, at most `k` entries */
	query(vector: number[], k: number): Promise<ScoredChunk[]>
}

export interface IndexPoint {
	id: number
	vector: number[]
	text: string
	source: string
	chunk: number
}

export interface WritableVectorIndex extends VectorIndex {
	/** Empties the collection and fixes its vector dimension */
	resetCollection(dimension: number): Promise<void>
	upsert(points: IndexPoint[]): Promise<void>
}

export interface ChatPrompt {
	system: string
	user: string
}

export type ResponseFormat = 'json' | 'text'

export interface LanguageModel {
	/** Raw reply text; parsing is the caller's job */
	complete(prompt: ChatPrompt, responseFormat: ResponseFormat): Promise<string>
}

export interface ImageGenerator {
	/** URL of the generated image */
	generate(prompt: string): Promise<string>
}
