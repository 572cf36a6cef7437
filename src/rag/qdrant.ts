/**
 * Qdrant REST client for the knowledge corpus collection.
 *
 * Written by the offline indexer, read-only while serving requests.
 */
import { z } from 'zod'
import type {
	IndexPoint,
	ScoredChunk,
	WritableVectorIndex,
} from '../core/capabilities.js'
import { ProviderError } from '../types/errors.js'
import { fetchWithTimeout, safeJson, type TimedResponse } from '../util/http.js'

const SearchResponseSchema = z.object({
	result: z.array(
		z.object({
			score: z.number(),
			payload: z.object({ text: z.string() }).passthrough(),
		})
	),
})

const PROVIDER = 'qdrant'

export class QdrantIndex implements WritableVectorIndex {
	constructor(
		private readonly baseUrl: string,
		private readonly collection: string,
		private readonly timeoutMs = 10000
	) {}

	private send(
		path: string,
		options: { method?: string; body?: unknown } = {}
	): Promise<TimedResponse> {
		return fetchWithTimeout(`${this.baseUrl}${path}`, {
			method: options.method || 'GET',
			headers: { 'Content-Type': 'application/json' },
			body: options.body === undefined ? undefined : JSON.stringify(options.body),
			timeoutMs: this.timeoutMs,
			provider: PROVIDER,
		})
	}

	private async request(
		path: string,
		options: { method?: string; body?: unknown } = {}
	): Promise<TimedResponse> {
		const res = await this.send(path, options)
		if (!res.ok) {
			throw new ProviderError(
				`Qdrant ${options.method || 'GET'} ${path}: ${res.status} ${res.body.slice(0, 400)}`,
				PROVIDER,
				{ status: res.status }
			)
		}
		return res
	}

	/** Drop the collection if present and create it empty (cosine distance). */
	async resetCollection(dimension: number): Promise<void> {
		const path = `/collections/${this.collection}`
		const dropped = await this.send(path, { method: 'DELETE' })
		if (!dropped.ok && dropped.status !== 404) {
			throw new ProviderError(
				`Qdrant DELETE ${path}: ${dropped.status}`,
				PROVIDER,
				{ status: dropped.status }
			)
		}
		await this.request(path, {
			method: 'PUT',
			body: { vectors: { size: dimension, distance: 'Cosine' } },
		})
	}

	async upsert(points: IndexPoint[]): Promise<void> {
		if (points.length === 0) return
		await this.request(`/collections/${this.collection}/points?wait=true`, {
			method: 'PUT',
			body: {
				points: points.map(p => ({
					id: p.id,
					vector: p.vector,
					payload: { text: p.text, source: p.source, chunk: p.chunk },
				})),
			},
		})
	}

	async query(vector: number[], k: number): Promise<ScoredChunk[]> {
		const res = await this.request(
			`/collections/${this.collection}/points/search`,
			{
				method: 'POST',
				body: { vector, limit: k, with_payload: true },
			}
		)
		const data = SearchResponseSchema.safeParse(safeJson(res.body))
		if (!data.success) {
			throw new ProviderError('Unexpected Qdrant search response', PROVIDER, {
				status: res.status,
				malformed: true,
			})
		}

		return data.data.result
			.map(r => ({ text: r.payload.text, score: r.score }))
			.sort((a, b) => b.score - a.score)
			.slice(0, k)
	}
}
