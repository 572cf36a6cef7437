import type {
	IndexPoint,
	ScoredChunk,
	WritableVectorIndex,
} from '../core/capabilities.js'

export function cosineSimilarity(a: number[], b: number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`)
	}
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/**
 * Brute-force cosine index. Ties keep insertion order, so results are
 * deterministic for a fixed index and query.
 */
export class InMemoryVectorIndex implements WritableVectorIndex {
	private readonly points = new Map<number, IndexPoint>()
	private dimension: number | null = null

	async resetCollection(dimension: number): Promise<void> {
		this.points.clear()
		this.dimension = dimension
	}

	async upsert(points: IndexPoint[]): Promise<void> {
		for (const point of points) {
			if (this.dimension !== null && point.vector.length !== this.dimension) {
				throw new Error(
					`Point ${point.id} has dimension ${point.vector.length}, index expects ${this.dimension}`
				)
			}
			this.points.set(point.id, point)
		}
	}

	async query(vector: number[], k: number): Promise<ScoredChunk[]> {
		return [...this.points.values()]
			.map((point, order) => ({
				text: point.text,
				score: cosineSimilarity(vector, point.vector),
				order,
			}))
			.sort((a, b) => b.score - a.score || a.order - b.order)
			.slice(0, Math.max(0, k))
			.map(({ text, score }) => ({ text, score }))
	}

	get size(): number {
		return this.points.size
	}
}
