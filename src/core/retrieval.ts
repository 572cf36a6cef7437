import { logger as rootLogger, type Logger } from '../util/logger.js'
import { trackCapabilityCall, trackRetrievalDegraded } from '../util/metrics.js'
import type { Embedder, VectorIndex } from './capabilities.js'

/**
 * Top-k knowledge retrieval for the interpretation prompt.
 *
 * Never fails: an unreachable embedder or index, or an empty index, yields an
 * empty list and a logged "retrieval degraded" event, so interpretation can
 * still run on the dream text alone.
 */
export class RetrievalService {
	constructor(
		private readonly embedder: Embedder,
		private readonly index: VectorIndex
	) {}

	async retrieve(
		query: string,
		k: number,
		log: Logger = rootLogger
	): Promise<string[]> {
		if (k <= 0 || !query.trim()) return []

		let chunks: string[]
		try {
			const vector = await trackCapabilityCall(
				'embedding',
				this.embedder.embed(query)
			)
			const hits = await trackCapabilityCall(
				'vector_index',
				this.index.query(vector, k)
			)
			chunks = hits.slice(0, k).map(hit => hit.text)
		} catch (err) {
			trackRetrievalDegraded('unavailable')
			log.warn({ err, k }, 'Retrieval degraded: index unavailable')
			return []
		}

		if (chunks.length === 0) {
			trackRetrievalDegraded('empty')
			log.warn({ k }, 'Retrieval degraded: no chunks found')
		} else if (chunks.length < k) {
			trackRetrievalDegraded('partial')
			log.info(
				{ k, found: chunks.length },
				'Retrieval degraded: fewer chunks than requested'
			)
		} else {
			log.debug({ k }, 'Retrieval complete')
		}
		return chunks
	}
}
