import { readdir, readFile } from 'fs/promises'
import { join } from 'path'
import type {
	Embedder,
	IndexPoint,
	WritableVectorIndex,
} from '../core/capabilities.js'
import { logger as rootLogger, type Logger } from '../util/logger.js'
import { splitText } from './chunker.js'

export interface CorpusDocument {
	source: string
	text: string
}

export interface IndexCorpusOptions {
	embedder: Embedder
	index: WritableVectorIndex
	chunkSize: number
	chunkOverlap: number
	batchSize?: number
	log?: Logger
}

export interface IndexSummary {
	documents: number
	chunks: number
}

// Visible *.txt files only, in name order so point ids are stable across runs.
// A file that cannot be read is logged and skipped.
export async function loadKnowledgeBase(
	dir: string,
	log: Logger = rootLogger
): Promise<CorpusDocument[]> {
	const entries = await readdir(dir)
	const files = entries
		.filter(name => name.endsWith('.txt') && !name.startsWith('.'))
		.sort()

	const documents: CorpusDocument[] = []
	for (const name of files) {
		try {
			documents.push({
				source: name,
				text: await readFile(join(dir, name), 'utf-8'),
			})
		} catch (err) {
			log.error({ err, source: name }, 'Skipping unreadable knowledge file')
		}
	}
	return documents
}

export async function indexCorpus(
	documents: CorpusDocument[],
	options: IndexCorpusOptions
): Promise<IndexSummary> {
	const log = options.log ?? rootLogger
	const batchSize = options.batchSize ?? 64

	const chunks = documents.flatMap(doc =>
		splitText(doc.text, {
			chunkSize: options.chunkSize,
			chunkOverlap: options.chunkOverlap,
		}).map((text, chunk) => ({ source: doc.source, chunk, text }))
	)

	if (chunks.length === 0) {
		log.warn(
			{ documents: documents.length },
			'No text chunks found, vector index not built'
		)
		return { documents: documents.length, chunks: 0 }
	}

	log.info(
		{
			documents: documents.length,
			chunks: chunks.length,
			chunkSize: options.chunkSize,
			chunkOverlap: options.chunkOverlap,
		},
		'Embedding knowledge corpus'
	)

	let batch: IndexPoint[] = []
	// Ids restart at 0 on every run, so the collection is rebuilt from scratch
	let collectionReady = false
	for (const [id, chunk] of chunks.entries()) {
		const vector = await options.embedder.embed(chunk.text)
		if (!collectionReady) {
			await options.index.resetCollection(vector.length)
			collectionReady = true
		}
		batch.push({ id, vector, ...chunk })

		if (batch.length >= batchSize) {
			await options.index.upsert(batch)
			log.debug({ upserted: id + 1 }, 'Index batch written')
			batch = []
		}
	}
	if (batch.length > 0) await options.index.upsert(batch)

	log.info({ chunks: chunks.length }, 'Vector index built')
	return { documents: documents.length, chunks: chunks.length }
}
