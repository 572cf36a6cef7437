import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RetrievalService } from '../core/retrieval.js'
import { indexCorpus, loadKnowledgeBase } from '../rag/indexer.js'
import { InMemoryVectorIndex } from '../rag/memoryIndex.js'
import { letterEmbedder } from './fixtures.js'

describe('loadKnowledgeBase', () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'knowledge-'))
		await writeFile(join(dir, 'b.txt'), 'second document')
		await writeFile(join(dir, 'a.txt'), 'first document')
		await writeFile(join(dir, '.hidden.txt'), 'ignored')
		await writeFile(join(dir, 'notes.md'), 'ignored')
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('reads visible .txt files in name order', async () => {
		expect(await loadKnowledgeBase(dir)).toEqual([
			{ source: 'a.txt', text: 'first document' },
			{ source: 'b.txt', text: 'second document' },
		])
	})

	it('skips entries that cannot be read', async () => {
		await mkdir(join(dir, 'broken.txt'))

		expect((await loadKnowledgeBase(dir)).map(d => d.source)).toEqual([
			'a.txt',
			'b.txt',
		])
	})

	it('fails for a missing directory', async () => {
		await expect(loadKnowledgeBase(join(dir, 'nope'))).rejects.toThrow()
	})

	it('loads the bundled corpus', async () => {
		const bundled = fileURLToPath(
			new URL('../../data/knowledge_base', import.meta.url)
		)
		const documents = await loadKnowledgeBase(bundled)

		expect(documents.map(d => d.source)).toEqual([
			'dream_symbols.txt',
			'imagery_rescripting.txt',
			'nightmares_and_emotion.txt',
		])
	})
})

describe('indexCorpus', () => {
	it('chunks, embeds and upserts every chunk with its source', async () => {
		const index = new InMemoryVectorIndex()
		const upsert = vi.spyOn(index, 'upsert')
		const resetCollection = vi.spyOn(index, 'resetCollection')

		const summary = await indexCorpus(
			[{ source: 'a.txt', text: 'aaaa bbbb cccc dddd' }],
			{
				embedder: letterEmbedder(),
				index,
				chunkSize: 10,
				chunkOverlap: 5,
				batchSize: 2,
			}
		)

		expect(summary).toEqual({ documents: 1, chunks: 3 })
		expect(resetCollection).toHaveBeenCalledOnce()
		expect(resetCollection).toHaveBeenCalledWith(26)
		expect(upsert).toHaveBeenCalledTimes(2)
		const firstBatch = upsert.mock.calls[0][0]
		expect(
			firstBatch.map(({ id, text, source, chunk }) => ({ id, text, source, chunk }))
		).toEqual([
			{ id: 0, text: 'aaaa bbbb', source: 'a.txt', chunk: 0 },
			{ id: 1, text: 'bbbb cccc', source: 'a.txt', chunk: 1 },
		])
		expect(upsert.mock.calls[1][0].map(p => p.id)).toEqual([2])
		expect(index.size).toBe(3)
	})

	it('numbers chunks per document and ids across the corpus', async () => {
		const index = new InMemoryVectorIndex()
		const upsert = vi.spyOn(index, 'upsert')

		await indexCorpus(
			[
				{ source: 'a.txt', text: 'aaaa bbbb cccc' },
				{ source: 'b.txt', text: 'dddd' },
			],
			{ embedder: letterEmbedder(), index, chunkSize: 9, chunkOverlap: 0 }
		)

		const points = upsert.mock.calls[0][0]
		expect(points.map(({ id, source, chunk }) => ({ id, source, chunk }))).toEqual([
			{ id: 0, source: 'a.txt', chunk: 0 },
			{ id: 1, source: 'a.txt', chunk: 1 },
			{ id: 2, source: 'b.txt', chunk: 0 },
		])
	})

	it('replaces the previous corpus when run again', async () => {
		const index = new InMemoryVectorIndex()
		const options = {
			embedder: letterEmbedder(),
			index,
			chunkSize: 9,
			chunkOverlap: 0,
		}

		await indexCorpus(
			[
				{ source: 'a.txt', text: 'aaaa bbbb cccc' },
				{ source: 'b.txt', text: 'dddd' },
			],
			options
		)
		expect(index.size).toBe(3)

		await indexCorpus([{ source: 'c.txt', text: 'eeee' }], options)

		expect(index.size).toBe(1)
		expect(await index.query([0, 0, 0, 0, 4, ...new Array<number>(21).fill(0)], 5)).toEqual([
			{ text: 'eeee', score: 1 },
		])
	})

	it('writes nothing for an empty corpus', async () => {
		const index = new InMemoryVectorIndex()
		const resetCollection = vi.spyOn(index, 'resetCollection')
		const embedder = letterEmbedder()

		const summary = await indexCorpus([{ source: 'empty.txt', text: '' }], {
			embedder,
			index,
			chunkSize: 100,
			chunkOverlap: 0,
		})

		expect(summary).toEqual({ documents: 1, chunks: 0 })
		expect(resetCollection).not.toHaveBeenCalled()
		expect(embedder.embed).not.toHaveBeenCalled()
	})

	it('builds an index that retrieval can query', async () => {
		const index = new InMemoryVectorIndex()
		const embedder = letterEmbedder()
		await indexCorpus(
			[
				{ source: 'sea.txt', text: 'waves' },
				{ source: 'sky.txt', text: 'xyz' },
			],
			{ embedder, index, chunkSize: 100, chunkOverlap: 0 }
		)

		const retrieval = new RetrievalService(embedder, index)
		expect(await retrieval.retrieve('wave', 1)).toEqual(['waves'])
	})
})
