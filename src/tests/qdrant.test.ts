import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest'
import { RetrievalService } from '../core/retrieval.js'
import { QdrantIndex } from '../rag/qdrant.js'
import { ProviderError } from '../types/errors.js'
import { letterEmbedder, startLocalServer, type LocalServer } from './fixtures.js'

const BASE_URL = 'http://qdrant.test'

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'Content-Type': 'application/json' },
	})
}

function stubFetch(respond: (url: string, init?: RequestInit) => Response) {
	const fetchMock = vi.fn(async (url: string, init?: RequestInit) => respond(url, init))
	vi.stubGlobal('fetch', fetchMock)
	return fetchMock
}

describe('QdrantIndex over HTTP', () => {
	afterEach(() => {
		vi.unstubAllGlobals()
	})

	it('searches the collection and returns chunks nearest first', async () => {
		const fetchMock = stubFetch(() =>
			jsonResponse({
				result: [
					{ score: 0.2, payload: { text: 'far', source: 'a.txt' } },
					{ score: 0.9, payload: { text: 'near', source: 'b.txt' } },
				],
			})
		)
		const index = new QdrantIndex(BASE_URL, 'dreams')

		expect(await index.query([1, 0], 2)).toEqual([
			{ text: 'near', score: 0.9 },
			{ text: 'far', score: 0.2 },
		])

		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe('http://qdrant.test/collections/dreams/points/search')
		expect(init?.method).toBe('POST')
		expect(JSON.parse(String(init?.body))).toEqual({
			vector: [1, 0],
			limit: 2,
			with_payload: true,
		})
	})

	it('flags a search response of the wrong shape as malformed', async () => {
		stubFetch(() => jsonResponse({ result: [{ score: 0.5 }] }))

		await expect(new QdrantIndex(BASE_URL, 'dreams').query([1, 0], 1)).rejects.toMatchObject({
			code: 'PROVIDER_ERROR',
			details: { malformed: true },
		})
	})

	it('reports HTTP errors with their status', async () => {
		stubFetch(() => jsonResponse({ status: { error: 'Not found' } }, 404))

		await expect(new QdrantIndex(BASE_URL, 'dreams').query([1, 0], 1)).rejects.toMatchObject({
			details: { status: 404 },
		})
	})

	it('recreates the collection before indexing', async () => {
		const fetchMock = stubFetch((_url, init) =>
			init?.method === 'DELETE'
				? jsonResponse({ status: { error: 'Not found' } }, 404)
				: jsonResponse({ result: true })
		)

		await new QdrantIndex(BASE_URL, 'dreams').resetCollection(3)

		expect(fetchMock.mock.calls.map(([url, init]) => `${init?.method} ${url}`)).toEqual([
			'DELETE http://qdrant.test/collections/dreams',
			'PUT http://qdrant.test/collections/dreams',
		])
		expect(JSON.parse(String(fetchMock.mock.calls[1][1]?.body))).toEqual({
			vectors: { size: 3, distance: 'Cosine' },
		})
	})

	it('stops when the old collection cannot be dropped', async () => {
		const fetchMock = stubFetch(() => jsonResponse({ status: { error: 'boom' } }, 500))

		await expect(
			new QdrantIndex(BASE_URL, 'dreams').resetCollection(3)
		).rejects.toMatchObject({ details: { status: 500 } })
		expect(fetchMock).toHaveBeenCalledTimes(1)
	})

	it('upserts points with their payload', async () => {
		const fetchMock = stubFetch(() => jsonResponse({ result: { status: 'completed' } }))

		await new QdrantIndex(BASE_URL, 'dreams').upsert([
			{ id: 4, vector: [0.5, 0.5], text: 'water', source: 'sea.txt', chunk: 1 },
		])

		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe('http://qdrant.test/collections/dreams/points?wait=true')
		expect(JSON.parse(String(init?.body))).toEqual({
			points: [
				{
					id: 4,
					vector: [0.5, 0.5],
					payload: { text: 'water', source: 'sea.txt', chunk: 1 },
				},
			],
		})
	})
})

describe('QdrantIndex against an unresponsive server', () => {
	let silent: LocalServer

	beforeAll(async () => {
		// Accepts connections and never answers
		silent = await startLocalServer(() => {})
	})

	afterAll(async () => {
		await silent.close()
	})

	it('times out instead of hanging', async () => {
		const query = new QdrantIndex(silent.url, 'dreams', 50).query([1, 0], 3)

		await expect(query).rejects.toBeInstanceOf(ProviderError)
		await expect(query).rejects.toMatchObject({ details: { timedOut: true } })
	})

	it('lets retrieval degrade to an empty context in time', async () => {
		const retrieval = new RetrievalService(
			letterEmbedder(),
			new QdrantIndex(silent.url, 'dreams', 50)
		)
		const started = Date.now()

		expect(await retrieval.retrieve('a dream about the sea', 3)).toEqual([])
		expect(Date.now() - started).toBeLessThan(2000)
	})
})
