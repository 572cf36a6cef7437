// src/scripts/buildIndex.ts
// Offline: chunk data/knowledge_base/*.txt, embed every chunk, write the vectors to Qdrant.
import { resolve } from 'path'
import { OpenAIEmbedder } from '../core/embeddings.js'
import { OpenAIHttpClient } from '../core/openai.js'
import { indexCorpus, loadKnowledgeBase } from '../rag/indexer.js'
import { QdrantIndex } from '../rag/qdrant.js'
import { loadConfig } from '../util/config.js'
import { logger } from '../util/logger.js'

async function main() {
	const config = loadConfig()
	const dir = resolve(config.rag.knowledgeBasePath)
	const log = logger.child({ script: 'buildIndex' })

	log.info({ dir }, 'Loading knowledge base')
	const documents = await loadKnowledgeBase(dir, log)
	for (const doc of documents) {
		log.info({ source: doc.source, chars: doc.text.length }, 'Document loaded')
	}

	const client = new OpenAIHttpClient({
		apiKey: config.openai.apiKey,
		baseUrl: config.openai.baseUrl,
		timeoutMs: config.openai.timeoutMs,
	})

	const summary = await indexCorpus(documents, {
		embedder: new OpenAIEmbedder(client, config.openai.embeddingModel),
		index: new QdrantIndex(
			config.rag.qdrantUrl,
			config.rag.collection,
			config.rag.timeoutMs
		),
		chunkSize: config.rag.chunkSize,
		chunkOverlap: config.rag.chunkOverlap,
		log,
	})

	log.info(
		{ ...summary, collection: config.rag.collection },
		'Knowledge index build finished'
	)
}

main().catch(e => {
	logger.fatal(e, 'Failed to build knowledge index')
	process.exit(1)
})
