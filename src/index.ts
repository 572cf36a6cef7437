// src/index.ts
import type { Server } from 'http'
import { OpenAIEmbedder } from './core/embeddings.js'
import { DalleImageGenerator } from './core/images.js'
import { InterpretationEngine } from './core/interpreter.js'
import { OpenAIChatModel } from './core/llm.js'
import { OpenAIHttpClient } from './core/openai.js'
import { DreamPipeline } from './core/pipeline.js'
import { ReframingEngine } from './core/reframer.js'
import { RetrievalService } from './core/retrieval.js'
import { DreamSessionService } from './core/sessionService.js'
import { WhisperSpeechToText } from './core/speech.js'
import { connectDatabase, disconnectDatabase } from './db/client.js'
import { InMemorySessionStore } from './db/memoryStore.js'
import { MongoSessionStore } from './db/repo.js'
import type { SessionStore } from './db/store.js'
import { createApp, startHttpServer } from './http/server.js'
import { QdrantIndex } from './rag/qdrant.js'
import { loadConfig, type Config } from './util/config.js'
import { logger } from './util/logger.js'

async function openStore(config: Config): Promise<SessionStore> {
	if (config.store.driver === 'memory') {
		logger.warn('Using in-memory session store, sessions are lost on restart')
		return new InMemorySessionStore()
	}
	await connectDatabase(config.store.mongoUri)
	return new MongoSessionStore()
}

function buildPipeline(config: Config): DreamPipeline {
	const client = new OpenAIHttpClient({
		apiKey: config.openai.apiKey,
		baseUrl: config.openai.baseUrl,
		timeoutMs: config.openai.timeoutMs,
	})
	const chat = new OpenAIChatModel(client, {
		model: config.openai.chatModel,
		temperature: config.openai.temperature,
		maxTokens: config.openai.maxTokens,
	})

	return new DreamPipeline({
		speechToText: new WhisperSpeechToText(
			client,
			config.openai.transcriptionModel
		),
		retrieval: new RetrievalService(
			new OpenAIEmbedder(client, config.openai.embeddingModel),
			new QdrantIndex(
				config.rag.qdrantUrl,
				config.rag.collection,
				config.rag.timeoutMs
			)
		),
		interpreter: new InterpretationEngine(chat),
		reframer: new ReframingEngine(chat),
		images: new DalleImageGenerator(client, {
			model: config.openai.imageModel,
			size: config.openai.imageSize,
			quality: config.openai.imageQuality,
		}),
		retrievalK: config.rag.topK,
	})
}

async function bootstrap() {
	const config = loadConfig()
	const store = await openStore(config)
	const service = new DreamSessionService(buildPipeline(config), store)

	const app = createApp({
		service,
		metricsEnabled: config.features.metrics,
		maxAudioBytes: config.MAX_AUDIO_BYTES,
	})
	const server = startHttpServer(app, config.PORT)

	logger.info(
		{
			store: config.store.driver,
			chatModel: config.openai.chatModel,
			collection: config.rag.collection,
			metrics: config.features.metrics,
		},
		'Dream session API ready'
	)

	const shutdown = (signal: string) => {
		logger.info({ signal }, 'Shutting down')
		closeServer(server)
			.then(() =>
				config.store.driver === 'mongo' ? disconnectDatabase() : undefined
			)
			.then(() => process.exit(0))
			.catch(e => {
				logger.error(e, 'Shutdown failed')
				process.exit(1)
			})
	}
	process.once('SIGINT', shutdown)
	process.once('SIGTERM', shutdown)
}

function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close(err => (err ? reject(err) : resolve()))
	})
}

bootstrap().catch(e => {
	logger.error(e, 'Bootstrap failed')
	process.exit(1)
})
