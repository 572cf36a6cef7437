import * as dotenv from 'dotenv'
import { z } from 'zod'

const flag = z
	.string()
	.transform(str => str === 'true')
	.default('false')

// === Environment validation ===
const configSchema = z
	.object({
		LOG_LEVEL: z
			.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
			.default('info'),
		PORT: z.coerce.number().int().positive().default(3000),

		// === OpenAI-compatible provider ===
		OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
		OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
		OPENAI_MODEL: z.string().default('gpt-4o'),
		LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
		LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1500),
		EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
		WHISPER_MODEL_NAME: z.string().default('whisper-1'),
		IMAGE_MODEL: z.string().default('dall-e-3'),
		DALL_E_IMAGE_SIZE: z.string().default('1024x1024'),
		DALL_E_IMAGE_QUALITY: z.enum(['standard', 'hd']).default('standard'),
		PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
		MAX_AUDIO_BYTES: z.coerce
			.number()
			.int()
			.positive()
			.default(25 * 1024 * 1024),

		// === Session store ===
		SESSION_STORE: z.enum(['mongo', 'memory']).default('mongo'),
		MONGODB_URI: z
			.string()
			.default('mongodb://localhost:27017/dream-sessions'),

		// === RAG ===
		QDRANT_URL: z.string().url().default('http://localhost:6333'),
		QDRANT_COLLECTION: z.string().default('dream_knowledge'),
		QDRANT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
		RAG_TOP_K: z.coerce.number().int().positive().default(3),
		RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
		RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
		KNOWLEDGE_BASE_PATH: z.string().default('./data/knowledge_base'),

		// === Feature flags ===
		METRICS_ENABLED: flag,
	})
	.refine(cfg => cfg.RAG_CHUNK_OVERLAP < cfg.RAG_CHUNK_SIZE, {
		message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
		path: ['RAG_CHUNK_OVERLAP'],
	})

export type RawConfig = z.infer<typeof configSchema>

export type Config = RawConfig & {
	openai: {
		apiKey: string
		baseUrl: string
		chatModel: string
		temperature: number
		maxTokens: number
		embeddingModel: string
		transcriptionModel: string
		imageModel: string
		imageSize: string
		imageQuality: 'standard' | 'hd'
		timeoutMs: number
	}
	rag: {
		qdrantUrl: string
		collection: string
		timeoutMs: number
		topK: number
		chunkSize: number
		chunkOverlap: number
		knowledgeBasePath: string
	}
	store: {
		driver: 'mongo' | 'memory'
		mongoUri: string
	}
	features: {
		metrics: boolean
	}
}

// === Pure parsing, throws ZodError ===
export function parseConfig(env: NodeJS.ProcessEnv): Config {
	const baseConfig = configSchema.parse(env)

	// === Structured groups ===
	return {
		...baseConfig,
		openai: {
			apiKey: baseConfig.OPENAI_API_KEY,
			baseUrl: baseConfig.OPENAI_BASE_URL.replace(/\/+$/, ''),
			chatModel: baseConfig.OPENAI_MODEL,
			temperature: baseConfig.LLM_TEMPERATURE,
			maxTokens: baseConfig.LLM_MAX_TOKENS,
			embeddingModel: baseConfig.EMBEDDING_MODEL,
			transcriptionModel: baseConfig.WHISPER_MODEL_NAME,
			imageModel: baseConfig.IMAGE_MODEL,
			imageSize: baseConfig.DALL_E_IMAGE_SIZE,
			imageQuality: baseConfig.DALL_E_IMAGE_QUALITY,
			timeoutMs: baseConfig.PROVIDER_TIMEOUT_MS,
		},
		rag: {
			qdrantUrl: baseConfig.QDRANT_URL.replace(/\/+$/, ''),
			collection: baseConfig.QDRANT_COLLECTION,
			timeoutMs: baseConfig.QDRANT_TIMEOUT_MS,
			topK: baseConfig.RAG_TOP_K,
			chunkSize: baseConfig.RAG_CHUNK_SIZE,
			chunkOverlap: baseConfig.RAG_CHUNK_OVERLAP,
			knowledgeBasePath: baseConfig.KNOWLEDGE_BASE_PATH,
		},
		store: {
			driver: baseConfig.SESSION_STORE,
			mongoUri: baseConfig.MONGODB_URI,
		},
		features: {
			metrics: baseConfig.METRICS_ENABLED,
		},
	}
}

// === Entry point helper: .env + validation, exits on invalid config ===
export function loadConfig(): Config {
	dotenv.config()
	try {
		return parseConfig(process.env)
	} catch (error) {
		console.error('❌ Invalid configuration:')
		if (error instanceof z.ZodError) {
			error.errors.forEach(err => {
				console.error(`  ${err.path.join('.')}: ${err.message}`)
			})
		} else {
			console.error(error)
		}
		process.exit(1)
	}
}
