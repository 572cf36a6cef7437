import express, {
	type Express,
	type NextFunction,
	type Request,
	type Response,
} from 'express'
import type { Server } from 'http'
import { z } from 'zod'
import { listPrompts } from '../core/promptVersioning.js'
import type { DreamSessionService } from '../core/sessionService.js'
import {
	DomainError,
	ImageGenerationError,
	mapErrorToUserMessage,
	NotFoundError,
	PreconditionError,
	ProviderError,
	StageError,
	ValidationError,
} from '../types/errors.js'
import {
	createCorrelationId,
	getCorrelationLogger,
	logger,
	type Logger,
} from '../util/logger.js'
import { setupMetricsEndpoint, trackError } from '../util/metrics.js'
import { toSessionResponse } from './serializers.js'

export interface AppOptions {
	service: DreamSessionService
	metricsEnabled?: boolean
	maxAudioBytes?: number
}

const CORRELATION_HEADER = 'x-correlation-id'

const CreateFromTextSchema = z.object({ dream_text: z.string() })

// Errors raised by express' own body parsers (http-errors)
const ClientHttpErrorSchema = z.object({
	status: z.number().int().min(400).max(499),
	expose: z.literal(true),
	message: z.string(),
})

type Handler = (req: Request, res: Response, log: Logger) => Promise<void>

function requestLogger(res: Response, route: string): Logger {
	const header = res.getHeader(CORRELATION_HEADER)
	const correlationId = typeof header === 'string' ? header : createCorrelationId()
	return getCorrelationLogger(correlationId, { route })
}

function route(name: string, handler: Handler) {
	return (req: Request, res: Response, next: NextFunction) => {
		handler(req, res, requestLogger(res, name)).catch(next)
	}
}

export function statusForError(error: DomainError): number {
	if (error instanceof NotFoundError) return 404
	if (error instanceof PreconditionError) return 409
	if (error instanceof ValidationError) return 400
	if (error instanceof StageError) return error.origin === 'timeout' ? 504 : 502
	if (error instanceof ProviderError) return error.timedOut ? 504 : 502
	return 500
}

function errorHandler(
	err: unknown,
	req: Request,
	res: Response,
	_next: NextFunction
) {
	const log = requestLogger(res, `${req.method} ${req.path}`)

	if (err instanceof DomainError) {
		const status = statusForError(err)
		trackError(err.code, 'http')
		if (status >= 500) log.error({ err, code: err.code }, 'Request failed')
		else log.warn({ code: err.code, msg: err.message }, 'Request rejected')

		res.status(status).json({
			error: err.code,
			message: err.userMessage,
			...(err instanceof ImageGenerationError
				? { interpretation: err.interpretation }
				: {}),
		})
		return
	}

	const clientError = ClientHttpErrorSchema.safeParse(err)
	if (clientError.success) {
		log.warn({ status: clientError.data.status }, clientError.data.message)
		res
			.status(clientError.data.status)
			.json({ error: 'BAD_REQUEST', message: clientError.data.message })
		return
	}

	trackError('UNHANDLED', 'http')
	const error = err instanceof Error ? err : new Error(String(err))
	res.status(500).json({ error: 'INTERNAL', message: mapErrorToUserMessage(error) })
}

export function createApp(options: AppOptions): Express {
	const { service } = options
	const app = express()

	app.use((req, res, next) => {
		res.setHeader(
			CORRELATION_HEADER,
			req.get(CORRELATION_HEADER) || createCorrelationId()
		)
		next()
	})
	app.use(express.json({ limit: '100kb' }))

	app.get('/health', (_req, res) => {
		res.json({ status: 'ok', prompts: listPrompts() })
	})

	// STAGE 1: audio upload → transcription → new session
	app.post(
		'/sessions',
		express.raw({
			type: ['audio/*', 'application/octet-stream'],
			limit: options.maxAudioBytes ?? 25 * 1024 * 1024,
		}),
		route('createSession', async (req, res, log) => {
			const audio: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0)
			if (audio.length === 0) {
				throw new ValidationError('Request body must be a non-empty audio payload')
			}
			const session = await service.createFromAudio(audio, log)
			res.status(201).json(toSessionResponse(session))
		})
	)

	app.post(
		'/sessions/text',
		route('createSessionFromText', async (req, res, log) => {
			const body = CreateFromTextSchema.safeParse(req.body)
			if (!body.success) {
				throw new ValidationError('Body must be { "dream_text": string }')
			}
			const session = await service.createFromText(body.data.dream_text, log)
			res.status(201).json(toSessionResponse(session))
		})
	)

	app.get(
		'/sessions/:id',
		route('getSession', async (req, res) => {
			const session = await service.get(req.params.id)
			res.json(toSessionResponse(session))
		})
	)

	// STAGES 2-4: interpretation + original and healing images
	app.post(
		'/sessions/:id/interpret',
		route('interpretSession', async (req, res, log) => {
			const { session, images } = await service.interpret(req.params.id, log)
			res.json({
				session_id: session.id,
				interpretation: session.interpretation,
				generated_image_url: images.originalUrl,
				healing_image_url: images.healingUrl,
			})
		})
	)

	// STAGE 5: imagery rescripting
	app.post(
		'/sessions/:id/reframe',
		route('reframeSession', async (req, res, log) => {
			const { session, reframing } = await service.reframe(req.params.id, log)
			res.json({ session_id: session.id, reframing })
		})
	)

	setupMetricsEndpoint(app, options.metricsEnabled ?? false)

	app.use(errorHandler)
	return app
}

export function startHttpServer(app: Express, port: number): Server {
	return app.listen(port, () => logger.info(`HTTP server started on :${port}`))
}
