// src/util/metrics.ts
import promClient from 'prom-client'
import type { Express } from 'express'

export const register = new promClient.Registry()

promClient.collectDefaultMetrics({ register })

export type Capability =
	| 'transcription'
	| 'embedding'
	| 'vector_index'
	| 'language_model'
	| 'image_generation'

export type Stage = 'transcribe' | 'interpret' | 'reframe'

export const metrics = {
	capabilityCalls: new promClient.Counter({
		name: 'capability_calls_total',
		help: 'Total number of external capability calls',
		labelNames: ['capability', 'status'],
		registers: [register],
	}),

	capabilityLatency: new promClient.Histogram({
		name: 'capability_latency_seconds',
		help: 'External capability call latency',
		labelNames: ['capability'],
		buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
		registers: [register],
	}),

	stageRuns: new promClient.Counter({
		name: 'stage_runs_total',
		help: 'Pipeline stage runs by outcome',
		labelNames: ['stage', 'status'],
		registers: [register],
	}),

	retrievalDegraded: new promClient.Counter({
		name: 'retrieval_degraded_total',
		help: 'Retrievals that returned fewer chunks than requested',
		labelNames: ['reason'],
		registers: [register],
	}),

	errors: new promClient.Counter({
		name: 'errors_total',
		help: 'Total errors by type',
		labelNames: ['error_type', 'operation'],
		registers: [register],
	}),
}

export function trackCapabilityCall<T>(
	capability: Capability,
	promise: Promise<T>
): Promise<T> {
	const timer = metrics.capabilityLatency.startTimer({ capability })

	return promise
		.then(result => {
			metrics.capabilityCalls.inc({ capability, status: 'success' })
			return result
		})
		.catch(error => {
			metrics.capabilityCalls.inc({ capability, status: 'error' })
			throw error
		})
		.finally(() => {
			timer()
		})
}

export function trackStage(stage: Stage, status: 'success' | 'error' | 'partial') {
	metrics.stageRuns.inc({ stage, status })
}

export function trackRetrievalDegraded(reason: 'empty' | 'partial' | 'unavailable') {
	metrics.retrievalDegraded.inc({ reason })
}

export function trackError(errorType: string, operation: string) {
	metrics.errors.inc({ error_type: errorType, operation })
}

export function setupMetricsEndpoint(app: Express, enabled: boolean) {
	if (!enabled) return

	app.get('/metrics', (_req, res, next) => {
		register
			.metrics()
			.then(body => {
				res.set('Content-Type', register.contentType)
				res.end(body)
			})
			.catch(next)
	})
}
