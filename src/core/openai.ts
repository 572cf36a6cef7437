import { z } from 'zod'
import { ProviderError } from '../types/errors.js'
import { fetchWithTimeout, safeJson } from '../util/http.js'

export interface OpenAIClientOptions {
	apiKey: string
	baseUrl: string
	timeoutMs?: number
}

const ErrorBodySchema = z.object({
	error: z.object({ message: z.string() }),
})

const PROVIDER = 'openai'

/**
 * Thin HTTP client for OpenAI-compatible endpoints. One instance is built in the
 * composition root and shared by the capability adapters; it applies the per-call
 * timeout and turns every transport or HTTP failure into a ProviderError.
 */
export class OpenAIHttpClient {
	private readonly timeoutMs: number

	constructor(private readonly options: OpenAIClientOptions) {
		this.timeoutMs = options.timeoutMs ?? 30000
	}

	postJson(path: string, body: unknown): Promise<unknown> {
		return this.send(path, JSON.stringify(body), {
			'Content-Type': 'application/json',
		})
	}

	postForm(path: string, form: FormData): Promise<unknown> {
		return this.send(path, form, {})
	}

	private async send(
		path: string,
		body: string | FormData,
		headers: Record<string, string>
	): Promise<unknown> {
		const url = `${this.options.baseUrl}${path}`
		const res = await fetchWithTimeout(url, {
			method: 'POST',
			body,
			headers: {
				Authorization: `Bearer ${this.options.apiKey}`,
				...headers,
			},
			timeoutMs: this.timeoutMs,
			provider: PROVIDER,
		})

		if (!res.ok) {
			const parsed = ErrorBodySchema.safeParse(safeJson(res.body))
			const hint = parsed.success
				? parsed.data.error.message
				: res.body.slice(0, 400)
			throw new ProviderError(`OpenAI HTTP ${res.status}: ${hint}`, PROVIDER, {
				status: res.status,
			})
		}

		const json = safeJson(res.body)
		if (json === undefined) {
			throw new ProviderError(`OpenAI ${path} returned non-JSON`, PROVIDER, {
				status: res.status,
				malformed: true,
			})
		}
		return json
	}
}
