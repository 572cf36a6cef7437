import { ProviderError } from '../types/errors.js'

export interface TimedResponse {
	ok: boolean
	status: number
	body: string
}

// The deadline covers headers and body; an abort at any point is a timeout
export async function fetchWithTimeout(
	input: string,
	init: RequestInit & { timeoutMs: number; provider: string }
): Promise<TimedResponse> {
	const { timeoutMs, provider, ...rest } = init
	const controller = new AbortController()
	const id = setTimeout(
		() => controller.abort(new Error('Request timeout')),
		timeoutMs
	)
	try {
		const res = await fetch(input, { ...rest, signal: controller.signal })
		const body = await res.text()
		return { ok: res.ok, status: res.status, body }
	} catch (e) {
		if (controller.signal.aborted) {
			throw new ProviderError(
				`Request to ${input} timed out after ${timeoutMs}ms`,
				provider,
				{ timedOut: true },
				{ cause: e }
			)
		}
		throw new ProviderError(
			`Request to ${input} failed: ${e instanceof Error ? e.message : String(e)}`,
			provider,
			{},
			{ cause: e }
		)
	} finally {
		clearTimeout(id)
	}
}

export function safeJson(raw: string): unknown {
	try {
		return JSON.parse(raw)
	} catch {
		return undefined
	}
}
