import type { z } from 'zod'

export type StructuredReply<T> =
	| { success: true; data: T }
	| { success: false; reason: string }

function tryParse(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}

// The model is asked for bare JSON; tolerate prose around a single {...} envelope only
export function extractJsonObject(text: string): unknown {
	const direct = tryParse(text)
	if (direct !== undefined) return direct

	const start = text.indexOf('{')
	const end = text.lastIndexOf('}')
	return start >= 0 && end > start ? tryParse(text.slice(start, end + 1)) : undefined
}

/**
 * Strict parse of a structured model reply. Missing or wrong-typed fields fail;
 * nothing is coerced or defaulted.
 */
export function parseStructuredReply<T>(
	raw: string,
	schema: z.ZodType<T>
): StructuredReply<T> {
	const json = extractJsonObject(raw)
	if (json === null || typeof json !== 'object' || Array.isArray(json)) {
		return { success: false, reason: 'Reply is not a JSON object' }
	}

	const result = schema.safeParse(json)
	if (!result.success) {
		const reason = result.error.issues
			.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ')
		return { success: false, reason: `Reply does not match schema: ${reason}` }
	}
	return { success: true, data: result.data }
}
