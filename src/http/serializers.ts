import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'
import { sessionStage, type DreamSession } from '../types/session.js'

export interface SessionResponse {
	id: string
	dream_text: string
	stage: ReturnType<typeof sessionStage>
	interpretation: Interpretation | null
	reframing: Reframing | null
	generated_images: Array<{ original_url: string; healing_url: string }>
	created_at: string
	updated_at: string
}

export function toSessionResponse(session: DreamSession): SessionResponse {
	return {
		id: session.id,
		dream_text: session.dreamText,
		stage: sessionStage(session),
		interpretation: session.interpretation,
		reframing: session.reframing,
		generated_images: session.generatedImages.map(pair => ({
			original_url: pair.originalUrl,
			healing_url: pair.healingUrl,
		})),
		created_at: session.createdAt.toISOString(),
		updated_at: session.updatedAt.toISOString(),
	}
}
