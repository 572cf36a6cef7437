import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'
import type { DreamSession, GeneratedImagePair } from '../types/session.js'

/**
 * Durable session record keyed by id. Implementations must:
 * - never reuse an id,
 * - refresh `updatedAt` on every mutation,
 * - treat `generatedImages` as append-only.
 *
 * Stage preconditions are not checked here; see DreamSessionService.
 */
export interface SessionStore {
	create(dreamText: string): Promise<DreamSession>
	get(id: string): Promise<DreamSession | null>
	/**
	 * Overwrites the interpretation and, when `images` is given, appends the pair.
	 * Returns null when the session does not exist.
	 */
	saveInterpretation(
		id: string,
		interpretation: Interpretation,
		images: GeneratedImagePair | null
	): Promise<DreamSession | null>
	saveReframing(id: string, reframing: Reframing): Promise<DreamSession | null>
}
