import { randomUUID } from 'crypto'
import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'
import type { DreamSession, GeneratedImagePair } from '../types/session.js'
import type { SessionStore } from './store.js'

// Process-local store for SESSION_STORE=memory and for tests.
// Records are cloned in and out so callers never share state with the store.
export class InMemorySessionStore implements SessionStore {
	private readonly sessions = new Map<string, DreamSession>()

	constructor(private readonly now: () => Date = () => new Date()) {}

	async create(dreamText: string): Promise<DreamSession> {
		const createdAt = this.now()
		const session: DreamSession = {
			id: randomUUID(),
			dreamText,
			interpretation: null,
			reframing: null,
			generatedImages: [],
			createdAt,
			updatedAt: createdAt,
		}
		this.sessions.set(session.id, session)
		return structuredClone(session)
	}

	async get(id: string): Promise<DreamSession | null> {
		const session = this.sessions.get(id)
		return session ? structuredClone(session) : null
	}

	async saveInterpretation(
		id: string,
		interpretation: Interpretation,
		images: GeneratedImagePair | null
	): Promise<DreamSession | null> {
		const session = this.sessions.get(id)
		if (!session) return null

		session.interpretation = structuredClone(interpretation)
		if (images) session.generatedImages.push({ ...images })
		session.updatedAt = this.now()
		return structuredClone(session)
	}

	async saveReframing(
		id: string,
		reframing: Reframing
	): Promise<DreamSession | null> {
		const session = this.sessions.get(id)
		if (!session) return null

		session.reframing = structuredClone(reframing)
		session.updatedAt = this.now()
		return structuredClone(session)
	}

	get size(): number {
		return this.sessions.size
	}
}
