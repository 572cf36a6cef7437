import { z } from 'zod'
import { InterpretationSchema, type Interpretation } from './interpretation.js'
import { ReframingSchema, type Reframing } from './reframing.js'

export interface GeneratedImagePair {
	originalUrl: string
	healingUrl: string
}

export interface DreamSession {
	id: string
	dreamText: string
	interpretation: Interpretation | null
	reframing: Reframing | null
	generatedImages: GeneratedImagePair[]
	createdAt: Date
	updatedAt: Date
}

export type SessionStage = 'created' | 'interpreted' | 'reframed'

// The stage is never stored; field presence is the discriminant
export function sessionStage(session: DreamSession): SessionStage {
	if (session.reframing && session.interpretation) return 'reframed'
	if (session.interpretation) return 'interpreted'
	return 'created'
}

export const GeneratedImagePairSchema = z.object({
	originalUrl: z.string().url(),
	healingUrl: z.string().url(),
})

// Shape of a session as read back from a store
export const StoredSessionSchema = z.object({
	id: z.string().min(1),
	dreamText: z.string().regex(/\S/),
	interpretation: InterpretationSchema.nullish().transform(v => v ?? null),
	reframing: ReframingSchema.nullish().transform(v => v ?? null),
	generatedImages: z.array(GeneratedImagePairSchema),
	createdAt: z.coerce.date(),
	updatedAt: z.coerce.date(),
})

export function toDreamSession(record: unknown): DreamSession {
	return StoredSessionSchema.parse(record)
}
