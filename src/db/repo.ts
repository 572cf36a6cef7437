import type { Interpretation } from '../types/interpretation.js'
import type { Reframing } from '../types/reframing.js'
import {
	toDreamSession,
	type DreamSession,
	type GeneratedImagePair,
} from '../types/session.js'
import { DreamSessionModel } from './models.js'
import type { SessionStore } from './store.js'

export interface StoredDocument {
	_id: unknown
}

// Must stay a type alias: interfaces are not assignable to mongoose's UpdateQuery
export type SessionUpdate = {
	$set: { interpretation: Interpretation } | { reframing: Reframing }
	$push?: { generatedImages: GeneratedImagePair }
}

// The slice of the mongoose model the store relies on
export interface SessionCollection {
	insert(dreamText: string): Promise<StoredDocument>
	findById(id: string): Promise<StoredDocument | null>
	updateById(id: string, update: SessionUpdate): Promise<StoredDocument | null>
}

export function mongooseSessions(model = DreamSessionModel): SessionCollection {
	return {
		async insert(dreamText) {
			const doc = await model.create({ dreamText })
			return doc.toObject()
		},
		findById: id => model.findById(id).lean().exec(),
		updateById: (id, update) =>
			model.findByIdAndUpdate(id, update, { new: true }).lean().exec(),
	}
}

function fromDocument(doc: StoredDocument): DreamSession {
	const { _id, ...rest } = doc
	return toDreamSession({ ...rest, id: _id })
}

// Single-document atomic updates; concurrent writers on one session are last-writer-wins
// for the interpretation while every $push of an image pair is kept.
export class MongoSessionStore implements SessionStore {
	constructor(
		private readonly sessions: SessionCollection = mongooseSessions()
	) {}

	async create(dreamText: string): Promise<DreamSession> {
		return fromDocument(await this.sessions.insert(dreamText))
	}

	async get(id: string): Promise<DreamSession | null> {
		const doc = await this.sessions.findById(id)
		return doc ? fromDocument(doc) : null
	}

	async saveInterpretation(
		id: string,
		interpretation: Interpretation,
		images: GeneratedImagePair | null
	): Promise<DreamSession | null> {
		const update: SessionUpdate = images
			? { $set: { interpretation }, $push: { generatedImages: images } }
			: { $set: { interpretation } }

		const doc = await this.sessions.updateById(id, update)
		return doc ? fromDocument(doc) : null
	}

	async saveReframing(
		id: string,
		reframing: Reframing
	): Promise<DreamSession | null> {
		const doc = await this.sessions.updateById(id, { $set: { reframing } })
		return doc ? fromDocument(doc) : null
	}
}
