import { randomUUID } from 'crypto'
import mongoose, { Schema } from 'mongoose'

const GeneratedImageSchema = new Schema(
	{
		originalUrl: { type: String, required: true },
		healingUrl: { type: String, required: true },
	},
	{ _id: false }
)

// Stage results are stored as nested documents exactly as validated;
// they are re-validated on read (see toDreamSession).
const DreamSessionSchema = new Schema(
	{
		_id: { type: String, default: () => randomUUID() },
		dreamText: { type: String, required: true, immutable: true },
		interpretation: { type: Schema.Types.Mixed, default: null },
		reframing: { type: Schema.Types.Mixed, default: null },
		generatedImages: { type: [GeneratedImageSchema], default: [] },
	},
	{ timestamps: true, minimize: false, versionKey: false }
)

export const DreamSessionModel = mongoose.model(
	'DreamSession',
	DreamSessionSchema,
	'dream_sessions'
)
