import mongoose from 'mongoose'
import { logger } from '../util/logger.js'

export async function connectDatabase(uri: string): Promise<typeof mongoose> {
	const connection = await mongoose.connect(uri)
	logger.info({ db: connection.connection.name }, 'MongoDB connected')
	return connection
}

export async function disconnectDatabase(): Promise<void> {
	await mongoose.disconnect()
	logger.info('MongoDB disconnected')
}
