// src/core/promptVersioning.ts
import crypto from 'crypto'
import { logger, type Logger } from '../util/logger.js'

export interface PromptVersion {
	id: string
	version: string
	checksum: string
	content: string
	createdAt: Date
	metadata?: Record<string, unknown>
}

const promptVersions: PromptVersion[] = []
const promptRegistry = new Map<string, PromptVersion>()

export function registerPrompt(
	id: string,
	content: string,
	metadata?: Record<string, unknown>
): PromptVersion {
	const checksum = crypto
		.createHash('sha256')
		.update(content)
		.digest('hex')
		.slice(0, 8)

	const existing = promptRegistry.get(id)
	if (existing && existing.checksum === checksum) return existing

	const version = `v${promptVersions.filter(p => p.id === id).length + 1}-${checksum}`

	const promptVersion: PromptVersion = {
		id,
		version,
		checksum,
		content,
		createdAt: new Date(),
		metadata,
	}

	promptVersions.push(promptVersion)
	promptRegistry.set(id, promptVersion)

	logger.debug(
		{
			promptId: id,
			version,
			checksum,
			contentLength: content.length,
			metadata,
		},
		'Prompt registered'
	)

	return promptVersion
}

export function getPrompt(id: string): PromptVersion | undefined {
	return promptRegistry.get(id)
}

export function listPrompts(): Array<Pick<PromptVersion, 'id' | 'version'>> {
	return [...promptRegistry.values()].map(({ id, version }) => ({ id, version }))
}

export function logPromptUsage(
	promptVersion: PromptVersion,
	log: Logger,
	operation: string,
	additionalContext?: Record<string, unknown>
) {
	log.info(
		{
			operation,
			promptId: promptVersion.id,
			promptVersion: promptVersion.version,
			promptChecksum: promptVersion.checksum,
			...additionalContext,
		},
		'Prompt used'
	)
}
