export interface SplitOptions {
	chunkSize: number
	chunkOverlap: number
	separators?: string[]
}

// Coarsest first; '' falls back to single characters
const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', '']

/**
 * Recursive character splitter. Splits on the coarsest separator present in
 * the text, recurses into pieces that are still too long, then merges
 * neighbouring pieces back into chunks of at most `chunkSize` characters
 * with up to `chunkOverlap` characters carried over between chunks.
 */
export function splitText(text: string, options: SplitOptions): string[] {
	const { chunkSize, chunkOverlap } = options
	if (chunkSize <= 0) throw new Error('chunkSize must be positive')
	if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
		throw new Error('chunkOverlap must be in [0, chunkSize)')
	}
	return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, options)
}

function splitRecursive(
	text: string,
	separators: string[],
	options: SplitOptions
): string[] {
	let separator = ''
	let finer: string[] = []
	for (let i = 0; i < separators.length; i++) {
		const candidate = separators[i]
		if (candidate === '' || text.includes(candidate)) {
			separator = candidate
			finer = separators.slice(i + 1)
			break
		}
	}

	const pieces = (separator ? text.split(separator) : [...text]).filter(
		piece => piece !== ''
	)

	const chunks: string[] = []
	let fitting: string[] = []
	for (const piece of pieces) {
		if (piece.length <= options.chunkSize) {
			fitting.push(piece)
			continue
		}
		if (fitting.length) {
			chunks.push(...mergePieces(fitting, separator, options))
			fitting = []
		}
		if (finer.length === 0) chunks.push(piece)
		else chunks.push(...splitRecursive(piece, finer, options))
	}
	if (fitting.length) chunks.push(...mergePieces(fitting, separator, options))
	return chunks
}

function mergePieces(
	pieces: string[],
	separator: string,
	{ chunkSize, chunkOverlap }: SplitOptions
): string[] {
	const chunks: string[] = []
	const current: string[] = []
	let total = 0
	const sepLength = separator.length
	const joinCost = () => (current.length > 0 ? sepLength : 0)

	for (const piece of pieces) {
		if (current.length > 0 && total + joinCost() + piece.length > chunkSize) {
			chunks.push(current.join(separator).trim())

			// Keep a tail of at most chunkOverlap characters that still leaves room for the piece
			while (
				current.length > 0 &&
				(total > chunkOverlap || total + joinCost() + piece.length > chunkSize)
			) {
				const dropped = current.shift() ?? ''
				total -= dropped.length + (current.length > 0 ? sepLength : 0)
			}
		}
		total += joinCost() + piece.length
		current.push(piece)
	}
	if (current.length > 0) chunks.push(current.join(separator).trim())

	return chunks.filter(chunk => chunk.length > 0)
}
