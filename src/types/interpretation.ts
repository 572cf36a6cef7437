import { z } from 'zod'

// Blank strings count as missing; values are kept verbatim
const text = z.string().regex(/\S/, 'must not be blank')

export const InterpretationSchema = z.object({
	summary: text,
	keywords: z.array(text),
	symbolism_analysis: text,
	emotional_context: text,
	potential_implications: text,
	image_prompt_original: text,
	image_prompt_healing: text,
})

export type Interpretation = z.infer<typeof InterpretationSchema>
