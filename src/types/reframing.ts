import { z } from 'zod'

const text = z.string().regex(/\S/, 'must not be blank')

export const RescriptingSuggestionSchema = z.object({
	element: text,
	original_image_description: text,
	new_image_suggestion: text,
})

export const ReframingSchema = z.object({
	explanation: text,
	negative_elements_identified: z.array(text),
	rescripting_suggestions: z.array(RescriptingSuggestionSchema),
	actionable_insights: text,
})

export type RescriptingSuggestion = z.infer<typeof RescriptingSuggestionSchema>
export type Reframing = z.infer<typeof ReframingSchema>
