import type { Interpretation } from '../types/interpretation.js'
import type { ChatPrompt } from './capabilities.js'
import { registerPrompt } from './promptVersioning.js'

// ---- Interpretation ----
export const INTERPRETATION_PROMPT = registerPrompt(
	'interpretation',
	`You are an expert in psychology and dream analysis. Using the dream text and the related psychological knowledge provided, perform an in-depth analysis of the dream.

STRICT OUTPUT REQUIREMENTS:
- Return ONLY one JSON object with exactly these fields:
{
  "summary": string (the core content of the dream),
  "keywords": string[] (main keywords of the dream),
  "symbolism_analysis": string (psychological reading of the dream's main symbols),
  "emotional_context": string (emotional state in the dream and what it means),
  "potential_implications": string (what the dream may suggest about the dreamer's current life),
  "image_prompt_original": string (English image-generation prompt capturing the dream's mood and key elements, surreal or symbolic),
  "image_prompt_healing": string (English image-generation prompt that softens the negative feelings of the dream into a positive, healing atmosphere)
}
- Every field is required. No text before or after the JSON.`,
	{ responseFormat: 'json' }
)

export function buildInterpretationPrompt(
	dreamText: string,
	context: string[]
): ChatPrompt {
	// Nearest-first, numbered in retrieval order
	const knowledge = context.length
		? context.map((chunk, i) => `[${i + 1}] ${chunk}`).join('\n\n')
		: '(no related knowledge found)'

	return {
		system: INTERPRETATION_PROMPT.content,
		user: `Dream text: ${dreamText}\n\nRelated knowledge:\n${knowledge}`,
	}
}

// ---- Imagery rescripting ----
export const REFRAMING_PROMPT = registerPrompt(
	'reframing',
	`You are an expert in cognitive behavioural therapy (CBT) and imagery rescripting therapy (IRT). Based on the original dream text and its existing analysis, give concrete guidance and suggestions that help the dreamer rescript the negative images of the dream into positive ones.

STRICT OUTPUT REQUIREMENTS:
- Return ONLY one JSON object with exactly these fields:
{
  "explanation": string (a short explanation of imagery rescripting),
  "negative_elements_identified": string[] (negative elements of the dream to rescript; may be empty),
  "rescripting_suggestions": [
    {
      "element": string (the element to rescript),
      "original_image_description": string (the negative image as it appears in the dream),
      "new_image_suggestion": string (concrete guidance for imagining a new, positive image)
    }
  ] (may be empty),
  "actionable_insights": string (insights from the process and advice applicable to daily life)
}
- Every field is required. No text before or after the JSON.`,
	{ responseFormat: 'json' }
)

export function buildReframingPrompt(
	dreamText: string,
	interpretation: Interpretation
): ChatPrompt {
	return {
		system: REFRAMING_PROMPT.content,
		user: `Original dream text: ${dreamText}\n\nExisting analysis:\n${JSON.stringify(interpretation)}`,
	}
}
