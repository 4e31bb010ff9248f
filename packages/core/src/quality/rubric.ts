/**
 * Evaluation rubric and prompt for the quality gate.
 */

export type Strictness = 'high' | 'medium' | 'low'

const STRICTNESS_GUIDANCE: Record<Strictness, string> = {
  high: `Review with the highest standards. Deduct heavily for any claim the context does not support,
any gap in coverage of the material the context provides for this topic, and any contradiction
between parts of the draft. A confidence of 0.7 or more means the draft is publishable as is.`,
  medium: `Review as a senior technical reviewer. Deduct for unsupported claims and contradictions;
minor gaps in coverage are acceptable when the core of the topic is handled accurately.`,
  low: `Do a quick sanity check. Deduct only for factual errors against the context, fabricated
specifics, or a draft that does not address the topic.`,
}

export const RUBRIC_CRITERIA = [
  'Coverage: the draft covers what the context says about the topic.',
  'Consistency: the draft does not contradict itself.',
  'Grounding: every factual claim is supported by the context; nothing is fabricated.',
] as const

export function buildEvaluationPrompt(draft: string, topic: string, strictness: Strictness): string {
  return `Evaluate the draft below for the topic "${topic}" against the context provided.

${STRICTNESS_GUIDANCE[strictness]}

Criteria:
${RUBRIC_CRITERIA.map((c, i) => `${i + 1}. ${c}`).join('\n')}

Respond with JSON only, no prose:
{"confidence": <number between 0 and 1>, "issues": ["<specific deficiency>", ...]}

List each deficiency as one actionable sentence. Use an empty issues array when there are none.

<draft>
${draft}
</draft>`
}

export const EVALUATOR_SYSTEM_PROMPT =
  'You are a rigorous technical reviewer. You score drafts strictly against the supplied context and answer in JSON.'
