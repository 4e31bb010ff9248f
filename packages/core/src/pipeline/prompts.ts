/**
 * Generation prompts for each pipeline stage.
 */

export const WRITER_SYSTEM_PROMPT = `You are a principal engineer and technical educator writing knowledge-base articles.
Write precise, professional markdown. Ground every specific claim in the supplied context where it covers the topic.
No filler, no metaphors.`

export const SPLIT_SYSTEM_PROMPT = `You are a technical content architect. Break educational content into logical,
self-contained sub-topics that can each be explored in depth. Sub-topics must not overlap significantly and together
must cover the main topic. Return a JSON array of topic strings and nothing else, e.g. ["First aspect", "Second aspect"].
Aim for 4-8 sub-topics.`

export function baseKnowledgePrompt(topic: string): string {
  return `Write a comprehensive technical overview of the topic below.

Cover:
(1) real-world behaviour and examples
(2) the trade-offs of each choice
(3) operational and business impact

Structure the overview with Roman numeral section headers, each on its own line:
"## I. <title>", "## II. <title>", and so on. Use no other numbering scheme.

TOPIC: ${topic}`
}

export function topicSplitPrompt(overview: string): string {
  return `Analyze and split this content into sub-topics:\n\n${overview}`
}

export interface DeepDivePromptInput {
  topic: string
  subtopic: string
  /** Matching part of the overview, when the split came from it. */
  overviewExcerpt?: string
  previousDraft?: string
  issues?: string[]
}

export function deepDivePrompt(input: DeepDivePromptInput): string {
  const parts = [
    `Write a focused deep-dive section on "${input.subtopic}" as part of an article about "${input.topic}".`,
    `Include:
- technical depth: the how and the why, not only the what
- concrete examples and failure modes
- trade-offs, quantified where the context allows
- actionable guidance`,
  ]

  if (input.overviewExcerpt) {
    parts.push(`OVERVIEW OF THIS SECTION:\n${input.overviewExcerpt}`)
  }

  if (input.previousDraft && input.issues && input.issues.length > 0) {
    parts.push(`A reviewer rejected your previous draft. Rewrite it and address every point:
${input.issues.map((issue) => `- ${issue}`).join('\n')}

PREVIOUS DRAFT:
${input.previousDraft}`)
  }

  parts.push('Return only the section body in markdown, without a top-level title.')
  return parts.join('\n\n')
}

export interface SynthesisSection {
  title: string
  content: string
  lowConfidence: boolean
}

export function synthesisPrompt(topic: string, sections: SynthesisSection[]): string {
  const body = sections
    .map((s) => `### ${s.lowConfidence ? '[LOW CONFIDENCE] ' : ''}${s.title}\n\n${s.content}`)
    .join('\n\n')
  return `Combine the sections below into one cohesive article titled "${topic}".
Keep the section order. Remove repetition between sections, unify terminology and tone,
and add a short introduction. Sections marked [LOW CONFIDENCE] need extra scrutiny.
Return the full article in markdown, starting with "# ${topic}".

${body}`
}
