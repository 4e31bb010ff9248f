/**
 * Local synthesis: deterministic concatenation of subsection drafts in topic order.
 */

import type { SynthesisSection } from './prompts.js'

export const REVIEW_NOTE = '*Note: This section may need additional review.*'

export function synthesizeLocally(topic: string, sections: SynthesisSection[]): string {
  const parts = [
    `# ${topic}`,
    `This guide covers ${sections.length} key area${sections.length === 1 ? '' : 's'}: ${sections.map((s) => s.title).join(', ')}.`,
  ]
  for (const section of sections) {
    parts.push(`## ${section.title}`)
    if (section.lowConfidence) parts.push(REVIEW_NOTE)
    parts.push(section.content.trim())
  }
  return parts.join('\n\n') + '\n'
}
