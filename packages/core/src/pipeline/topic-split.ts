/**
 * Deriving the ordered subtopic list from an overview.
 */

import { z } from 'zod'

export interface LocalSplit {
  topics: string[]
  /** Section body keyed by topic title. */
  sections: Map<string, string>
}

// "## I. Title" through "## XXXIX. Title"
const ROMAN_SECTION_RE = /^##\s+(X{0,3}(?:IX|IV|V?I{0,3}))\.\s+(.+)$/gm
const H2_RE = /^##\s+(.+)$/gm
const LIST_ITEM_RE = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/

const TopicArraySchema = z.array(z.union([z.string(), z.number()]).transform(String))

function splitOn(content: string, re: RegExp, title: (m: RegExpMatchArray) => string | null): LocalSplit {
  const matches: Array<{ title: string; start: number; end: number }> = []
  for (const m of content.matchAll(re)) {
    const t = title(m)
    if (t !== null && m.index !== undefined) {
      matches.push({ title: t, start: m.index, end: m.index + m[0].length })
    }
  }

  const topics: string[] = []
  const sections = new Map<string, string>()
  matches.forEach((match, i) => {
    const next = matches[i + 1]
    const body = content.slice(match.end, next ? next.start : content.length).trim()
    if (sections.has(match.title)) return
    topics.push(match.title)
    sections.set(match.title, body)
  })
  return { topics, sections }
}

/** Split on "## I." … Roman numeral headings; plain "## " headings when there are none. */
export function splitByRomanNumerals(content: string): LocalSplit {
  const roman = splitOn(content, ROMAN_SECTION_RE, (m) =>
    m[1] ? `${m[1]}. ${m[2].trim()}` : null,
  )
  if (roman.topics.length > 0) return roman
  return splitOn(content, H2_RE, (m) => m[1].trim() || null)
}

/** Trim, collapse whitespace and drop empty or case-insensitive duplicate topics. */
export function normalizeTopics(topics: string[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const raw of topics) {
    const topic = raw.replace(/\s+/g, ' ').trim()
    const key = topic.toLowerCase()
    if (!topic || seen.has(key)) continue
    seen.add(key)
    out.push(topic)
  }
  return out
}

/**
 * Topic list from an evaluator response: a JSON array (raw or fenced), else
 * the bullet or numbered lines.
 */
export function parseTopicList(text: string): string[] {
  const candidates: string[] = []
  const fence = /```(?:json)?\s*([\s\S]*?)```/i.exec(text)
  if (fence) candidates.push(fence[1].trim())
  const first = text.indexOf('[')
  const last = text.lastIndexOf(']')
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1))

  for (const candidate of candidates) {
    let value: unknown
    try {
      value = JSON.parse(candidate)
    } catch {
      continue
    }
    const parsed = TopicArraySchema.safeParse(value)
    if (parsed.success) return normalizeTopics(parsed.data)
  }

  const lines: string[] = []
  for (const line of text.split('\n')) {
    const item = LIST_ITEM_RE.exec(line)
    if (item) lines.push(item[1].replace(/\*\*/g, ''))
  }
  return normalizeTopics(lines)
}
