/**
 * Entry transforms for structured data sources. Each turns one parsed array
 * entry into a SourceDocument, or a PARSE_ERROR naming what was wrong.
 */

import { z } from 'zod'
import { Ok, Err, KBForgeError, computeContentHash, titleToSlug } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { SourceDocument } from '../kb/index.js'
import { docIdFor } from '../kb/index.js'
import type { LiteralValue } from './literal-parser.js'

export type EntryTransformName = 'question' | 'blindspot'

export interface TransformFailure {
  error: KBForgeError
  /** Set when the entry's identity could still be read. */
  docId?: string
}

export type TransformResult = Result<SourceDocument, TransformFailure>

const TITLE_MAX = 80

const IdSchema = z.union([z.string().min(1), z.number()]).transform(String)
const TextSchema = z.string().default('')
const ListSchema = z.array(z.string()).default([])

const QuestionEntrySchema = z.object({
  id: IdSchema,
  question: z.string().min(1),
  answer: TextSchema,
  level: TextSchema,
  topics: ListSchema,
})

const BlindspotEntrySchema = z.object({
  id: IdSchema,
  question: z.string().min(1),
  answer: TextSchema,
  category: TextSchema,
  difficulty: TextSchema,
  masteryLevel: TextSchema,
  whyAsked: TextSchema,
  followUps: ListSchema,
  redFlags: ListSchema,
})

const WikiEntrySchema = z.object({
  tool: z.string().min(1),
  summary: TextSchema,
  mag7: TextSchema,
  adoption: TextSchema,
  decision: TextSchema,
  costTier: TextSchema,
})

const WikiGroupSchema = z.object({
  name: z.string().default('Unknown'),
  entries: z.array(z.unknown()).default([]),
})

const WikiSectionSchema = z.object({
  provider: z.string().default('Unknown'),
  groups: z.array(z.unknown()).default([]),
})

export function makeSourceDocument(
  source: string,
  slug: string,
  title: string,
  content: string,
  metadata: Record<string, string> = {},
): SourceDocument {
  return {
    docId: docIdFor(source, slug),
    source,
    title,
    content,
    contentHash: computeContentHash(content),
    charCount: content.length,
    metadata,
  }
}

function truncateTitle(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > TITLE_MAX ? `${flat.slice(0, TITLE_MAX)}...` : flat
}

function bulletList(items: string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : 'None'
}

function zodMessage(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(entry)'}: ${issue.message}`).join('; ')
}

function readDocId(source: string, raw: LiteralValue): string | undefined {
  const id = IdSchema.safeParse(typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? raw.id : undefined)
  if (!id.success) return undefined
  const slug = titleToSlug(id.data)
  return slug ? docIdFor(source, slug) : undefined
}

function invalid(source: string, raw: LiteralValue, message: string, docId?: string): TransformResult {
  return Err({ error: KBForgeError.parse(`${source}: ${message}`), docId: docId ?? readDocId(source, raw) })
}

export function transformQuestion(source: string, raw: LiteralValue): TransformResult {
  const parsed = QuestionEntrySchema.safeParse(raw)
  if (!parsed.success) return invalid(source, raw, zodMessage(parsed.error))

  const item = parsed.data
  const slug = titleToSlug(item.id)
  if (!slug) return invalid(source, raw, `id "${item.id}" has no usable characters`)

  const content = `# Interview Question

**Level:** ${item.level}
**Topics:** ${item.topics.join(', ')}

## Question

${item.question}

## Answer

${item.answer}
`
  return Ok(makeSourceDocument(source, slug, truncateTitle(item.question), content, {
    ...(item.level ? { level: item.level } : {}),
    ...(item.topics.length > 0 ? { topics: item.topics.join(', ') } : {}),
  }))
}

export function transformBlindspot(source: string, raw: LiteralValue): TransformResult {
  const parsed = BlindspotEntrySchema.safeParse(raw)
  if (!parsed.success) return invalid(source, raw, zodMessage(parsed.error))

  const item = parsed.data
  const slug = titleToSlug(item.id)
  if (!slug) return invalid(source, raw, `id "${item.id}" has no usable characters`)

  const content = `# Blindspot Question

**Category:** ${item.category}
**Difficulty:** ${item.difficulty}
**Mastery Level:** ${item.masteryLevel}

## Question

${item.question}

## Why This Is Asked

${item.whyAsked}

## Answer

${item.answer}

## Follow-up Questions

${bulletList(item.followUps)}

## Red Flags (Poor Answers)

${bulletList(item.redFlags)}
`
  return Ok(makeSourceDocument(source, slug, truncateTitle(item.question), content, {
    ...(item.category ? { category: item.category } : {}),
    ...(item.difficulty ? { difficulty: item.difficulty } : {}),
  }))
}

export const ENTRY_TRANSFORMS: Record<EntryTransformName, (source: string, raw: LiteralValue) => TransformResult> = {
  question: transformQuestion,
  blindspot: transformBlindspot,
}

function wikiEntryDocument(source: string, provider: string, group: string, raw: unknown): TransformResult {
  const parsed = WikiEntrySchema.safeParse(raw)
  if (!parsed.success) {
    const tool = typeof raw === 'object' && raw !== null && 'tool' in raw && typeof raw.tool === 'string' ? raw.tool : ''
    const slug = titleToSlug(`${provider} ${tool}`)
    return Err({
      error: KBForgeError.parse(`${source}: ${provider}/${group}: ${zodMessage(parsed.error)}`),
      docId: tool && slug ? docIdFor(source, slug) : undefined,
    })
  }

  const entry = parsed.data
  const slug = titleToSlug(`${provider} ${entry.tool}`)
  if (!slug) {
    return Err({ error: KBForgeError.parse(`${source}: ${provider}/${group}: tool "${entry.tool}" has no usable characters`) })
  }

  const title = `${provider} ${entry.tool}`
  const content = `# ${title}

**Category:** ${group}
**Adoption:** ${entry.adoption}
**Cost Tier:** ${entry.costTier || 'N/A'}

## Summary

${entry.summary}

## Mag7 Context

${entry.mag7}

## Decision Guidance

${entry.decision || 'No specific guidance provided.'}
`
  return Ok(makeSourceDocument(source, slug, title, content, { provider, group }))
}

/** Flatten one wiki section (provider → groups → entries) into documents. */
export function transformWikiSection(source: string, raw: LiteralValue): TransformResult[] {
  const section = WikiSectionSchema.safeParse(raw)
  if (!section.success) {
    return [Err({ error: KBForgeError.parse(`${source}: section: ${zodMessage(section.error)}`) })]
  }

  const results: TransformResult[] = []
  for (const rawGroup of section.data.groups) {
    const group = WikiGroupSchema.safeParse(rawGroup)
    if (!group.success) {
      results.push(Err({ error: KBForgeError.parse(`${source}: ${section.data.provider}: group: ${zodMessage(group.error)}`) }))
      continue
    }
    for (const rawEntry of group.data.entries) {
      results.push(wikiEntryDocument(source, section.data.provider, group.data.name, rawEntry))
    }
  }
  return results
}
