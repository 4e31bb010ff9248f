/**
 * Deterministic post-processing of an evaluator response.
 *
 * Order: JSON object (raw or fenced) → `confidence: <n>` line → unparsable.
 * An unparsable response scores 0; it never passes silently.
 */

import { z } from 'zod'

export type AssessmentParseStatus = 'json' | 'line' | 'unparsable'

export interface ParsedAssessment {
  confidence: number
  issues: string[]
  status: AssessmentParseStatus
}

export const UNPARSABLE_ISSUE = 'unparsable assessment'

const NumericSchema = z.union([
  z.number(),
  z.string().regex(/^\s*\d+(?:\.\d+)?\s*%?\s*$/),
])

const AssessmentJsonSchema = z.object({
  confidence: NumericSchema,
  issues: z.array(z.unknown()).optional(),
})

const CONFIDENCE_LINE_RE = /confidence\**\s*[:=]\s*\**\s*(\d+(?:\.\d+)?)\s*(?:(%)|\/\s*(\d+(?:\.\d+)?))?/i
const BULLET_RE = /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/

/** Largest unmarked value still read as a plain score; anything above is a percentage. */
const PLAIN_SCORE_MAX = 10

/**
 * Clamp to [0, 1]. Values marked % or above PLAIN_SCORE_MAX are percentages;
 * an unmarked value in (1, PLAIN_SCORE_MAX] is out of range and clamps to 1.
 */
export function normalizeConfidence(raw: number, percent = false): number {
  if (!Number.isFinite(raw)) return 0
  const value = percent || raw > PLAIN_SCORE_MAX ? raw / 100 : raw
  return Math.min(1, Math.max(0, value))
}

function candidateJson(text: string): string[] {
  const candidates: string[] = []
  const fence = /```(?:json)?\s*([\s\S]*?)```/i.exec(text)
  if (fence) candidates.push(fence[1].trim())
  const first = text.indexOf('{')
  const last = text.lastIndexOf('}')
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1))
  return candidates
}

function fromJson(text: string): ParsedAssessment | null {
  for (const candidate of candidateJson(text)) {
    let value: unknown
    try {
      value = JSON.parse(candidate)
    } catch {
      continue
    }
    const parsed = AssessmentJsonSchema.safeParse(value)
    if (!parsed.success) continue

    const raw = parsed.data.confidence
    const confidence = typeof raw === 'number'
      ? normalizeConfidence(raw)
      : normalizeConfidence(parseFloat(raw), raw.includes('%'))
    const issues = (parsed.data.issues ?? [])
      .map((issue) => (typeof issue === 'string' ? issue : JSON.stringify(issue)).trim())
      .filter(Boolean)
    return { confidence, issues, status: 'json' }
  }
  return null
}

function fromLine(text: string): ParsedAssessment | null {
  const match = CONFIDENCE_LINE_RE.exec(text)
  if (!match) return null
  const scale = match[3] ? parseFloat(match[3]) : 0
  const confidence = scale > 0
    ? normalizeConfidence(parseFloat(match[1]) / scale)
    : normalizeConfidence(parseFloat(match[1]), match[2] === '%')
  const issues = text
    .split('\n')
    .map((line) => BULLET_RE.exec(line)?.[1]?.trim() ?? '')
    .filter((line) => line && !/confidence/i.test(line))
  return { confidence, issues, status: 'line' }
}

export function parseAssessment(text: string): ParsedAssessment {
  return fromJson(text) ?? fromLine(text) ?? { confidence: 0, issues: [UNPARSABLE_ISSUE], status: 'unparsable' }
}
