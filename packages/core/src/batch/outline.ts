/**
 * Outline parsing: a guide file lays sections out as
 *
 *   <div id="section-2-6"> ... <SectionTitle>2.6 Communication Patterns</SectionTitle>
 *     <Subsection title="Synchronous RPC"> ...
 *
 * A section runs from its div to the next section div.
 */

import { Ok, Err, KBForgeError } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface OutlineSection {
  sectionNumber: string
  sectionId: string
  name: string
  subsections: string[]
}

const SECTION_NUMBER_RE = /^(\d+)\.(\d+)$/
const NEXT_SECTION_RE = /<div id="section-\d+-\d+"[^>]*>/
const SUBSECTION_RE = /<Subsection title="([^"]+)"/g

function decodeEntities(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&')
}

function sectionName(text: string, sectionId: string, body: string): string | null {
  const attr = new RegExp(`<Section[^>]*id="${sectionId}"[^>]*title="([^"]+)"`).exec(text)
  if (attr) return decodeEntities(attr[1].trim())

  const titled = /<SectionTitle[^>]*>\s*[\d.]*\s*([^<]+)<\/SectionTitle>/.exec(body)
  if (titled) return decodeEntities(titled[1].trim())

  const heading = /<h\d[^>]*>\s*[\d.]*\s*([^<]+)<\/h\d>/.exec(body)
  if (heading) return decodeEntities(heading[1].trim())

  return null
}

export function parseOutlineSection(text: string, sectionNumber: string): Result<OutlineSection, KBForgeError> {
  const parts = SECTION_NUMBER_RE.exec(sectionNumber.trim())
  if (!parts) {
    return Err(KBForgeError.validation(`Invalid section number "${sectionNumber}" (expected X.Y)`))
  }
  const sectionId = `section-${parts[1]}-${parts[2]}`

  const start = new RegExp(`<div id="${sectionId}"[^>]*>`).exec(text)
  if (!start) {
    return Err(KBForgeError.notFound('Section', `${sectionNumber} (id=${sectionId})`))
  }

  const afterStart = start.index + start[0].length
  const next = NEXT_SECTION_RE.exec(text.slice(afterStart))
  const body = text.slice(start.index, next ? afterStart + next.index : text.length)

  const name = sectionName(text, sectionId, body)
  if (!name) {
    return Err(KBForgeError.parse(`Could not find a name for section ${sectionNumber}`))
  }

  const subsections = Array.from(body.matchAll(SUBSECTION_RE), (m) => decodeEntities(m[1].trim()))
  return Ok({ sectionNumber: `${parts[1]}.${parts[2]}`, sectionId, name, subsections })
}
