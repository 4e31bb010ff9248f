import { describe, it, expect } from 'vitest'
import { parseOutlineSection } from '../../src/batch/index.js'

const GUIDE = `
<div id="section-2-5">
  <SectionTitle>2.5 Caching</SectionTitle>
  <Subsection title="Eviction">...</Subsection>
</div>
<div id="section-2-6" className="guide-section">
  <SectionTitle>2.6 Communication Patterns</SectionTitle>
  <Subsection title="Synchronous RPC">...</Subsection>
  <Subsection title="Events &amp; Queues">...</Subsection>
</div>
<div id="section-2-7">
  <h3>2.7 Storage Engines</h3>
  <Subsection title="LSM Trees">...</Subsection>
</div>
<div id="section-3-1">
  <Subsection title="Orphan">...</Subsection>
</div>
`

describe('parseOutlineSection', () => {
  it('reads the section title and only its own subsections', () => {
    const section = parseOutlineSection(GUIDE, '2.6')
    expect(section).toEqual({
      ok: true,
      value: {
        sectionNumber: '2.6',
        sectionId: 'section-2-6',
        name: 'Communication Patterns',
        subsections: ['Synchronous RPC', 'Events & Queues'],
      },
    })
  })

  it('falls back to a heading for the name', () => {
    const section = parseOutlineSection(GUIDE, ' 2.7 ')
    if (!section.ok) throw section.error
    expect(section.value.name).toBe('Storage Engines')
    expect(section.value.subsections).toEqual(['LSM Trees'])
  })

  it('rejects a malformed section number', () => {
    const section = parseOutlineSection(GUIDE, '2')
    expect(section.ok).toBe(false)
    if (!section.ok) {
      expect(section.error.code).toBe('VALIDATION_ERROR')
      expect(section.error.message).toBe('Invalid section number "2" (expected X.Y)')
    }
  })

  it('reports a missing section', () => {
    const section = parseOutlineSection(GUIDE, '9.9')
    if (section.ok) throw new Error('expected a missing section')
    expect(section.error.code).toBe('NOT_FOUND')
    expect(section.error.message).toBe('Section not found: 9.9 (id=section-9-9)')
  })

  it('fails when a section has no name', () => {
    const section = parseOutlineSection(GUIDE, '3.1')
    if (section.ok) throw new Error('expected a parse failure')
    expect(section.error.code).toBe('PARSE_ERROR')
    expect(section.error.message).toBe('Could not find a name for section 3.1')
  })
})
