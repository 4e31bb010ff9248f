import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile, utimes } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  MarkdownSource,
  DataSource,
  WikiSource,
  createDocumentSources,
  markdownSlug,
  MTIME_KEY,
} from '../../src/sync/sources.js'
import type { SourceEntry } from '../../src/sync/sources.js'
import type { Document } from '../../src/kb/index.js'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'kbforge-sources-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

const noIndex = { indexed: new Map<string, Document>(), force: false }

function docIds(entries: SourceEntry[]): string[] {
  return entries.flatMap((e) => (e.kind === 'document' ? [e.doc.docId] : e.kind === 'unchanged' ? [e.docId] : []))
}

describe('markdownSlug', () => {
  it('is the relative path without extension', () => {
    expect(markdownSlug('/kb', '/kb/guides/retries.md')).toBe('guides/retries')
  })
})

describe('MarkdownSource', () => {
  it('walks nested directories and skips ignored ones', async () => {
    const root = join(dir, 'kb')
    await mkdir(join(root, 'guides'), { recursive: true })
    await mkdir(join(root, 'node_modules'), { recursive: true })
    await mkdir(join(root, '.drafts'), { recursive: true })
    await writeFile(join(root, 'guides', 'retries.md'), '# Retry Budgets\n\n**Date:** 2024-05-01\nBody')
    await writeFile(join(root, 'index.md'), 'No heading')
    await writeFile(join(root, 'notes.txt'), 'ignored')
    await writeFile(join(root, 'node_modules', 'pkg.md'), '# ignored')
    await writeFile(join(root, '.drafts', 'wip.md'), '# ignored')

    const source = new MarkdownSource({ source: 'kb', path: root })
    const result = await source.enumerate(noIndex)
    if (!result.ok) throw result.error
    expect(docIds(result.value)).toEqual(['kb:guides/retries', 'kb:index'])

    const first = result.value[0]
    if (first.kind !== 'document') throw new Error('expected a document')
    expect(first.doc.title).toBe('Retry Budgets')
    expect(first.doc.metadata).toEqual({ date: '2024-05-01', path: 'guides/retries.md' })

    const second = result.value[1]
    if (second.kind === 'document') expect(second.doc.title).toBe('Index')
  })

  it('records the mtime of a settled file and skips it while the mtime holds', async () => {
    const root = join(dir, 'kb')
    await mkdir(root)
    const file = join(root, 'old.md')
    await writeFile(file, '# Old')
    await utimes(file, new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'))
    const source = new MarkdownSource({ source: 'kb', path: root })

    const first = await source.enumerate(noIndex)
    if (!first.ok) throw first.error
    const entry = first.value[0]
    if (entry.kind !== 'document') throw new Error('expected a document')
    expect(entry.doc.metadata).toEqual({ path: 'old.md', [MTIME_KEY]: '1577836800000' })

    const indexed = new Map<string, Document>([
      ['kb:old', { ...entry.doc, indexedAt: '2020-01-02T00:00:00.000Z' }],
    ])
    const result = await source.enumerate({ indexed, force: false })
    if (!result.ok) throw result.error
    expect(result.value).toEqual([{ kind: 'unchanged', docId: 'kb:old' }])

    const forced = await source.enumerate({ indexed, force: true })
    if (!forced.ok) throw forced.error
    expect(forced.value[0].kind).toBe('document')

    await utimes(file, new Date('2020-06-01T00:00:00Z'), new Date('2020-06-01T00:00:00Z'))
    const touched = await source.enumerate({ indexed, force: false })
    if (!touched.ok) throw touched.error
    expect(touched.value[0].kind).toBe('document')
  })

  it('does not record an mtime that is too recent to trust', async () => {
    const root = join(dir, 'kb')
    await mkdir(root)
    await writeFile(join(root, 'fresh.md'), '# Fresh')
    const source = new MarkdownSource({ source: 'kb', path: root })

    const result = await source.enumerate(noIndex)
    if (!result.ok) throw result.error
    const entry = result.value[0]
    if (entry.kind !== 'document') throw new Error('expected a document')
    expect(entry.doc.metadata).toEqual({ path: 'fresh.md' })
  })

  it('re-reads a file whose record carries no mtime, however old the record', async () => {
    const root = join(dir, 'kb')
    await mkdir(root)
    const file = join(root, 'old.md')
    await writeFile(file, '# Old')
    await utimes(file, new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'))

    const indexed = new Map<string, Document>([
      ['kb:old', {
        docId: 'kb:old',
        source: 'kb',
        title: 'Old',
        content: '# Old',
        contentHash: 'x',
        indexedAt: '2999-01-01T00:00:00.000Z',
        charCount: 5,
        metadata: {},
      }],
    ])
    const source = new MarkdownSource({ source: 'kb', path: root })
    const result = await source.enumerate({ indexed, force: false })
    if (!result.ok) throw result.error
    expect(result.value[0].kind).toBe('document')
  })

  it('fails as a whole when the directory is unreachable', async () => {
    const source = new MarkdownSource({ source: 'kb', path: join(dir, 'missing') })
    const result = await source.enumerate(noIndex)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('IO_ERROR')
  })
})

describe('DataSource', () => {
  it('turns entries into documents and marks malformed ones invalid', async () => {
    const file = join(dir, 'questions.ts')
    await writeFile(file, `export const questions: Question[] = [
  { id: 'q-1', question: 'What is idempotency?', answer: 'Same effect twice.' },
  { id: 'q-2', answer: 'missing question' },
  { id: 'q-3', question: oops },
]`)
    const source = new DataSource({ source: 'questions', path: file, arrayName: 'questions', transform: 'question' })
    const result = await source.enumerate()
    if (!result.ok) throw result.error

    expect(result.value.map((e) => e.kind)).toEqual(['document', 'invalid', 'invalid'])
    const missing = result.value[1]
    if (missing.kind === 'invalid') expect(missing.docId).toBe('questions:q-2')
    const syntax = result.value[2]
    if (syntax.kind === 'invalid') {
      expect(syntax.docId).toBe('questions:q-3')
      expect(syntax.error.message).toBe('questions[2]: unexpected identifier "oops" at line 4')
    }
  })

  it('fails as a whole when the array is missing', async () => {
    const file = join(dir, 'questions.ts')
    await writeFile(file, 'export const other = []')
    const source = new DataSource({ source: 'questions', path: file, arrayName: 'questions', transform: 'question' })
    const result = await source.enumerate()
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('PARSE_ERROR')
      expect(result.error.message).toBe(`Source "questions" (${file}): array "questions" not found`)
    }
  })
})

describe('WikiSource', () => {
  it('flattens sections into tool documents', async () => {
    const file = join(dir, 'wiki.ts')
    await writeFile(file, `export const knowledgeBaseWikiSections = [
  {
    provider: 'GCP',
    groups: [{ name: 'Compute', entries: [{ tool: 'Cloud Run' }, { tool: 'GKE' }] }],
  },
]`)
    const source = new WikiSource({ source: 'wiki', path: file, arrayName: 'knowledgeBaseWikiSections' })
    const result = await source.enumerate()
    if (!result.ok) throw result.error
    expect(docIds(result.value)).toEqual(['wiki:gcp-cloud-run', 'wiki:gcp-gke'])
  })

  it('names the records a malformed section still owns', async () => {
    const file = join(dir, 'wiki.ts')
    await writeFile(file, `export const knowledgeBaseWikiSections = [
  { provider: 'Google Cloud', groups: [{ name: Compute }] },
  { provider: 'AWS', groups: [{ name: 'Storage', entries: [{ tool: 'S3', summary: 5 }] }] },
]`)
    const source = new WikiSource({ source: 'wiki', path: file, arrayName: 'knowledgeBaseWikiSections' })
    const result = await source.enumerate()
    if (!result.ok) throw result.error
    expect(result.value).toHaveLength(2)
    const [section, entry] = result.value
    if (section.kind !== 'invalid' || entry.kind !== 'invalid') throw new Error('expected invalid entries')
    expect(section.docIdPrefix).toBe('wiki:google-cloud-')
    expect(entry.docId).toBe('wiki:aws-s3')
  })
})

describe('createDocumentSources', () => {
  it('rejects duplicate source names', () => {
    expect(() => createDocumentSources([
      { type: 'markdown', source: 'kb', path: '/a' },
      { type: 'markdown', source: 'kb', path: '/b' },
    ])).toThrow('Source "kb" is configured more than once')
  })

  it('creates one source per config', () => {
    const sources = createDocumentSources([
      { type: 'markdown', source: 'kb', path: '/a' },
      { type: 'wiki', source: 'wiki', path: '/w.ts', arrayName: 'sections' },
    ])
    expect(sources.map((s) => `${s.source}:${s.kind}`)).toEqual(['kb:markdown', 'wiki:wiki'])
  })
})
