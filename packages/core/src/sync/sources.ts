/**
 * Document sources: enumerate the documents a configured source currently holds.
 *
 * markdown: a directory of *.md files, one document per file
 * data:     an exported array literal, one document per entry
 * wiki:     an exported array of sections → groups → entries
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import { join, relative, sep } from 'node:path'
import { Ok, Err, KBForgeError, errorMessage, titleToSlug } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { DataSourceConfig, MarkdownSourceConfig, SourceConfig, WikiSourceConfig } from '../config/index.js'
import type { Document, SourceDocument } from '../kb/index.js'
import { docIdFor } from '../kb/index.js'
import { parseExportedArray, readRawField } from './literal-parser.js'
import type { EntryParseError, LiteralValue } from './literal-parser.js'
import { extractMetadata, extractTitle } from './markdown.js'
import { ENTRY_TRANSFORMS, makeSourceDocument, transformWikiSection } from './transforms.js'
import type { TransformResult } from './transforms.js'

export type SourceEntry =
  | { kind: 'document'; doc: SourceDocument }
  /** Skipped by the mtime pre-filter; the indexed record is current. */
  | { kind: 'unchanged'; docId: string }
  /**
   * Failed to parse. docId (or every id under docIdPrefix) names the records
   * the entry still owns; they are kept until the entry parses again.
   */
  | { kind: 'invalid'; error: KBForgeError; docId?: string; docIdPrefix?: string }

export interface EnumerateContext {
  /** Records currently indexed for this source, by doc_id. */
  indexed: ReadonlyMap<string, Document>
  force: boolean
}

export interface DocumentSource {
  readonly source: string
  readonly kind: SourceConfig['type']
  readonly path: string
  /** Fails only when the source as a whole is unreachable or unreadable. */
  enumerate(ctx: EnumerateContext): Promise<Result<SourceEntry[], KBForgeError>>
  /** Latest modification time across the source's files (ms since epoch). */
  lastModifiedMs(): Promise<Result<number, KBForgeError>>
}

const IGNORED_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'out',
  'build',
  '.cache',
  'coverage',
])

/**
 * Metadata key holding the file mtime observed before the file was read.
 * The pre-filter skips a file only while its mtime still equals that value.
 */
export const MTIME_KEY = 'mtime_ms'

/**
 * An mtime this close to the read may share a timestamp tick with a later
 * write, so it is not recorded and the file is re-hashed on the next sync.
 */
const RACY_WINDOW_MS = 2000

async function walkMarkdownFiles(dirPath: string): Promise<string[]> {
  const results: string[] = []
  const entries = await readdir(dirPath, { withFileTypes: true })

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      if (IGNORED_DIRS.has(entry.name) || entry.name.startsWith('.')) continue
      const nested = await walkMarkdownFiles(fullPath)
      results.push(...nested)
    } else if (entry.isFile() && entry.name.endsWith('.md')) {
      results.push(fullPath)
    }
  }

  return results.sort()
}

/** Slug of a markdown file: its path under the source root, without extension. */
export function markdownSlug(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join('/').replace(/\.md$/, '')
}

function fromTransform(result: TransformResult): SourceEntry {
  return result.ok
    ? { kind: 'document', doc: result.value }
    : { kind: 'invalid', error: result.error.error, docId: result.error.docId }
}

export class MarkdownSource implements DocumentSource {
  readonly kind = 'markdown'
  readonly source: string
  readonly path: string

  constructor(config: Pick<MarkdownSourceConfig, 'source' | 'path'>) {
    this.source = config.source
    this.path = config.path
  }

  private async listFiles(): Promise<Result<string[], KBForgeError>> {
    try {
      const dirStat = await stat(this.path)
      if (!dirStat.isDirectory()) {
        return Err(KBForgeError.io(`Not a directory: ${this.path}`))
      }
      return Ok(await walkMarkdownFiles(this.path))
    } catch (e) {
      return Err(KBForgeError.io(`Source "${this.source}" unreachable at ${this.path}: ${errorMessage(e)}`))
    }
  }

  async enumerate(ctx: EnumerateContext): Promise<Result<SourceEntry[], KBForgeError>> {
    const files = await this.listFiles()
    if (!files.ok) return files

    const entries: SourceEntry[] = []
    for (const filePath of files.value) {
      const slug = markdownSlug(this.path, filePath)
      const docId = docIdFor(this.source, slug)
      try {
        const readStartedMs = Date.now()
        const fileStat = await stat(filePath)
        const mtime = String(fileStat.mtimeMs)
        if (!ctx.force && ctx.indexed.get(docId)?.metadata[MTIME_KEY] === mtime) {
          entries.push({ kind: 'unchanged', docId })
          continue
        }

        const content = await readFile(filePath, 'utf-8')
        const fileName = filePath.slice(filePath.lastIndexOf(sep) + 1)
        entries.push({
          kind: 'document',
          doc: makeSourceDocument(this.source, slug, extractTitle(content, fileName), content, {
            ...extractMetadata(content),
            path: relative(this.path, filePath).split(sep).join('/'),
            ...(fileStat.mtimeMs + RACY_WINDOW_MS < readStartedMs ? { [MTIME_KEY]: mtime } : {}),
          }),
        })
      } catch (e) {
        entries.push({ kind: 'invalid', docId, error: KBForgeError.io(`${docId}: ${errorMessage(e)}`) })
      }
    }
    return Ok(entries)
  }

  async lastModifiedMs(): Promise<Result<number, KBForgeError>> {
    const files = await this.listFiles()
    if (!files.ok) return files
    try {
      let latest = 0
      for (const filePath of files.value) {
        latest = Math.max(latest, (await stat(filePath)).mtimeMs)
      }
      return Ok(latest)
    } catch (e) {
      return Err(KBForgeError.io(`Source "${this.source}": ${errorMessage(e)}`))
    }
  }
}

/** Shared file handling for sources backed by a single data file. */
abstract class DataFileSource implements DocumentSource {
  abstract readonly kind: 'data' | 'wiki'

  constructor(
    readonly source: string,
    readonly path: string,
    protected readonly arrayName: string,
  ) {}

  protected abstract toEntries(parsed: Array<Result<LiteralValue, EntryParseError>>): SourceEntry[]

  async enumerate(): Promise<Result<SourceEntry[], KBForgeError>> {
    let text: string
    try {
      text = await readFile(this.path, 'utf-8')
    } catch (e) {
      return Err(KBForgeError.io(`Source "${this.source}" unreachable at ${this.path}: ${errorMessage(e)}`))
    }

    const parsed = parseExportedArray(text, this.arrayName)
    if (!parsed.ok) {
      return Err(KBForgeError.parse(`Source "${this.source}" (${this.path}): ${parsed.error.message}`))
    }
    return Ok(this.toEntries(parsed.value))
  }

  async lastModifiedMs(): Promise<Result<number, KBForgeError>> {
    try {
      return Ok((await stat(this.path)).mtimeMs)
    } catch (e) {
      return Err(KBForgeError.io(`Source "${this.source}" unreachable at ${this.path}: ${errorMessage(e)}`))
    }
  }
}

export class DataSource extends DataFileSource {
  readonly kind = 'data'
  private readonly transform: DataSourceConfig['transform']

  constructor(config: Pick<DataSourceConfig, 'source' | 'path' | 'arrayName' | 'transform'>) {
    super(config.source, config.path, config.arrayName)
    this.transform = config.transform
  }

  protected toEntries(parsed: Array<Result<LiteralValue, EntryParseError>>): SourceEntry[] {
    const transform = ENTRY_TRANSFORMS[this.transform]
    return parsed.map((entry): SourceEntry => {
      if (entry.ok) return fromTransform(transform(this.source, entry.value))
      const slug = titleToSlug(readRawField(entry.error.raw, 'id') ?? '')
      return { kind: 'invalid', error: entry.error.error, docId: slug ? docIdFor(this.source, slug) : undefined }
    })
  }
}

export class WikiSource extends DataFileSource {
  readonly kind = 'wiki'

  constructor(config: Pick<WikiSourceConfig, 'source' | 'path' | 'arrayName'>) {
    super(config.source, config.path, config.arrayName)
  }

  protected toEntries(parsed: Array<Result<LiteralValue, EntryParseError>>): SourceEntry[] {
    return parsed.flatMap((section): SourceEntry[] => {
      if (section.ok) return transformWikiSection(this.source, section.value).map(fromTransform)
      // Tool documents are slugged "<provider> <tool>", so the provider names them all.
      const provider = titleToSlug(readRawField(section.error.raw, 'provider') ?? '')
      return [{
        kind: 'invalid',
        error: section.error.error,
        docIdPrefix: provider ? `${docIdFor(this.source, provider)}-` : undefined,
      }]
    })
  }
}

export function createDocumentSource(config: SourceConfig): DocumentSource {
  switch (config.type) {
    case 'markdown':
      return new MarkdownSource(config)
    case 'data':
      return new DataSource(config)
    case 'wiki':
      return new WikiSource(config)
  }
}

export function createDocumentSources(configs: SourceConfig[]): DocumentSource[] {
  const seen = new Set<string>()
  for (const config of configs) {
    if (seen.has(config.source)) {
      throw KBForgeError.configuration(`Source "${config.source}" is configured more than once`)
    }
    seen.add(config.source)
  }
  return configs.map(createDocumentSource)
}
