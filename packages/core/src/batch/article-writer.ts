/**
 * ArticleWriter: persists synthesized articles as markdown with YAML frontmatter
 * into the kb source directory, where the next sync picks them up.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Ok, Err, KBForgeError, errorMessage, titleToSlug } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface ArticleInput {
  title: string
  content: string
  lowConfidenceCount: number
  failedSubsections: string[]
  /** Defaults to the slug of the title. */
  slug?: string
  runId?: string
}

export interface SavedArticle {
  slug: string
  path: string
  bytes: number
}

export interface ArticleWriter {
  save(article: ArticleInput): Promise<Result<SavedArticle, KBForgeError>>
}

export const ARTICLE_SOURCE_LABEL = 'kbforge'

/** YAML frontmatter; string values are JSON-quoted, which YAML reads as double-quoted scalars. */
export function renderFrontmatter(article: ArticleInput, generatedAt: Date): string {
  const lines = [
    '---',
    `title: ${JSON.stringify(article.title)}`,
    `generated_at: ${JSON.stringify(generatedAt.toISOString())}`,
    `source: ${ARTICLE_SOURCE_LABEL}`,
  ]
  if (article.runId) lines.push(`run_id: ${JSON.stringify(article.runId)}`)
  lines.push(`low_confidence_sections: ${article.lowConfidenceCount}`)
  if (article.failedSubsections.length > 0) {
    lines.push('failed_sections:')
    for (const title of article.failedSubsections) lines.push(`  - ${JSON.stringify(title)}`)
  }
  if (article.lowConfidenceCount > 0 || article.failedSubsections.length > 0) {
    lines.push('review_recommended: true')
  }
  lines.push('---')
  return lines.join('\n')
}

export class MarkdownArticleWriter implements ArticleWriter {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async save(article: ArticleInput): Promise<Result<SavedArticle, KBForgeError>> {
    const slug = article.slug ?? titleToSlug(article.title)
    if (!slug) {
      return Err(KBForgeError.validation(`Title "${article.title}" produces an empty slug`))
    }

    const path = join(this.outputDir, `${slug}.md`)
    const body = `${renderFrontmatter(article, this.now())}\n\n${article.content.trim()}\n`
    try {
      await mkdir(this.outputDir, { recursive: true })
      await writeFile(path, body, 'utf-8')
    } catch (e) {
      return Err(KBForgeError.io(`Failed to save ${path}: ${errorMessage(e)}`))
    }

    console.log(`[batch] saved ${path}`)
    return Ok({ slug, path, bytes: Buffer.byteLength(body, 'utf-8') })
  }
}
