/**
 * Markdown helpers shared by the markdown source and the full-corpus loader.
 */

const FRONTMATTER_RE = /^---\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/

/** Title from the first H1, else the title-cased file name. */
export function extractTitle(content: string, fileName: string): string {
  for (const line of content.trim().split('\n')) {
    if (line.startsWith('# ')) {
      const title = line.slice(2).trim()
      if (title) return title
    }
  }
  return fileName
    .replace(/\.md$/i, '')
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

/** Metadata lifted from the first 30 lines: currently a `date:` line. */
export function extractMetadata(content: string): Record<string, string> {
  const metadata: Record<string, string> = {}
  for (const line of content.split('\n').slice(0, 30)) {
    if (line.toLowerCase().includes('date:')) {
      const idx = line.indexOf(':')
      const value = line.slice(idx + 1).trim().replace(/^\*+|\*+$/g, '').trim()
      if (value) metadata.date = value
      break
    }
  }
  return metadata
}

export function stripFrontmatter(content: string): string {
  return content.replace(FRONTMATTER_RE, '')
}
