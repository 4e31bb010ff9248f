/**
 * Loose parser for array literals exported from JS/TS data files, e.g.
 *
 *   export const questions: Question[] = [
 *     { id: 'q-1', question: "What's a WAL?", answer: `multi
 *       line`, },
 *   ]
 *
 * Accepts single, double and template quoting, unquoted keys, comments,
 * trailing commas, numbers, booleans and null. Each array entry parses to its
 * own Result: a malformed entry is reported with its raw text and skipped, its
 * siblings still parse.
 */

import { Ok, Err, KBForgeError } from '../common/index.js'
import type { Result } from '../common/index.js'

export type LiteralValue = string | number | boolean | null | LiteralValue[] | LiteralObject
export interface LiteralObject {
  [key: string]: LiteralValue
}

/** A malformed array entry: the error and the entry's raw source text. */
export interface EntryParseError {
  error: KBForgeError
  raw: string
}

class LiteralSyntaxError extends Error {
  constructor(message: string, readonly offset: number) {
    super(message)
    this.name = 'LiteralSyntaxError'
  }
}

const IDENT_START = /[A-Za-z_$]/
const IDENT_PART = /[\w$]/
const NUMBER_RE = /^[-+]?(?:0[xX][0-9a-fA-F]+|(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][-+]?\d+)?)/

function lineAt(text: string, offset: number): number {
  let line = 1
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') line++
  }
  return line
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

class Cursor {
  pos: number

  constructor(readonly text: string, start = 0) {
    this.pos = start
  }

  get eof(): boolean {
    return this.pos >= this.text.length
  }

  peek(offset = 0): string {
    return this.text.charAt(this.pos + offset)
  }

  fail(message: string): never {
    throw new LiteralSyntaxError(message, this.pos)
  }

  skipTrivia(): void {
    while (!this.eof) {
      const ch = this.peek()
      if (/\s/.test(ch)) {
        this.pos++
      } else if (ch === '/' && this.peek(1) === '/') {
        const end = this.text.indexOf('\n', this.pos)
        this.pos = end === -1 ? this.text.length : end + 1
      } else if (ch === '/' && this.peek(1) === '*') {
        const end = this.text.indexOf('*/', this.pos + 2)
        this.pos = end === -1 ? this.text.length : end + 2
      } else {
        return
      }
    }
  }
}

function readEscape(c: Cursor): string {
  // c.pos is on the character after the backslash
  const ch = c.peek()
  c.pos++
  switch (ch) {
    case 'n': return '\n'
    case 't': return '\t'
    case 'r': return '\r'
    case 'b': return '\b'
    case 'f': return '\f'
    case 'v': return '\v'
    case '0': return '\0'
    case '\r':
      if (c.peek() === '\n') c.pos++
      return ''
    case '\n':
      return ''
    case 'x': {
      const hex = c.text.slice(c.pos, c.pos + 2)
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) c.fail('invalid \\x escape')
      c.pos += 2
      return String.fromCharCode(parseInt(hex, 16))
    }
    case 'u': {
      if (c.peek() === '{') {
        const end = c.text.indexOf('}', c.pos)
        const hex = end === -1 ? '' : c.text.slice(c.pos + 1, end)
        if (!/^[0-9a-fA-F]{1,6}$/.test(hex)) c.fail('invalid \\u{} escape')
        c.pos = end + 1
        return String.fromCodePoint(parseInt(hex, 16))
      }
      const hex = c.text.slice(c.pos, c.pos + 4)
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) c.fail('invalid \\u escape')
      c.pos += 4
      return String.fromCharCode(parseInt(hex, 16))
    }
    case '':
      return c.fail('unterminated escape')
    default:
      return ch
  }
}

function parseQuoted(c: Cursor): string {
  const quote = c.peek()
  c.pos++
  let out = ''
  while (true) {
    if (c.eof) c.fail('unterminated string')
    const ch = c.peek()
    if (ch === quote) {
      c.pos++
      return out
    }
    if (ch === '\n') c.fail('unterminated string')
    c.pos++
    out += ch === '\\' ? readEscape(c) : ch
  }
}

function parseTemplate(c: Cursor): string {
  c.pos++
  let out = ''
  while (true) {
    if (c.eof) c.fail('unterminated template literal')
    const ch = c.peek()
    if (ch === '`') {
      c.pos++
      return out
    }
    if (ch === '$' && c.peek(1) === '{') c.fail('template interpolation is not a literal')
    c.pos++
    out += ch === '\\' ? readEscape(c) : ch
  }
}

function parseNumber(c: Cursor): number {
  const match = NUMBER_RE.exec(c.text.slice(c.pos, c.pos + 64))
  if (!match) c.fail('invalid number')
  const raw = match[0].replace(/_/g, '')
  const value = Number(raw)
  if (Number.isNaN(value)) c.fail(`invalid number "${match[0]}"`)
  c.pos += match[0].length
  return value
}

function parseIdentifier(c: Cursor): string {
  const start = c.pos
  if (!IDENT_START.test(c.peek())) c.fail(`unexpected character "${c.peek()}"`)
  while (!c.eof && IDENT_PART.test(c.peek())) c.pos++
  return c.text.slice(start, c.pos)
}

function parseKey(c: Cursor): string {
  const ch = c.peek()
  if (ch === '"' || ch === "'") return parseQuoted(c)
  if (ch === '`') return parseTemplate(c)
  if (ch === '.') c.fail('spread is not a literal')
  if (/\d/.test(ch)) return String(parseNumber(c))
  if (ch === '[') c.fail('computed keys are not supported')
  return parseIdentifier(c)
}

function parseArray(c: Cursor): LiteralValue[] {
  c.pos++
  const items: LiteralValue[] = []
  while (true) {
    c.skipTrivia()
    if (c.eof) c.fail('unterminated array')
    if (c.peek() === ']') {
      c.pos++
      return items
    }
    items.push(parseValue(c))
    c.skipTrivia()
    if (c.peek() === ',') c.pos++
    else if (c.peek() !== ']') c.fail('expected "," or "]"')
  }
}

function parseObject(c: Cursor): LiteralObject {
  c.pos++
  const obj: LiteralObject = {}
  while (true) {
    c.skipTrivia()
    if (c.eof) c.fail('unterminated object')
    if (c.peek() === '}') {
      c.pos++
      return obj
    }
    const key = parseKey(c)
    c.skipTrivia()
    if (c.peek() !== ':') c.fail(`expected ":" after key "${key}"`)
    c.pos++
    obj[key] = parseValue(c)
    c.skipTrivia()
    if (c.peek() === ',') c.pos++
    else if (c.peek() !== '}') c.fail('expected "," or "}"')
  }
}

function parseValue(c: Cursor): LiteralValue {
  c.skipTrivia()
  const ch = c.peek()
  if (ch === '') c.fail('unexpected end of input')
  if (ch === '[') return parseArray(c)
  if (ch === '{') return parseObject(c)
  if (ch === '"' || ch === "'") return parseQuoted(c)
  if (ch === '`') return parseTemplate(c)
  if (/[-+\d.]/.test(ch)) return parseNumber(c)

  const start = c.pos
  const ident = parseIdentifier(c)
  switch (ident) {
    case 'true': return true
    case 'false': return false
    case 'null':
    case 'undefined':
      return null
    default:
      c.pos = start
      return c.fail(`unexpected identifier "${ident}"`)
  }
}

/**
 * Position just past the current array entry: after its top-level comma, or
 * at the array's closing bracket. Used to resynchronise after a bad entry.
 */
function skipEntry(text: string, from: number): number {
  let depth = 0
  let i = from
  while (i < text.length) {
    const ch = text[i]
    if (ch === '"' || ch === "'" || ch === '`') {
      let j = i + 1
      let closed = false
      while (j < text.length) {
        if (text[j] === ch) {
          closed = true
          break
        }
        if (ch !== '`' && text[j] === '\n') break
        j += text[j] === '\\' ? 2 : 1
      }
      // An unterminated quote counts as a stray character.
      i = closed ? j + 1 : i + 1
      continue
    }
    if (ch === '/' && text[i + 1] === '/') {
      const end = text.indexOf('\n', i)
      i = end === -1 ? text.length : end + 1
      continue
    }
    if (ch === '/' && text[i + 1] === '*') {
      const end = text.indexOf('*/', i + 2)
      i = end === -1 ? text.length : end + 2
      continue
    }
    if (ch === '[' || ch === '{' || ch === '(') depth++
    else if (ch === ']' || ch === '}' || ch === ')') {
      if (depth === 0 && ch === ']') return i
      if (depth > 0) depth--
    } else if (ch === ',' && depth === 0) {
      return i + 1
    }
    i++
  }
  return text.length
}

/** Offset of the opening bracket of `export const <name> ... = [`. */
export function locateExportedArray(text: string, arrayName: string): Result<number, KBForgeError> {
  const pattern = new RegExp(`export\\s+const\\s+${escapeRegExp(arrayName)}\\b[^=]*=\\s*\\[`)
  const match = pattern.exec(text)
  if (!match) {
    return Err(KBForgeError.parse(`array "${arrayName}" not found`))
  }
  return Ok(match.index + match[0].length - 1)
}

/**
 * Read a top-level-looking `key: value` pair out of raw entry text that did not
 * parse. Quoted values may not contain quotes; bare values are word characters.
 */
export function readRawField(raw: string, key: string): string | undefined {
  const pattern = new RegExp(
    `(?:^|[{,\\s])(['"]?)${escapeRegExp(key)}\\1\\s*:\\s*(?:(['"\`])([^'"\`\\n]*)\\2|([\\w.-]+))`,
  )
  const match = pattern.exec(raw)
  if (!match) return undefined
  return match[3] ?? match[4]
}

/** Parse a single literal value. */
export function parseLiteral(text: string): Result<LiteralValue, KBForgeError> {
  const c: Cursor = new Cursor(text)
  try {
    const value = parseValue(c)
    c.skipTrivia()
    if (!c.eof) c.fail('unexpected trailing input')
    return Ok(value)
  } catch (e) {
    if (e instanceof LiteralSyntaxError) {
      return Err(KBForgeError.parse(`${e.message} at line ${lineAt(text, e.offset)}`))
    }
    throw e
  }
}

/**
 * Parse every entry of an exported array literal. The outer Result fails only
 * when the array cannot be found or is unterminated.
 */
export function parseExportedArray(
  text: string,
  arrayName: string,
): Result<Array<Result<LiteralValue, EntryParseError>>, KBForgeError> {
  const start = locateExportedArray(text, arrayName)
  if (!start.ok) return start

  const c: Cursor = new Cursor(text, start.value + 1)
  const entries: Array<Result<LiteralValue, EntryParseError>> = []

  while (true) {
    c.skipTrivia()
    if (c.eof) {
      return Err(KBForgeError.parse(`array "${arrayName}" is unterminated`))
    }
    if (c.peek() === ']') return Ok(entries)

    const entryStart = c.pos
    try {
      const value = parseValue(c)
      c.skipTrivia()
      if (c.peek() === ',') c.pos++
      else if (c.peek() !== ']') c.fail('expected "," or "]"')
      entries.push(Ok(value))
    } catch (e) {
      if (!(e instanceof LiteralSyntaxError)) throw e
      const entryEnd = Math.max(skipEntry(text, entryStart), entryStart + 1)
      entries.push(Err({
        error: KBForgeError.parse(`${arrayName}[${entries.length}]: ${e.message} at line ${lineAt(text, e.offset)}`),
        raw: text.slice(entryStart, entryEnd),
      }))
      c.pos = entryEnd
    }
  }
}
