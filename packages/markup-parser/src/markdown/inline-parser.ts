import type { Span } from "../ast"
import {
  emphasized,
  externalLink,
  image,
  imageReference,
  lineBreak,
  linkReference,
  literal,
  strong,
  text,
} from "../builders"
import { DelimiterSearch, parseSpans, type SpanMatch, type SpanParser, type SpanParsers } from "../inline-parser"
import { normalizeRefLabel } from "../parser-helpers"
import { flattenText } from "../traversal"

const ASCII_PUNCTUATION = /^[!-/:-@[-`{-~]$/

export function isRightFlankingDelimiterRun(runChar: string, previousChar: string, nextChar: string): boolean {
  if (runChar === "*") {
    return !!previousChar && !/\s/.test(previousChar)
  }
  if (runChar === "_") {
    if (!previousChar || /\s/.test(previousChar)) return false
    if (/[a-zA-Z0-9]/.test(previousChar) && nextChar && /[a-zA-Z0-9]/.test(nextChar)) {
      return false
    }
    return true
  }
  return false
}

export function isLeftFlankingDelimiterRun(runChar: string, previousChar: string, nextChar: string): boolean {
  if (runChar === "*") {
    return !!nextChar && !/\s/.test(nextChar)
  }
  if (runChar === "_") {
    if (nextChar === "_" || !nextChar || /\s/.test(nextChar)) return false
    if (/[a-zA-Z0-9]/.test(nextChar)) {
      if (/[a-zA-Z0-9]/.test(previousChar || "")) return false
    }
    return true
  }
  return false
}

function runLength(source: string, from: number, char: string): number {
  let i = from
  while (source.charAt(i) === char) i++
  return i - from
}

/** Index of the next backtick run of exactly `size` at or after `from`, if any. */
function findCodeSpanClose(source: string, from: number, size: number): number | undefined {
  let i = source.indexOf("`", from)
  while (i !== -1) {
    const closing = runLength(source, i, "`")
    if (closing === size) return i
    i = source.indexOf("`", i + closing)
  }
  return undefined
}

/** Index of the backtick run closing the code span opened at `open`, if any. */
function codeSpanClose(source: string, open: number): number | undefined {
  const size = runLength(source, open, "`")
  return findCodeSpanClose(source, open + size, size)
}

function unescapeMarkdown(value: string): string {
  return value.replace(/\\([!-/:-@[-`{-~])/g, "$1")
}

function findCloser(source: string, from: number, char: string, size: number): number | undefined {
  let i = from + 1
  while (i < source.length) {
    const c = source.charAt(i)
    if (c === "\\") {
      i += 2
    } else if (c === "`") {
      const close = codeSpanClose(source, i)
      i = close === undefined ? i + runLength(source, i, "`") : close + runLength(source, close, "`")
    } else if (c === char) {
      const run = runLength(source, i, char)
      if (run === size && isRightFlankingDelimiterRun(char, source.charAt(i - 1), source.charAt(i + run))) return i
      i += run
    } else {
      i++
    }
  }
  return undefined
}

function findLabelEnd(source: string, from: number): number | undefined {
  let depth = 1
  let i = from
  while (i < source.length) {
    const c = source.charAt(i)
    if (c === "\\") {
      i += 2
      continue
    }
    if (c === "`") {
      const close = codeSpanClose(source, i)
      if (close !== undefined) {
        i = close + runLength(source, close, "`")
        continue
      }
    }
    if (c === "[") depth++
    if (c === "]" && --depth === 0) return i
    i++
  }
  return undefined
}

interface Destination {
  url: string
  title?: string
  end: number
}

const TITLE_CLOSE: Record<string, string> = { '"': '"', "'": "'", "(": ")" }

/** Parses `url "title")` starting after the opening parenthesis. */
function parseDestination(source: string, from: number): Destination | undefined {
  const skipSpace = (i: number) => {
    while (/\s/.test(source.charAt(i))) i++
    return i
  }
  let i = skipSpace(from)
  let url = ""
  if (source.charAt(i) === "<") {
    const close = source.indexOf(">", i)
    if (close === -1 || source.slice(i, close).includes("\n")) return undefined
    url = source.slice(i + 1, close)
    i = close + 1
  } else {
    let depth = 0
    const start = i
    while (i < source.length) {
      const c = source.charAt(i)
      if (c === "\\") {
        i += 2
        continue
      }
      if (/\s/.test(c)) break
      if (c === "(") depth++
      if (c === ")") {
        if (depth === 0) break
        depth--
      }
      i++
    }
    url = source.slice(start, i)
  }

  let title: string | undefined
  const afterUrl = i
  i = skipSpace(i)
  const closeChar = TITLE_CLOSE[source.charAt(i)]
  if (closeChar !== undefined && i > afterUrl) {
    let j = i + 1
    while (j < source.length && source.charAt(j) !== closeChar) j += source.charAt(j) === "\\" ? 2 : 1
    if (j >= source.length) return undefined
    title = unescapeMarkdown(source.slice(i + 1, j))
    i = skipSpace(j + 1)
  }
  if (source.charAt(i) !== ")") return undefined
  return { url: unescapeMarkdown(url), title, end: i + 1 }
}

/**
 * Span parsers for Markdown. Reference links only form for labels in `definitions`;
 * other bracketed text stays literal.
 */
export function createMarkdownSpanParsers(definitions: ReadonlySet<string>): SpanParsers {
  const parsers = new Map<string, SpanParser>()
  const search = new DelimiterSearch()
  const parseNested = (source: string) => parseSpans(source, parsers)

  const escape: SpanParser = (source, start) => {
    const char = source.charAt(start)
    if (char === "\n") return { span: lineBreak(), end: start + 1 }
    if (ASCII_PUNCTUATION.test(char)) return { span: text(char), end: start + 1 }
    return undefined
  }

  const codeSpan: SpanParser = (source, start) => {
    const open = start - 1
    const size = runLength(source, open, "`")
    const close = search.find(`code ${size}`, source, open + size, (at) => findCodeSpanClose(source, at, size))
    if (close === undefined) return { span: text("`".repeat(size)), end: open + size }
    let content = source.slice(open + size, close).replace(/\n/g, " ")
    if (/^ [\s\S]* $/.test(content) && content.trim() !== "") content = content.slice(1, -1)
    return { span: literal(content), end: close + size }
  }

  const emphasis = (char: string): SpanParser => (source, start) => {
    const open = start - 1
    const run = runLength(source, open, char)
    if (!isLeftFlankingDelimiterRun(char, source.charAt(open - 1), source.charAt(open + run))) return undefined
    const size = Math.min(run, 3)
    const close = search.find(`${char}${size}`, source, open + size, (at) => findCloser(source, at, char, size))
    if (close === undefined) return undefined
    const inner = parseNested(source.slice(open + size, close))
    const span = size === 1 ? emphasized(inner) : size === 2 ? strong(inner) : strong([emphasized(inner)])
    return { span, end: close + size }
  }

  const linkOrImage = (source: string, labelStart: number, isImage: boolean): SpanMatch | undefined => {
    const close = findLabelEnd(source, labelStart)
    if (close === undefined) return undefined
    const label = source.slice(labelStart, close)
    const after = close + 1

    if (source.charAt(after) === "(") {
      const destination = parseDestination(source, after + 1)
      if (destination) {
        const content = parseNested(label)
        const span = isImage
          ? image(flattenText(content), destination.url, destination.title)
          : externalLink(content, destination.url, destination.title)
        return { span, end: destination.end }
      }
    }

    let refLabel = label
    let end = after
    if (source.charAt(after) === "[") {
      const refClose = findLabelEnd(source, after + 1)
      if (refClose !== undefined) {
        const ref = source.slice(after + 1, refClose)
        if (ref.trim()) refLabel = ref
        end = refClose + 1
      }
    }
    const refId = normalizeRefLabel(refLabel)
    if (!definitions.has(refId)) return undefined
    const sourceText = source.slice(isImage ? labelStart - 2 : labelStart - 1, end)
    const content = parseNested(label)
    const span = isImage
      ? imageReference(flattenText(content), refId, sourceText)
      : linkReference(content, refId, sourceText)
    return { span, end }
  }

  const autolink: SpanParser = (source, start) => {
    const uri = /([A-Za-z][A-Za-z0-9+.-]{1,31}:[^\s<>]*)>/y
    uri.lastIndex = start
    const uriMatch = uri.exec(source)
    if (uriMatch) return { span: externalLink(uriMatch[1], uriMatch[1]), end: start + uriMatch[0].length }
    const email = /([A-Za-z0-9.!#$%&'*+/=?^_`{|}~-]+@[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?)*)>/y
    email.lastIndex = start
    const emailMatch = email.exec(source)
    if (emailMatch) return { span: externalLink(emailMatch[1], `mailto:${emailMatch[1]}`), end: start + emailMatch[0].length }
    return undefined
  }

  // two or more spaces before a line break
  const hardBreak: SpanParser = (source, start) => {
    const open = start - 1
    if (source.charAt(open - 1) === " ") return undefined
    const run = runLength(source, open, " ")
    if (run < 2 || source.charAt(open + run) !== "\n") return undefined
    return { span: lineBreak(), end: open + run + 1 }
  }

  parsers.set("\\", escape)
  parsers.set("`", codeSpan)
  parsers.set("*", emphasis("*"))
  parsers.set("_", emphasis("_"))
  parsers.set("[", (source, start) => linkOrImage(source, start, false))
  parsers.set("!", (source, start) => (source.charAt(start) === "[" ? linkOrImage(source, start + 1, true) : undefined))
  parsers.set("<", autolink)
  parsers.set(" ", hardBreak)
  return parsers
}

export function parseMarkdownSpans(source: string, definitions: ReadonlySet<string> = new Set()): Span[] {
  return parseSpans(source, createMarkdownSpanParsers(definitions))
}
