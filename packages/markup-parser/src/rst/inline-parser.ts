import { ANONYMOUS_LINK_ID, type InterpretedText, type Span } from "../ast"
import {
  citationReference,
  emphasized,
  externalLink,
  externalLinkDefinition,
  footnoteLabel,
  footnoteReference,
  internalLinkTarget,
  interpretedText,
  linkReference,
  literal,
  spanSequence,
  strong,
  substitutionReference,
  text,
} from "../builders"
import {
  DelimiterSearch,
  isInlineWhitespace,
  mergeAdjacentText,
  parseSpans,
  type SpanMatch,
  type SpanParser,
  type SpanParsers,
} from "../inline-parser"
import { id } from "../options"
import { toLinkId } from "../traversal"
import { DEFAULT_ROLE } from "./text-roles"

const START_PRECEDING = new Set([..."'\"([{<-/:‘“’«¡¿"])
const END_FOLLOWING = new Set([..."'\")]}>-/:.,;!?\\’”»"])
const PAIRS: Record<string, string> = { "(": ")", "[": "]", "{": "}", "<": ">", "'": "'", '"': '"' }

/**
 * Inline markup may only start after whitespace or opening punctuation, must be
 * followed by a non-whitespace character and must not sit inside a quote pair.
 */
function isMarkupStart(source: string, markupStart: number, contentStart: number): boolean {
  const before = source.charAt(markupStart - 1)
  const after = source.charAt(contentStart)
  if (isInlineWhitespace(after)) return false
  if (!isInlineWhitespace(before) && !START_PRECEDING.has(before)) return false
  return PAIRS[before] !== after
}

function isMarkupEnd(source: string, afterEnd: number): boolean {
  const after = source.charAt(afterEnd)
  return isInlineWhitespace(after) || END_FOLLOWING.has(after)
}

/** Finds the next end delimiter preceded by non-whitespace and followed by an end context. */
function findMarkupEnd(source: string, from: number, delimiter: string, escapes = true): number | undefined {
  let i = source.indexOf(delimiter, from)
  while (i !== -1) {
    const before = source.charAt(i - 1)
    if (!isInlineWhitespace(before) && !(escapes && before === "\\") && isMarkupEnd(source, i + delimiter.length)) {
      return i
    }
    i = source.indexOf(delimiter, i + 1)
  }
  return undefined
}

export function unescape(value: string): string {
  return value.replace(/\\([\s\S])/g, (_, char: string) => (/\s/.test(char) ? "" : char))
}

function normalizeName(value: string): string {
  return unescape(value).replace(/\s+/g, " ").trim()
}

const ROLE_NAME = "[A-Za-z0-9](?:[\\w+.-]*[A-Za-z0-9])?"

function phraseReference(content: string, sourceText: string, anonymous: boolean): Span {
  const embedded = content.match(/^([\s\S]*?)\s*<([^<>]+)>$/)
  if (!embedded) {
    const name = normalizeName(content)
    return linkReference(name, anonymous ? ANONYMOUS_LINK_ID : toLinkId(name), sourceText)
  }
  const name = normalizeName(embedded[1])
  const target = embedded[2].trim()
  if (target.endsWith("_") && !target.endsWith("\\_")) {
    const alias = normalizeName(target.slice(0, -1))
    return linkReference(name || alias, toLinkId(alias), sourceText)
  }
  const url = unescape(target).replace(/\s+/g, "")
  const link = externalLink(name || url, url)
  return anonymous || !name ? link : spanSequence([link, externalLinkDefinition(toLinkId(name), url)])
}

/** Reference suffix directly after a closing delimiter. */
function referenceSuffix(source: string, from: number): "" | "_" | "__" {
  if (source.startsWith("__", from)) return "__"
  return source.charAt(from) === "_" ? "_" : ""
}

/** Suffix of interpreted text or a phrase reference whose closing backtick is at `close`. */
function interpretedSuffix(source: string, close: number): { text: string; role?: string } {
  const reference = referenceSuffix(source, close + 1)
  if (reference) return { text: reference }
  const role = new RegExp(`:(${ROLE_NAME}):`, "y")
  role.lastIndex = close + 1
  const match = role.exec(source)
  return match ? { text: match[0], role: match[1] } : { text: "" }
}

function findInterpretedEnd(source: string, from: number): number | undefined {
  let i = source.indexOf("`", from)
  while (i !== -1) {
    const before = source.charAt(i - 1)
    const end = i + 1 + interpretedSuffix(source, i).text.length
    if (!isInlineWhitespace(before) && before !== "\\" && isMarkupEnd(source, end)) return i
    i = source.indexOf("`", i + 1)
  }
  return undefined
}

function findSubstitutionEnd(source: string, from: number): number | undefined {
  let i = source.indexOf("|", from)
  while (i !== -1) {
    const before = source.charAt(i - 1)
    const end = i + 1 + referenceSuffix(source, i + 1).length
    if (!isInlineWhitespace(before) && before !== "\\" && isMarkupEnd(source, end)) return i
    i = source.indexOf("|", i + 1)
  }
  return undefined
}

const footnoteOrCitationReference: SpanParser = (source, start) => {
  if (!isMarkupStart(source, start - 1, start)) return undefined
  const footnote = /(#[A-Za-z0-9]+(?:[-_.][A-Za-z0-9]+)*|#|\*|\d+)\]_/y
  footnote.lastIndex = start
  const footnoteMatch = footnote.exec(source)
  if (footnoteMatch) {
    const end = start + footnoteMatch[0].length
    if (!isMarkupEnd(source, end)) return undefined
    return { span: footnoteReference(footnoteLabel(footnoteMatch[1]), source.slice(start - 1, end)), end }
  }
  const citation = /([A-Za-z0-9]+(?:[-_.][A-Za-z0-9]+)*)\]_/y
  citation.lastIndex = start
  const citationMatch = citation.exec(source)
  if (!citationMatch) return undefined
  const end = start + citationMatch[0].length
  if (!isMarkupEnd(source, end)) return undefined
  return { span: citationReference(citationMatch[1], source.slice(start - 1, end)), end }
}

const escape: SpanParser = (source, start) => {
  const char = source.charAt(start)
  if (char === "") return undefined
  return { span: spanSequence(isInlineWhitespace(char) ? [] : [text(char)]), end: start + 1 }
}

/** Span parsers for one parse; each set keeps its own memory of failed delimiter searches. */
export function createRstSpanParsers(): SpanParsers {
  const search = new DelimiterSearch()
  const markupEnd = (source: string, from: number, delimiter: string, escapes = true) =>
    search.find(escapes ? delimiter : `${delimiter} raw`, source, from, (at) => findMarkupEnd(source, at, delimiter, escapes))

  const emphasisOrStrong: SpanParser = (source, start) => {
    const isStrong = source.charAt(start) === "*"
    const delimiter = isStrong ? "**" : "*"
    const contentStart = isStrong ? start + 1 : start
    if (!isMarkupStart(source, start - 1, contentStart)) return undefined
    const end = markupEnd(source, contentStart + 1, delimiter)
    if (end === undefined) return undefined
    const content = unescape(source.slice(contentStart, end))
    return { span: isStrong ? strong(content) : emphasized(content), end: end + delimiter.length }
  }

  const interpretedOrReference = (source: string, contentStart: number): SpanMatch | undefined => {
    const markupStart = contentStart - 1
    if (!isMarkupStart(source, markupStart, contentStart)) return undefined
    const close = search.find("interpreted", source, contentStart + 1, (at) => findInterpretedEnd(source, at))
    if (close === undefined) return undefined
    const suffix = interpretedSuffix(source, close)
    const end = close + 1 + suffix.text.length
    const content = source.slice(contentStart, close)
    const sourceText = source.slice(markupStart, end)
    if (suffix.text === "_" || suffix.text === "__") {
      return { span: phraseReference(content, sourceText, suffix.text === "__"), end }
    }
    return { span: interpretedText(suffix.role ?? DEFAULT_ROLE, unescape(content), sourceText), end }
  }

  const backtick: SpanParser = (source, start) => {
    if (source.charAt(start) !== "`") return interpretedOrReference(source, start)
    const contentStart = start + 1
    if (!isMarkupStart(source, start - 1, contentStart)) return undefined
    const end = markupEnd(source, contentStart + 1, "``", false)
    if (end === undefined) return undefined
    return { span: literal(source.slice(contentStart, end)), end: end + 2 }
  }

  const substitution: SpanParser = (source, start) => {
    if (!isMarkupStart(source, start - 1, start)) return undefined
    const close = search.find("|", source, start + 1, (at) => findSubstitutionEnd(source, at))
    if (close === undefined) return undefined
    const suffix = referenceSuffix(source, close + 1)
    const end = close + 1 + suffix.length
    const name = normalizeName(source.slice(start, close))
    const sourceText = source.slice(start - 1, end)
    const ref = substitutionReference(name, sourceText)
    const span = suffix ? linkReference([ref], suffix === "__" ? ANONYMOUS_LINK_ID : toLinkId(name), sourceText) : ref
    return { span, end }
  }

  // _`name` defines a target in running text and keeps the name visible
  const inlineTarget: SpanParser = (source, start) => {
    if (source.charAt(start) !== "`") return undefined
    if (!isMarkupStart(source, start - 1, start + 1)) return undefined
    const end = markupEnd(source, start + 2, "`")
    if (end === undefined) return undefined
    const name = normalizeName(source.slice(start + 1, end))
    return { span: spanSequence([internalLinkTarget(id(toLinkId(name))), text(name)]), end: end + 1 }
  }

  return new Map([
    ["*", emphasisOrStrong],
    ["`", backtick],
    ["|", substitution],
    ["[", footnoteOrCitationReference],
    ["_", inlineTarget],
    ["\\", escape],
  ])
}

const SIMPLE_REFERENCE = /(^|[\s'"(\[{<\-/:])([A-Za-z0-9]+(?:[-_.+:][A-Za-z0-9]+)*)(__?)(?=$|[\s'")\]}>\-/:.,;!?\\])/g
const ROLE_PREFIX = new RegExp(`(^|[\\s'"(\\[{<\\-/]):(${ROLE_NAME}):$`)

function simpleReferences(content: string): Span[] {
  const result: Span[] = []
  let last = 0
  for (const match of content.matchAll(SIMPLE_REFERENCE)) {
    const start = (match.index ?? 0) + match[1].length
    if (start > last) result.push(text(content.slice(last, start)))
    const [, , name, suffix] = match
    result.push(linkReference(name, suffix === "__" ? ANONYMOUS_LINK_ID : toLinkId(name), name + suffix))
    last = start + name.length + suffix.length
  }
  if (last < content.length) result.push(text(content.slice(last)))
  return result
}

function hasDefaultRole(span: InterpretedText): boolean {
  return span.source.startsWith("`") && span.source.endsWith("`")
}

/**
 * Text-level pass over parsed spans: simple references, roles written as a prefix,
 * and the unwrapping of escaped characters. Escaped characters stay wrapped until
 * this pass so that they never form part of a simple reference.
 */
function resolveTextRuns(spans: readonly Span[]): Span[] {
  const result: Span[] = []
  let prefixRole: string | undefined
  for (let i = 0; i < spans.length; i++) {
    const span = spans[i]
    if (span.type === "interpreted_text" && prefixRole !== undefined) {
      result.push(interpretedText(prefixRole, span.text, `:${prefixRole}:${span.source}`))
      prefixRole = undefined
    } else if (span.type === "text" && span.options === undefined) {
      let content = span.content
      const next = spans[i + 1]
      if (next !== undefined && next.type === "interpreted_text" && hasDefaultRole(next)) {
        const match = ROLE_PREFIX.exec(content)
        if (match) {
          content = content.slice(0, (match.index ?? 0) + match[1].length)
          prefixRole = match[2]
        }
      }
      result.push(...simpleReferences(content))
    } else if (span.type === "span_sequence" && span.options === undefined) {
      result.push(...span.content)
    } else {
      result.push(span)
    }
  }
  return mergeAdjacentText(result)
}

export function parseRstSpans(source: string): Span[] {
  return resolveTextRuns(parseSpans(source, createRstSpanParsers()))
}
