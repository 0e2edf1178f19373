import type { Span, Text } from "./ast"
import { text } from "./builders"

export interface SpanMatch {
  readonly span: Span
  /** Index of the first character after the parsed span. */
  readonly end: number
}

/**
 * Parser for a nested span. Invoked with `start` pointing at the character after the
 * trigger character; returns `undefined` when the input does not form the span.
 */
export type SpanParser = (source: string, start: number) => SpanMatch | undefined

/** Maps the first character of a span to the parser for that span. */
export type SpanParsers = ReadonlyMap<string, SpanParser>

/**
 * Parses `source` into spans. Text runs end at any trigger character of `parsers`; a
 * trigger whose parser fails is kept as literal text, so parsing never fails and
 * every input character ends up in either a recognized span or a text node.
 */
export function parseSpans(source: string, parsers: SpanParsers): Span[] {
  const result: Span[] = []
  let pending = ""
  let runStart = 0
  let i = 0

  while (i < source.length) {
    const parser = parsers.get(source[i])
    if (!parser) {
      i++
      continue
    }
    pending += source.slice(runStart, i)
    const match = parser(source, i + 1)
    if (match && match.end > i) {
      if (pending) result.push(text(pending))
      pending = ""
      result.push(match.span)
      i = match.end
    } else {
      pending += source[i]
      i++
    }
    runStart = i
  }

  pending += source.slice(runStart)
  if (pending) result.push(text(pending))
  return mergeAdjacentText(result)
}

/**
 * Remembers, per closing delimiter, the earliest position from which a search found
 * nothing. Validity of a closer does not depend on where the search started, so later
 * triggers of the same kind fail without rescanning the rest of the input.
 * Create one per parse.
 */
export class DelimiterSearch {
  private readonly misses = new Map<string, { source: string; from: number }>()

  find(key: string, source: string, from: number, search: (from: number) => number | undefined): number | undefined {
    const miss = this.misses.get(key)
    if (miss !== undefined && miss.source === source && from >= miss.from) return undefined
    const found = search(from)
    if (found === undefined) this.misses.set(key, { source, from })
    return found
  }
}

function isPlainText(span: Span | undefined): span is Text {
  return span !== undefined && span.type === "text" && span.options === undefined
}

/** Joins neighbouring plain text nodes; text carrying options stays separate. */
export function mergeAdjacentText(spans: readonly Span[]): Span[] {
  const merged: Span[] = []
  for (const span of spans) {
    const last = merged[merged.length - 1]
    if (isPlainText(last) && isPlainText(span)) {
      merged[merged.length - 1] = text(last.content + span.content)
    } else {
      merged.push(span)
    }
  }
  return merged
}

/** Whitespace test for markup boundaries; the ends of the input (`""` or `undefined`) count as whitespace. */
export function isInlineWhitespace(char: string | undefined): boolean {
  return !char || char === " " || char === "\n" || char === "\t"
}
