import {
  isBlock,
  isListItem,
  isSpan,
  isTemporary,
  type Block,
  type Cell,
  type Column,
  type Columns,
  type Element,
  type Header,
  type LineBlockItem,
  type ListItem,
  type Row,
  type RewriteRule,
  type Span,
  type TableBody,
  type TableHead,
  type Temporary,
} from "./ast"
import { ConversionError } from "./errors"

type Rewriter = (element: Element) => Element | null

const isLineBlockItem = (e: Element): e is LineBlockItem => e.type === "line" || e.type === "line_block"
const isRow = (e: Element): e is Row => e.type === "row"
const isCell = (e: Element): e is Cell => e.type === "cell"
const isColumn = (e: Element): e is Column => e.type === "column"
const isHeader = (e: Element): e is Header => e.type === "header"
const isColumns = (e: Element): e is Columns => e.type === "columns"
const isTableHead = (e: Element): e is TableHead => e.type === "table_head"
const isTableBody = (e: Element): e is TableBody => e.type === "table_body"

/** All direct children of an element, in reading order. */
export function childrenOf(element: Element): readonly Element[] {
  switch (element.type) {
    case "section":
      return [element.header, ...element.content]
    case "quoted_block":
      return [...element.content, ...element.attribution]
    case "definition_list_item":
      return [...element.term, ...element.content]
    case "table":
      return [element.columns, element.head, element.body]
    case "substitution_definition":
      return [element.content]
    case "invalid_span":
    case "invalid_block":
      return [element.message, element.fallback]
    default:
      return "content" in element && typeof element.content !== "string" ? element.content : []
  }
}

/**
 * Rewrites one ordered child sequence. Keeps the original array when nothing changed,
 * and rejects replacements that do not belong in the slot.
 */
function rewriteSeq<K extends Element>(
  seq: readonly K[],
  rewrite: Rewriter,
  accept: (element: Element) => element is K,
  slot: string,
): readonly K[] {
  let changed = false
  const result: K[] = []
  for (const child of seq) {
    const next = rewrite(child)
    if (next !== child) changed = true
    if (next === null) continue
    if (!accept(next)) {
      throw new ConversionError("INVALID_REWRITE", `a ${next.type} element cannot be placed into ${slot}`, {
        context: { slot, element: next.type },
      })
    }
    result.push(next)
  }
  return changed ? result : seq
}

function rewriteOne<K extends Element>(
  child: K,
  rewrite: Rewriter,
  accept: (element: Element) => element is K,
  slot: string,
): K {
  const [next] = rewriteSeq([child], rewrite, accept, slot)
  if (next === undefined) {
    throw new ConversionError("INVALID_REWRITE", `the ${slot} element cannot be removed`, { context: { slot } })
  }
  return next
}

/** Applies `rewrite` to every direct child and rebuilds the element when a child changed. */
export function rewriteChildren(element: Element, rewrite: Rewriter): Element {
  const blocks = (seq: readonly Block[]) => rewriteSeq(seq, rewrite, isBlock, "a block sequence")
  const spans = (seq: readonly Span[]) => rewriteSeq(seq, rewrite, isSpan, "a span sequence")
  const items = (seq: readonly ListItem[]) => rewriteSeq(seq, rewrite, isListItem, "a list")

  switch (element.type) {
    case "document":
    case "block_sequence":
    case "bullet_list_item":
    case "enum_list_item":
    case "footnote_definition":
    case "citation":
    case "footnote":
    case "cell":
      return withContent(element, blocks(element.content))
    case "section": {
      const header = rewriteOne(element.header, rewrite, isHeader, "a section header")
      const content = blocks(element.content)
      return header === element.header && content === element.content ? element : { ...element, header, content }
    }
    case "quoted_block": {
      const content = blocks(element.content)
      const attribution = spans(element.attribution)
      return content === element.content && attribution === element.attribution
        ? element
        : { ...element, content, attribution }
    }
    case "definition_list_item": {
      const term = spans(element.term)
      const content = blocks(element.content)
      return term === element.term && content === element.content ? element : { ...element, term, content }
    }
    case "line_block":
      return withContent(element, rewriteSeq(element.content, rewrite, isLineBlockItem, "a line block"))
    case "header":
    case "decorated_header":
    case "span_sequence":
    case "paragraph":
    case "line":
    case "emphasized":
    case "strong":
    case "external_link":
    case "internal_link":
    case "link_reference":
      return withContent(element, spans(element.content))
    case "bullet_list":
    case "enum_list":
    case "definition_list":
      return withContent(element, items(element.content))
    case "table": {
      const columns = rewriteOne(element.columns, rewrite, isColumns, "a table")
      const head = rewriteOne(element.head, rewrite, isTableHead, "a table")
      const body = rewriteOne(element.body, rewrite, isTableBody, "a table")
      return columns === element.columns && head === element.head && body === element.body
        ? element
        : { ...element, columns, head, body }
    }
    case "table_head":
    case "table_body":
      return withContent(element, rewriteSeq(element.content, rewrite, isRow, "a table part"))
    case "columns":
      return withContent(element, rewriteSeq(element.content, rewrite, isColumn, "a column specification"))
    case "row":
      return withContent(element, rewriteSeq(element.content, rewrite, isCell, "a row"))
    case "substitution_definition": {
      const content = rewriteOne(element.content, rewrite, isSpan, "a substitution definition")
      return content === element.content ? element : { ...element, content }
    }
    case "invalid_span": {
      const fallback = rewriteOne(element.fallback, rewrite, isSpan, "an invalid span")
      return fallback === element.fallback ? element : { ...element, fallback }
    }
    case "invalid_block": {
      const fallback = rewriteOne(element.fallback, rewrite, isBlock, "an invalid block")
      return fallback === element.fallback ? element : { ...element, fallback }
    }
    default:
      return element
  }
}

function withContent<E extends { readonly content: readonly unknown[] }>(element: E, content: E["content"]): E {
  return content === element.content ? element : { ...element, content }
}

/**
 * Rewrites a tree bottom-up. For every element the rules are tried in order and the
 * first one that applies wins; elements no rule applies to are kept.
 */
export function rewriteElement(root: Element, rules: readonly RewriteRule[]): Element | null {
  const rewrite: Rewriter = (element) => {
    const withNewChildren = rewriteChildren(element, rewrite)
    for (const rule of rules) {
      const result = rule(withNewChildren)
      if (result !== undefined) return result
    }
    return withNewChildren
  }
  return rewrite(root)
}

export function forEachElement(root: Element, visit: (element: Element) => void): void {
  visit(root)
  for (const child of childrenOf(root)) forEachElement(child, visit)
}

export function collect<T>(root: Element, pick: (element: Element) => T | undefined): T[] {
  const result: T[] = []
  forEachElement(root, (element) => {
    const picked = pick(element)
    if (picked !== undefined) result.push(picked)
  })
  return result
}

export function findTemporaries(root: Element): Temporary[] {
  return collect(root, (element) => (isTemporary(element) ? element : undefined))
}

/** Concatenates the plain text of a span sequence, descending into nested spans. */
export function flattenText(spans: readonly Span[]): string {
  let result = ""
  for (const span of spans) {
    if (span.type === "text" || span.type === "literal") result += span.content
    else if ("content" in span && typeof span.content !== "string") result += flattenText(span.content)
  }
  return result
}

/** Derives an identifier: lower case, non-alphanumeric runs collapsed into one hyphen. */
export function toLinkId(value: string): string {
  return value
    .replace(/[^a-zA-Z0-9]+/g, "-")
    .replace(/^-/, "")
    .replace(/-$/, "")
    .toLowerCase()
}
