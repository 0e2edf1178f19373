import {
  ANONYMOUS_LINK_ID,
  type Block,
  type BulletListItem,
  type EnumFormat,
  type EnumListItem,
  type EnumType,
  type LineBlock,
  type LineBlockItem,
  type ListItem,
  type Paragraph,
  type RawDocument,
  type Row,
  type Span,
} from "../ast"
import {
  bulletList,
  bulletListItem,
  cell,
  citation,
  column,
  comment,
  customizedTextRole,
  decoratedHeader,
  definitionList,
  definitionListItem,
  doctestBlock,
  document,
  enumList,
  enumListItem,
  externalLinkDefinition,
  footnoteDefinition,
  footnoteLabel,
  image,
  internalLinkTarget,
  invalidBlock,
  line,
  lineBlock,
  linkAlias,
  literalBlock,
  paragraph,
  quotedBlock,
  row,
  rule,
  spanSequence,
  substitutionDefinition,
  table,
  text,
} from "../builders"
import { id, styles, withOptions } from "../options"
import {
  dedent,
  indentedBlock,
  indentOf,
  isBlankLine,
  skipBlankLines,
  toLines,
} from "../parser-helpers"
import { flattenText, toLinkId } from "../traversal"
import { parseRstSpans, unescape } from "./inline-parser"
import { createRstRewriteRules } from "./rewrite-rules"
import { DEFAULT_ROLE } from "./text-roles"

export interface BlockMatch {
  readonly block: Block
  /** Index of the first line after the block. */
  readonly end: number
}

export interface BlockContext {
  parseInline(source: string): Span[]
  parseNested(lines: readonly string[]): Block[]
  trace(message: string): void
}

export type BlockParser = (lines: readonly string[], start: number, context: BlockContext) => BlockMatch | undefined

export interface RstParseOptions {
  /** Receives one line per recognized block. */
  trace?: (message: string) => void
}

const PUNCTUATION = "!-\\/:-@\\[-`{-~"
const PUNCTUATION_CHAR = new RegExp(`^[${PUNCTUATION}]$`)
const DECORATION = new RegExp(`^([${PUNCTUATION}])\\1*$`)

function isPunctuation(char: string): boolean {
  return PUNCTUATION_CHAR.test(char)
}

const BULLET = /^([*+\-•‣⁃])( +|$)/

/** Lines of a list item body, with the marker removed and the body dedented. */
function listItemLines(lines: readonly string[], start: number, markerWidth: number): { lines: string[]; end: number } {
  const firstText = lines[start].slice(markerWidth)
  if (isBlankLine(firstText)) {
    const block = indentedBlock(lines, start, { minIndent: 1 })
    return { lines: dedent(block.lines.slice(1)), end: block.end }
  }
  const block = indentedBlock(lines, start, { minIndent: markerWidth })
  return { lines: [firstText, ...block.lines.slice(1).map((l) => l.slice(markerWidth))], end: block.end }
}

const bulletListBlock: BlockParser = (lines, start, context) => {
  const first = lines[start].match(BULLET)
  if (!first) return undefined
  const format = { bullet: first[1] }
  const items: BulletListItem[] = []
  let i = start
  let end = start
  while (i < lines.length) {
    const marker = lines[i].match(BULLET)
    if (!marker || marker[1] !== format.bullet) break
    const item = listItemLines(lines, i, marker[0].length)
    items.push(bulletListItem(context.parseNested(item.lines), format))
    end = item.end
    i = skipBlankLines(lines, end)
  }
  return { block: bulletList(items, format), end }
}

interface Enumerator {
  format: EnumFormat
  /** `undefined` for the auto-numbering enumerator `#`. */
  value: number | undefined
  width: number
}

const ENUMERATOR = /^(\(?)(\d+|#|[ivxlcdm]+|[IVXLCDM]+|[a-zA-Z])([.)])( +|$)/
const ROMAN_DIGITS: Record<string, number> = { i: 1, v: 5, x: 10, l: 50, c: 100, d: 500, m: 1000 }

export function romanToNumber(value: string): number {
  const digits = [...value.toLowerCase()].map((c) => ROMAN_DIGITS[c] ?? 0)
  return digits.reduce((sum, digit, i) => (digit < (digits[i + 1] ?? 0) ? sum - digit : sum + digit), 0)
}

function parseEnumerator(source: string): Enumerator | undefined {
  const m = source.match(ENUMERATOR)
  if (!m) return undefined
  const [marker, prefix, value, suffix] = m
  if (prefix === "(" && suffix !== ")") return undefined

  let enumType: EnumType
  let number: number | undefined
  if (value === "#") {
    enumType = "arabic"
  } else if (/^\d+$/.test(value)) {
    enumType = "arabic"
    number = parseInt(value, 10)
  } else if (value.length === 1 && value.toLowerCase() !== "i") {
    enumType = value === value.toLowerCase() ? "lower-alpha" : "upper-alpha"
    number = value.toLowerCase().charCodeAt(0) - 96
  } else {
    enumType = value === value.toLowerCase() ? "lower-roman" : "upper-roman"
    number = romanToNumber(value)
  }
  return { format: { enumType, prefix, suffix }, value: number, width: marker.length }
}

function sameFormat(a: EnumFormat, b: EnumFormat): boolean {
  return a.enumType === b.enumType && a.prefix === b.prefix && a.suffix === b.suffix
}

const enumListBlock: BlockParser = (lines, start, context) => {
  const first = parseEnumerator(lines[start])
  if (!first) return undefined
  // a single line starting like "A. Smith" is not a list
  const following = lines[start + 1]
  if (!(isBlankLine(following) || indentOf(following) > 0 || parseEnumerator(following))) return undefined

  const startNumber = first.value ?? 1
  const items: EnumListItem[] = []
  let i = start
  let end = start
  while (i < lines.length) {
    const enumerator = parseEnumerator(lines[i])
    if (!enumerator || !sameFormat(enumerator.format, first.format)) break
    const item = listItemLines(lines, i, enumerator.width)
    items.push(enumListItem(context.parseNested(item.lines), first.format, startNumber + items.length))
    end = item.end
    i = skipBlankLines(lines, end)
  }
  return { block: enumList(items, first.format, startNumber), end }
}

interface LineEntry {
  indent: number
  text: string
}

function buildLineBlock(entries: readonly LineEntry[], from: number, indent: number, context: BlockContext) {
  const items: LineBlockItem[] = []
  let i = from
  while (i < entries.length) {
    const entry = entries[i]
    if (entry.indent < indent) break
    if (entry.indent > indent) {
      const nested = buildLineBlock(entries, i, entry.indent, context)
      items.push(nested.block)
      i = nested.next
    } else {
      items.push(line(context.parseInline(entry.text)))
      i++
    }
  }
  return { block: lineBlock(items), next: i }
}

const lineBlockBlock: BlockParser = (lines, start, context) => {
  if (!/^\|( |$)/.test(lines[start])) return undefined
  const entries: LineEntry[] = []
  let i = start
  while (i < lines.length && !isBlankLine(lines[i])) {
    const current = lines[i]
    const m = current.match(/^\|( *)(.*)$/)
    const last = entries[entries.length - 1]
    if (m) {
      entries.push({ indent: Math.max(0, m[1].length - 1), text: m[2].trimEnd() })
    } else if (indentOf(current) > 0 && last !== undefined) {
      last.text += " " + current.trim()
    } else {
      break
    }
    i++
  }
  const minIndent = Math.min(...entries.map((e) => e.indent))
  const block: LineBlock = buildLineBlock(entries, 0, minIndent, context).block
  return { block, end: i }
}

const HYPERLINK_TARGET = /^_(`(?:[^`\\]|\\.)+`|(?:[^:\\]|\\.)+|_):(?:\s+|$)([\s\S]*)$/
const FOOTNOTE = /^\[(#[A-Za-z0-9]+(?:[-_.][A-Za-z0-9]+)*|#|\*|\d+)\](?: +|$)(.*)$/
const CITATION = /^\[([A-Za-z0-9]+(?:[-_.][A-Za-z0-9]+)*)\](?: +|$)(.*)$/
const SUBSTITUTION = /^\|((?:[^|\\]|\\.)+)\|\s+([A-Za-z][\w-]*)::(?: +|$)(.*)$/
const DIRECTIVE = /^([A-Za-z][\w-]*(?:[.:+][\w-]+)*)::(?: +|$)(.*)$/
const FIELD = /^:([^:]+):(?: +(.*))?$/

function linkName(value: string): string {
  const trimmed = value.trim()
  const unquoted = trimmed.startsWith("`") && trimmed.endsWith("`") ? trimmed.slice(1, -1) : trimmed
  return unescape(unquoted).replace(/\s+/g, " ")
}

function hyperlinkTarget(name: string, target: string, source: string): Block {
  const anonymous = name === "_"
  const linkId = anonymous ? ANONYMOUS_LINK_ID : toLinkId(linkName(name))
  if (!target) return anonymous ? comment(source) : internalLinkTarget(id(linkId))
  if (target.endsWith("_") && !target.endsWith("\\_")) return linkAlias(linkId, toLinkId(linkName(target.slice(0, -1))))
  return externalLinkDefinition(linkId, unescape(target).replace(/\s+/g, ""))
}

interface DirectiveParts {
  args: string
  fields: Map<string, string>
  content: string[]
}

/** Splits a directive body into arguments, the field list and the content block. */
function directiveParts(body: readonly string[]): DirectiveParts {
  const fields = new Map<string, string>()
  const args: string[] = []
  let i = 0
  while (i < body.length && !isBlankLine(body[i]) && !FIELD.test(body[i])) args.push(body[i++].trim())
  while (i < body.length) {
    const field = body[i].match(FIELD)
    if (!field) break
    fields.set(field[1].trim(), (field[2] ?? "").trim())
    i++
  }
  return { args: args.join(" ").trim(), fields, content: dedent(body.slice(i)) }
}

function directive(name: string, body: readonly string[], source: string): Block {
  const parts = directiveParts(body)
  switch (name) {
    case "image": {
      const url = parts.args.replace(/\s+/g, "")
      const classes = parts.fields.get("class")
      return paragraph([image(parts.fields.get("alt") ?? "", url, undefined, classes ? styles(...classes.split(/\s+/)) : undefined)])
    }
    case "role": {
      const m = parts.args.match(/^([\w+.-]+)(?:\(([\w+.-]+)\))?$/)
      if (!m) return invalidBlock(`invalid role definition: ${parts.args}`, literalBlock(source))
      const [, roleName, base] = m
      const classes = parts.fields.get("class")
      return customizedTextRole(roleName, base ?? DEFAULT_ROLE, classes ? classes.split(/\s+/) : [roleName])
    }
    default:
      return invalidBlock(`unknown directive: ${name}`, literalBlock(source))
  }
}

function substitution(name: string, directiveName: string, body: readonly string[], source: string, context: BlockContext): Block {
  const parts = directiveParts(body)
  switch (directiveName) {
    case "replace": {
      const spans = context.parseInline(parts.args)
      return substitutionDefinition(name, spans.length === 1 ? spans[0] : spanSequence(spans))
    }
    case "image":
      return substitutionDefinition(name, image(parts.fields.get("alt") ?? name, parts.args.replace(/\s+/g, "")))
    default:
      return invalidBlock(`unknown substitution directive: ${directiveName}`, literalBlock(source))
  }
}

/** Hyperlink targets, footnotes, citations, substitution definitions, directives and comments. */
const explicitBlock: BlockParser = (lines, start, context) => {
  const first = lines[start]
  const anonymous = first.match(/^__ +(.+)$/)
  const m = first.match(/^\.\.(?: +|$)(.*)$/)
  if (!m && !anonymous) return undefined

  const block = indentedBlock(lines, start, { minIndent: 1 })
  const continuation = dedent(block.lines.slice(1))
  const source = lines.slice(start, block.end).join("\n")
  const end = block.end

  if (anonymous) {
    return { block: hyperlinkTarget("_", [anonymous[1], ...continuation].join("\n").trim(), source), end }
  }

  const firstText = m ? m[1] : ""
  const body = [firstText, ...continuation]
  const target = body.join("\n").match(HYPERLINK_TARGET)
  if (target) return { block: hyperlinkTarget(target[1], target[2].trim(), source), end }

  const contentOf = (rest: string) => (rest.trim() ? [rest, ...continuation] : continuation)

  const footnote = firstText.match(FOOTNOTE)
  if (footnote) {
    return { block: footnoteDefinition(footnoteLabel(footnote[1]), context.parseNested(contentOf(footnote[2]))), end }
  }
  const cite = firstText.match(CITATION)
  if (cite) {
    return { block: citation(cite[1], context.parseNested(contentOf(cite[2])), id(cite[1])), end }
  }
  const subst = firstText.match(SUBSTITUTION)
  if (subst) {
    const name = unescape(subst[1]).replace(/\s+/g, " ").trim()
    return { block: substitution(name, subst[2], [subst[3], ...continuation], source, context), end }
  }
  const dir = firstText.match(DIRECTIVE)
  if (dir) return { block: directive(dir[1], [dir[2], ...continuation], source), end }

  return { block: comment(body.join("\n").trim()), end }
}

const TABLE_BORDER = /^=+( +=+)+ *$/

interface ColumnBounds {
  start: number
}

function columnBounds(border: string): ColumnBounds[] {
  return [...border.matchAll(/=+/g)].map((m) => ({ start: m.index ?? 0 }))
}

function tableRows(sectionLines: readonly string[], columns: readonly ColumnBounds[]): string[][][] {
  const rows: string[][][] = []
  for (const current of sectionLines) {
    if (isBlankLine(current)) continue
    // column span underlines
    if (/^[-\s]+$/.test(current)) continue
    const cells = columns.map((col, i) => {
      const next = columns[i + 1]
      return next === undefined ? current.slice(col.start) : current.slice(col.start, next.start)
    })
    const previous = rows[rows.length - 1]
    if (previous !== undefined && cells[0].trim() === "") {
      cells.forEach((cellText, i) => previous[i].push(cellText))
    } else {
      rows.push(cells.map((cellText) => [cellText]))
    }
  }
  return rows
}

const simpleTable: BlockParser = (lines, start, context) => {
  const border = lines[start]
  if (!TABLE_BORDER.test(border)) return undefined
  const columns = columnBounds(border)
  const sections: string[][] = []
  let current: string[] = []
  let i = start + 1
  let closed = false
  while (i < lines.length) {
    if (TABLE_BORDER.test(lines[i])) {
      sections.push(current)
      current = []
      i++
      if (isBlankLine(lines[i])) {
        closed = true
        break
      }
    } else {
      current.push(lines[i])
      i++
    }
  }
  if (!closed || sections.length === 0) return undefined

  const toRows = (section: readonly string[], cellType: "head" | "body"): Row[] =>
    tableRows(section, columns).map((cells) =>
      row(cells.map((cellLines) => cell(cellType, context.parseNested(dedent(cellLines.map((l) => l.trimEnd())))))),
    )
  const head = sections.length > 1 ? toRows(sections[0], "head") : []
  const body = toRows(sections.length > 1 ? sections.slice(1).flat() : sections[0], "body")
  return { block: table(head, body, columns.map(() => column())), end: i }
}

const doctest: BlockParser = (lines, start) => {
  if (!/^>>>( |$)/.test(lines[start])) return undefined
  let i = start + 1
  while (i < lines.length && !isBlankLine(lines[i])) i++
  return { block: doctestBlock(lines.slice(start, i).join("\n")), end: i }
}

const ATTRIBUTION = /^(---|--|—) */

const blockQuote: BlockParser = (lines, start, context) => {
  if (indentOf(lines[start]) === 0) return undefined
  const quote = indentedBlock(lines, start, {
    minIndent: 1,
    stopAt: (current, i) => isBlankLine(lines[i - 1]) && ATTRIBUTION.test(current.trimStart()),
  })
  let end = quote.end
  let attribution: Span[] = []
  const at = skipBlankLines(lines, quote.end)
  if (at < lines.length && indentOf(lines[at]) === quote.minIndent && ATTRIBUTION.test(lines[at].trimStart())) {
    const block = indentedBlock(lines, at, { minIndent: quote.minIndent, endsOnBlankLine: true })
    const textLines = block.lines.map((l) => l.trim())
    textLines[0] = textLines[0].replace(ATTRIBUTION, "")
    attribution = context.parseInline(textLines.join("\n"))
    end = block.end
  }
  return { block: quotedBlock(context.parseNested(dedent(quote.lines)), attribution), end }
}

const overlineHeader: BlockParser = (lines, start, context) => {
  const overline = lines[start].trimEnd()
  if (overline.length < 2 || !DECORATION.test(overline)) return undefined
  if (start + 2 >= lines.length) return undefined
  const title = lines[start + 1]
  if (isBlankLine(title) || title.trimEnd().length > overline.length) return undefined
  if (lines[start + 2].trimEnd() !== overline) return undefined
  return {
    block: decoratedHeader({ char: overline[0], overline: true }, context.parseInline(title.trim())),
    end: start + 3,
  }
}

const transition: BlockParser = (lines, start) => {
  const current = lines[start].trimEnd()
  if (current.length < 4 || !DECORATION.test(current)) return undefined
  if (!isBlankLine(lines[start + 1])) return undefined
  return { block: rule(), end: start + 1 }
}

const underlineHeader: BlockParser = (lines, start, context) => {
  const titleLine = lines[start]
  if (indentOf(titleLine) > 0 || start + 1 >= lines.length) return undefined
  const underline = lines[start + 1].trimEnd()
  const title = titleLine.trim()
  if (!DECORATION.test(underline) || underline.length < title.length) return undefined
  return {
    block: decoratedHeader({ char: underline[0], overline: false }, context.parseInline(title)),
    end: start + 2,
  }
}

function isTermAt(lines: readonly string[], i: number): boolean {
  if (i + 1 >= lines.length) return false
  const term = lines[i]
  const next = lines[i + 1]
  return !isBlankLine(term) && indentOf(term) === 0 && !/^\.\.( |$)/.test(term) && !isBlankLine(next) && indentOf(next) > 0
}

const definitionListBlock: BlockParser = (lines, start, context) => {
  if (!isTermAt(lines, start)) return undefined
  const items: ListItem[] = []
  let i = start
  let end = start
  while (i < lines.length && isTermAt(lines, i)) {
    // classifiers after " : " are not kept
    const term = lines[i].split(/ +: +/)[0].trim()
    const definition = indentedBlock(lines, i + 1, { minIndent: 1 })
    items.push(definitionListItem(context.parseInline(term), context.parseNested(dedent(definition.lines))))
    end = definition.end
    i = skipBlankLines(lines, end)
  }
  return { block: definitionList(items), end }
}

function paragraphBlock(lines: readonly string[], start: number, context: BlockContext): BlockMatch {
  let i = start + 1
  while (i < lines.length && !isBlankLine(lines[i])) i++
  return { block: paragraph(context.parseInline(lines.slice(start, i).join("\n"))), end: i }
}

/** Only used for the block following a paragraph that ends with `::`. */
const literalBlockParser: BlockParser = (lines, start) => {
  const first = lines[start]
  if (indentOf(first) > 0) {
    const block = indentedBlock(lines, start, { minIndent: 1 })
    return { block: literalBlock(dedent(block.lines).join("\n")), end: block.end }
  }
  const quote = first.charAt(0)
  if (!isPunctuation(quote)) return undefined
  let i = start
  while (i < lines.length && lines[i].startsWith(quote)) i++
  return { block: literalBlock(lines.slice(start, i).join("\n")), end: i }
}

const BLOCK_PARSERS: ReadonlyArray<readonly [string, BlockParser]> = [
  ["bullet list", bulletListBlock],
  ["enumerated list", enumListBlock],
  ["line block", lineBlockBlock],
  ["explicit markup", explicitBlock],
  ["simple table", simpleTable],
  ["doctest", doctest],
  ["block quote", blockQuote],
  ["overlined header", overlineHeader],
  ["transition", transition],
  ["underlined header", underlineHeader],
  ["definition list", definitionListBlock],
]

function parseBlock(lines: readonly string[], start: number, context: BlockContext): BlockMatch {
  for (const [name, parser] of BLOCK_PARSERS) {
    const match = parser(lines, start, context)
    if (match && match.end > start) {
      context.trace(`${name} at line ${start + 1}`)
      return match
    }
  }
  context.trace(`paragraph at line ${start + 1}`)
  return paragraphBlock(lines, start, context)
}

/**
 * Strips a trailing `::` from a paragraph. Returns `undefined` for the paragraph
 * when nothing but the marker was left.
 */
function processLiteralMarker(par: Paragraph): { paragraph: Paragraph | undefined; literalNext: boolean } {
  const last = par.content[par.content.length - 1]
  if (last === undefined || last.type !== "text") return { paragraph: par, literalNext: false }
  const trimmed = last.content.trimEnd()
  if (!trimmed.endsWith("::")) return { paragraph: par, literalNext: false }
  if (par.content.length === 1 && trimmed.trim() === "::") return { paragraph: undefined, literalNext: true }

  let stripped = trimmed.slice(0, -2)
  if (stripped.endsWith(" ")) stripped = stripped.slice(0, -1)
  const init = par.content.slice(0, -1)
  const content = stripped ? [...init, text(stripped, last.options)] : init
  return { paragraph: { ...par, content }, literalNext: true }
}

/**
 * Folds adjacent blocks that only make sense together: chained internal targets
 * become aliases, a target directly before an external definition names that
 * definition, and decorated headers get an id derived from their text.
 */
function foldBlocks(blocks: readonly Block[]): Block[] {
  const result: Block[] = []
  for (let i = 0; i < blocks.length; i++) {
    const current = blocks[i]
    const next = i + 1 < blocks.length ? blocks[i + 1] : undefined
    if (current.type === "internal_link_target" && current.options?.id !== undefined && next !== undefined) {
      const targetId = current.options.id
      if (next.type === "internal_link_target" && next.options?.id !== undefined) {
        result.push(linkAlias(targetId, next.options.id))
        continue
      }
      if (next.type === "external_link_definition") {
        result.push({ ...next, id: targetId })
        continue
      }
    }
    if (current.type === "decorated_header") {
      const headerId = toLinkId(flattenText(current.content))
      result.push(headerId ? withOptions(current, id(headerId)) : current)
      continue
    }
    result.push(current)
  }
  return result
}

/**
 * Parses a sequence of lines into blocks. A paragraph ending in `::` switches the
 * parser for the following block to the literal block parser.
 */
export function parseBlocks(lines: readonly string[], context: BlockContext): Block[] {
  const blocks: Block[] = []
  let literalNext = false
  let i = skipBlankLines(lines, 0)
  while (i < lines.length) {
    const literal = literalNext ? literalBlockParser(lines, i, context) : undefined
    if (literal) context.trace(`literal block at line ${i + 1}`)
    const match = literal ?? parseBlock(lines, i, context)
    literalNext = false
    i = skipBlankLines(lines, match.end)
    if (match.block.type === "paragraph") {
      const processed = processLiteralMarker(match.block)
      literalNext = processed.literalNext
      if (processed.paragraph) blocks.push(processed.paragraph)
    } else {
      blocks.push(match.block)
    }
  }
  return foldBlocks(blocks)
}

export function createBlockContext(trace: (message: string) => void = () => undefined): BlockContext {
  const context: BlockContext = {
    parseInline: parseRstSpans,
    parseNested: (lines) => parseBlocks(lines, context),
    trace,
  }
  return context
}

export function parseRstDocument(source: string, options: RstParseOptions = {}): RawDocument {
  const doc = document(parseBlocks(toLines(source), createBlockContext(options.trace)))
  return { document: doc, rewriteRules: createRstRewriteRules(doc) }
}
