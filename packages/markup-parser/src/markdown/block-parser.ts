import type { Block, EnumFormat, ListItem, RawDocument, Span } from "../ast"
import {
  bulletList,
  bulletListItem,
  document,
  enumList,
  enumListItem,
  externalLinkDefinition,
  header,
  literalBlock,
  paragraph,
  quotedBlock,
  rule,
  spanSequence,
} from "../builders"
import { styles } from "../options"
import { normalizeRefLabel, parseListLine, parseRefDefLine, toLines, type ListLine, type RefDefinition } from "../parser-helpers"
import { createMarkdownSpanParsers } from "./inline-parser"
import { parseSpans } from "../inline-parser"

type Trace = (message: string) => void

interface OpenDocument {
  type: "document"
  children: OpenBlock[]
}

interface OpenQuote {
  type: "blockquote"
  children: OpenBlock[]
}

interface OpenList {
  type: "list"
  ordered: boolean
  start: number
  tight: boolean
  bulletChar?: string
  delimiter?: "." | ")"
  children: OpenListItem[]
}

interface OpenListItem {
  type: "list_item"
  /** Columns a line needs to be indented by to continue the item. */
  contentIndent: number
  children: OpenBlock[]
}

interface OpenParagraph {
  type: "paragraph"
  raw: string
}

interface OpenHeading {
  type: "heading"
  level: number
  raw: string
}

interface OpenCode {
  type: "code_block"
  value: string
  fence?: string
  language?: string
}

interface OpenBreak {
  type: "thematic_break"
}

interface OpenDefinition {
  type: "definition"
  definition: RefDefinition
}

type OpenBlock =
  | OpenDocument
  | OpenQuote
  | OpenList
  | OpenListItem
  | OpenParagraph
  | OpenHeading
  | OpenCode
  | OpenBreak
  | OpenDefinition

export interface MarkdownParseOptions {
  /** Receives the decisions of the block parser, one line each. */
  trace?: Trace
}

function noTrace() {}

/** Splits Markdown into blocks with a stack of open containers, one pass over the lines. */
export function blockPhase(markdown: string, trace: Trace = noTrace): OpenDocument {
  const lines = toLines(markdown, 4)
  const doc: OpenDocument = { type: "document", children: [] }
  const stack: OpenBlock[] = [doc]
  let previousLineWasBlank = false

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]
    trace(`Line ${i}: "${line}", Stack: [${stack.map((n) => n.type).join(", ")}]`)

    let offset = 0
    let containerIndex = 1
    let allMatched = true
    while (containerIndex < stack.length) {
      const container = stack[containerIndex]
      if (!canContainLine(container, line, offset, trace)) {
        allMatched = false
        break
      }
      offset = consumeContainerMarkers(container, line, offset, trace)
      containerIndex++
    }

    const trimmedLine = line.slice(offset)
    const isBlank = !trimmedLine.trim()
    const top = stack[stack.length - 1]

    if (allMatched && top.type === "code_block" && top.fence) {
      if (!maybeCloseFencedCodeBlock(stack, trimmedLine)) {
        appendContentToCode(top, trimmedLine)
      }
      continue
    }

    if (!allMatched) {
      // lazy continuation of an open paragraph
      const deepest = stack[stack.length - 1]
      if (deepest.type === "paragraph" && !isBlank && !previousLineWasBlank && !startsBlock(trimmedLine)) {
        deepest.raw += "\n" + trimmedLine.trim()
        previousLineWasBlank = false
        continue
      }
      while (stack.length > containerIndex) {
        closeBlock(stack, trace)
      }
      const last = stack[stack.length - 1]
      if (last.type === "list" && !isBlank && !(parseListLine(trimmedLine) && !isThematicBreak(trimmedLine))) {
        closeBlock(stack, trace)
      }
    }

    if (previousLineWasBlank && !isBlank) markLooseAfterBlank(stack)

    const opened = tryOpenNewContainers(stack, trimmedLine, previousLineWasBlank, trace)
    if (!opened) {
      if (isBlank) {
        handleBlankLine(stack, trace)
      } else {
        const sTop = stack[stack.length - 1]
        if (sTop.type === "paragraph") {
          sTop.raw += "\n" + trimmedLine.trim()
        } else {
          openParagraph(stack, trimmedLine)
        }
      }
    }

    previousLineWasBlank = isBlank
  }

  while (stack.length > 0) {
    closeBlock(stack, trace)
  }
  return doc
}

function openParagraph(stack: OpenBlock[], content: string) {
  const p: OpenParagraph = { type: "paragraph", raw: content.trim() }
  addChild(stack[stack.length - 1], p)
  stack.push(p)
}

function appendContentToCode(block: OpenCode, line: string) {
  block.value = block.value ? block.value + "\n" + line : line
}

function maybeCloseFencedCodeBlock(stack: OpenBlock[], line: string): boolean {
  const top = stack[stack.length - 1]
  if (top.type !== "code_block" || !top.fence) return false
  const trimmed = line.trim()
  const fence = top.fence
  if (trimmed.startsWith(fence) && /^[`~]*$/.test(trimmed) && trimmed[0] === fence[0]) {
    stack.pop()
    return true
  }
  return false
}

function startsBlock(line: string): boolean {
  return (
    isThematicBreak(line) ||
    parseAtxHeading(line) !== null ||
    isFencedCodeStart(line) ||
    /^[ ]{0,3}>/.test(line) ||
    parseListLine(line) !== null
  )
}

export function canContainLine(container: OpenBlock, line: string, offset: number, trace: Trace): boolean {
  const rest = line.slice(offset)
  switch (container.type) {
    case "document":
    case "list":
    case "code_block":
      return true
    case "blockquote":
      return /^[ ]{0,3}>/.test(rest)
    case "list_item": {
      if (!rest.trim()) return true
      const indent = rest.length - rest.trimStart().length
      if (indent >= container.contentIndent) return true
      if (parseListLine(rest)) trace(`Rejecting line "${rest}" in list_item due to new list marker`)
      return false
    }
    case "paragraph":
      return !!rest.trim()
    default:
      return false
  }
}

export function consumeContainerMarkers(container: OpenBlock, line: string, offset: number, trace: Trace): number {
  if (container.type === "blockquote") {
    const match = line.slice(offset).match(/^[ ]{0,3}>( ?)?/)
    if (match) {
      const newOffset = offset + match[0].length
      trace(`Consumed blockquote marker: "${match[0]}", new offset: ${newOffset}`)
      return newOffset
    }
  }
  if (container.type === "list_item") {
    const rest = line.slice(offset)
    return offset + Math.min(container.contentIndent, rest.length - rest.trimStart().length)
  }
  return offset
}

function markLooseAfterBlank(stack: OpenBlock[]) {
  const top = stack[stack.length - 1]
  if (top.type === "list_item" && top.children.length > 0) {
    const list = [...stack].reverse().find((n): n is OpenList => n.type === "list")
    if (list) list.tight = false
  }
}

export function tryOpenNewContainers(stack: OpenBlock[], trimmedLine: string, afterBlank: boolean, trace: Trace): boolean {
  trace(`Trying to open containers with line: "${trimmedLine}", Stack: [${stack.map((n) => n.type).join(", ")}]`)
  const container = stack[stack.length - 1]

  if (container.type === "code_block" && !container.fence && trimmedLine.trim() && !/^ {4}/.test(trimmedLine)) {
    closeBlock(stack, trace)
    return tryOpenNewContainers(stack, trimmedLine, afterBlank, trace)
  }

  // Setext heading under paragraph
  if (container.type === "paragraph") {
    const setext = trimmedLine.match(/^[ ]{0,3}(=+|-+)\s*$/)
    if (setext && container.raw.trim() !== "") {
      stack.pop()
      const parent = stack[stack.length - 1]
      const heading: OpenHeading = {
        type: "heading",
        level: setext[1].startsWith("=") ? 1 : 2,
        raw: container.raw.trim(),
      }
      replaceChild(parent, container, [heading])
      return true
    }
  }

  // Thematic break
  if (isThematicBreak(trimmedLine)) {
    closeParagraphIfOpen(stack, trace)
    addChild(stack[stack.length - 1], { type: "thematic_break" })
    return true
  }

  // ATX heading
  const atx = parseAtxHeading(trimmedLine)
  if (atx) {
    closeParagraphIfOpen(stack, trace)
    addChild(stack[stack.length - 1], atx)
    return true
  }

  // Fenced code block
  const fenced = trimmedLine.match(/^[ ]{0,3}(`{3,}|~{3,})(.*)$/)
  if (fenced && !(fenced[1][0] === "`" && fenced[2].includes("`"))) {
    closeParagraphIfOpen(stack, trace)
    const info = fenced[2].trim()
    const node: OpenCode = {
      type: "code_block",
      language: info ? info.split(/\s+/)[0] : undefined,
      value: "",
      fence: fenced[1],
    }
    addChild(stack[stack.length - 1], node)
    stack.push(node)
    return true
  }

  // Blockquote
  const bqMatch = trimmedLine.match(/^[ ]{0,3}>( ?)?/)
  if (bqMatch) {
    closeParagraphIfOpen(stack, trace)
    const bq: OpenQuote = { type: "blockquote", children: [] }
    addChild(stack[stack.length - 1], bq)
    stack.push(bq)
    trace(`New blockquote opened`)
    const remaining = trimmedLine.slice(bqMatch[0].length)
    if (!tryOpenNewContainers(stack, remaining, false, trace) && remaining.trim()) {
      openParagraph(stack, remaining)
    }
    return true
  }

  // List line; an empty item cannot interrupt a paragraph
  const lineInfo = parseListLine(trimmedLine)
  if (lineInfo && !(container.type === "paragraph" && (!lineInfo.content.trim() || (lineInfo.ordered && lineInfo.start !== 1)))) {
    closeParagraphIfOpen(stack, trace)

    const topNode = stack[stack.length - 1]
    let listNode: OpenList
    if (topNode.type === "list" && sameListType(topNode, lineInfo)) {
      listNode = topNode
      if (afterBlank) listNode.tight = false
      trace(`Continuing existing list: ordered=${listNode.ordered}, bullet=${listNode.bulletChar}, delimiter=${listNode.delimiter}`)
    } else {
      if (topNode.type === "list") closeBlock(stack, trace)
      listNode = {
        type: "list",
        ordered: lineInfo.ordered,
        start: lineInfo.start,
        tight: true,
        bulletChar: lineInfo.bulletChar,
        delimiter: lineInfo.delimiter,
        children: [],
      }
      addChild(stack[stack.length - 1], listNode)
      stack.push(listNode)
      trace(`Creating new list: ordered=${lineInfo.ordered}, bullet=${lineInfo.bulletChar}, delimiter=${lineInfo.delimiter}`)
    }

    const leftover = lineInfo.content
    const markerWidth = trimmedLine.length - leftover.length
    const li: OpenListItem = {
      type: "list_item",
      contentIndent: leftover.trim() ? markerWidth : markerWidth + 1,
      children: [],
    }
    addChild(listNode, li)
    stack.push(li)

    if (leftover.trim() && !tryOpenNewContainers(stack, leftover, false, trace)) {
      openParagraph(stack, leftover)
    }
    return true
  }

  // Indented code; it cannot interrupt a paragraph
  const indentMatch = trimmedLine.match(/^ {4}(.*)$/)
  if (indentMatch && container.type !== "paragraph" && trimmedLine.trim()) {
    const codeLine = indentMatch[1]
    if (container.type === "code_block" && !container.fence) {
      appendContentToCode(container, codeLine)
    } else {
      const cb: OpenCode = { type: "code_block", value: codeLine }
      addChild(container, cb)
      stack.push(cb)
    }
    return true
  }

  return false
}

function sameListType(list: OpenList, info: ListLine) {
  if (list.ordered !== info.ordered) return false
  return info.ordered ? list.delimiter === info.delimiter : list.bulletChar === info.bulletChar
}

export function handleBlankLine(stack: OpenBlock[], trace: Trace) {
  const top = stack[stack.length - 1]
  trace(`Handling blank line with top node type: ${top.type}`)

  if (top.type === "paragraph") {
    closeBlock(stack, trace)
  } else if (top.type === "code_block") {
    appendContentToCode(top, "")
  }
}

/** Pops the innermost open block. A closing paragraph gives up its leading reference definitions. */
export function closeBlock(stack: OpenBlock[], trace: Trace) {
  const block = stack.pop()
  if (!block) return
  trace(`Closing block of type: ${block.type}`)

  if (block.type === "code_block" && !block.fence) {
    block.value = block.value.replace(/(\n *)+$/, "")
  }
  if (block.type === "paragraph") {
    const parent = stack[stack.length - 1]
    const lines = block.raw.split("\n")
    const definitions: OpenDefinition[] = []
    while (lines.length) {
      const def = parseRefDefLine(lines[0])
      if (!def) break
      trace(`Found reference definition: [${def.label}]: ${def.url}`)
      definitions.push({ type: "definition", definition: def })
      lines.shift()
    }
    if (definitions.length && parent) {
      block.raw = lines.join("\n")
      replaceChild(parent, block, lines.length ? [...definitions, block] : definitions)
    }
  }
}

export function isFencedCodeStart(line: string): boolean {
  return /^[ ]{0,3}(`{3,}|~{3,})/.test(line)
}

export function parseAtxHeading(line: string): OpenHeading | null {
  const re = /^[ ]{0,3}(#{1,6})(?:[ \t]+|$)(.*?)(?:[ \t]+#+[ \t]*|[ \t]*)$/
  const m = line.match(re)
  if (!m) return null
  return { type: "heading", level: m[1].length, raw: m[2] || "" }
}

export function isThematicBreak(line: string): boolean {
  if (/^ {4}/.test(line)) return false
  const t = line.trim().replace(/\s+/g, "")
  return /^(?:\*{3,}|-{3,}|_{3,})$/.test(t)
}

function addChild(parent: OpenBlock, child: OpenBlock) {
  if (parent.type === "list") {
    if (child.type === "list_item") parent.children.push(child)
    return
  }
  if (parent.type === "document" || parent.type === "blockquote" || parent.type === "list_item") {
    parent.children.push(child)
  }
}

function replaceChild(parent: OpenBlock, child: OpenBlock, replacement: OpenBlock[]) {
  if (parent.type !== "document" && parent.type !== "blockquote" && parent.type !== "list_item") return
  const idx = parent.children.indexOf(child)
  if (idx !== -1) parent.children.splice(idx, 1, ...replacement)
}

function closeParagraphIfOpen(stack: OpenBlock[], trace: Trace) {
  const top = stack[stack.length - 1]
  if (top?.type === "paragraph") {
    closeBlock(stack, trace)
  }
}

function collectDefinitions(node: OpenBlock, into: Set<string>) {
  if (node.type === "definition") into.add(normalizeRefLabel(node.definition.label))
  if ("children" in node) for (const child of node.children) collectDefinitions(child, into)
}

/** Turns the open block tree into document blocks, parsing the inline content. */
function toBlocks(nodes: readonly OpenBlock[], parseInline: (source: string) => Span[], tight = false): Block[] {
  const blocks: Block[] = []
  for (const node of nodes) {
    switch (node.type) {
      case "paragraph":
        blocks.push(tight ? spanSequence(parseInline(node.raw)) : paragraph(parseInline(node.raw)))
        break
      case "heading":
        blocks.push(header(node.level, parseInline(node.raw.trim())))
        break
      case "code_block":
        blocks.push(literalBlock(node.value, node.language ? styles(node.language) : undefined))
        break
      case "thematic_break":
        blocks.push(rule())
        break
      case "blockquote":
        blocks.push(quotedBlock(toBlocks(node.children, parseInline)))
        break
      case "definition": {
        const { label, url, title } = node.definition
        blocks.push(externalLinkDefinition(normalizeRefLabel(label), url, title))
        break
      }
      case "list":
        blocks.push(toList(node, parseInline))
        break
      default:
        break
    }
  }
  return blocks
}

function toList(list: OpenList, parseInline: (source: string) => Span[]): Block {
  if (!list.ordered) {
    const format = { bullet: list.bulletChar ?? "*" }
    const items: ListItem[] = list.children.map((item) =>
      bulletListItem(toBlocks(item.children, parseInline, list.tight), format),
    )
    return bulletList(items, format)
  }
  const format: EnumFormat = { enumType: "arabic", prefix: "", suffix: list.delimiter ?? "." }
  const items: ListItem[] = list.children.map((item, index) =>
    enumListItem(toBlocks(item.children, parseInline, list.tight), format, list.start + index),
  )
  return enumList(items, format, list.start)
}

export function parseMarkdownDocument(markdown: string, options: MarkdownParseOptions = {}): RawDocument {
  const open = blockPhase(markdown, options.trace)
  const definitions = new Set<string>()
  collectDefinitions(open, definitions)
  const parsers = createMarkdownSpanParsers(definitions)
  const parseInline = (source: string) => parseSpans(source, parsers)
  return { document: document(toBlocks(open.children, parseInline)), rewriteRules: [] }
}

