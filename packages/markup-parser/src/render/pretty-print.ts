import { isBlockContainer, isSpanContainer, isTextContainer, type Element, type Options } from "../ast"
import type { RenderHandlers, Renderer } from "./render"
import type { MarkupWriter } from "./writer"

/** Longer texts only show their beginning and end. */
export const MAX_TEXT_WIDTH = 50

function isElementValue(value: unknown): value is Element {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string"
}

function isElementArray(value: unknown): value is readonly Element[] {
  return Array.isArray(value) && value.length > 0 && value.every(isElementValue)
}

export function typeName(type: string): string {
  return type
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("")
}

function describeOptions(options: Options): string {
  const parts: string[] = []
  if (options.id !== undefined) parts.push(`Id(${options.id})`)
  if (options.styles.length) parts.push(`Styles(${options.styles.join(",")})`)
  if (options.fallback !== undefined) parts.push(`Fallback(${typeName(options.fallback.type)})`)
  return parts.join(" + ")
}

function describeValue(value: unknown): string {
  if (typeof value === "object" && value !== null) return JSON.stringify(value)
  return String(value)
}

export function truncate(text: string): string {
  const flat = text.replace(/\n/g, "|")
  if (flat.length <= MAX_TEXT_WIDTH) return flat
  const half = MAX_TEXT_WIDTH / 2
  return `${flat.slice(0, half)} [...] ${flat.slice(flat.length - half)}`
}

interface Fields {
  attributes: string[]
  children: [string, Element][]
  lists: [string, readonly Element[]][]
}

function fieldsOf(element: Element): Fields {
  const fields: Fields = { attributes: [], children: [], lists: [] }
  const entries: [string, unknown][] = Object.entries(element)
  for (const [key, value] of entries) {
    if (key === "type" || key === "content" || value === undefined) continue
    if (key === "options") {
      if ("options" in element && element.options) {
        const described = describeOptions(element.options)
        if (described) fields.attributes.push(described)
      }
    } else if (isElementValue(value)) {
      fields.children.push([key, value])
    } else if (isElementArray(value)) {
      fields.lists.push([key, value])
    } else if (!Array.isArray(value) || value.length > 0) {
      fields.attributes.push(describeValue(value))
    }
  }
  return fields
}

function contentKind(element: Element): string {
  if (isBlockContainer(element)) return "Blocks"
  if (isSpanContainer(element)) return "Spans"
  return "Elements"
}

function describeList(out: MarkupWriter, label: string, elements: readonly Element[]) {
  out.newline().raw(`${label}: ${elements.length}`).indented(elements)
}

/** Structural dump of the tree, one element per line. */
function describe(out: MarkupWriter, element: Element) {
  const { attributes, children, lists } = fieldsOf(element)
  const head = typeName(element.type) + (attributes.length ? `(${attributes.join(",")})` : "")

  if (isTextContainer(element)) {
    out.raw(`${head} - '${truncate(element.content)}'`)
    return
  }

  const content = "content" in element && typeof element.content !== "string" ? element.content : undefined
  if (content === undefined) {
    out.raw(head).indented(children.map(([, child]) => child))
    return
  }
  const kind = contentKind(element)
  if (children.length === 0 && lists.length === 0) {
    out.raw(`${head} - ${kind}: ${content.length}`).indented(content)
    return
  }
  out.raw(head).withIndent(() => {
    for (const [, child] of children) out.newline().element(child)
    for (const [key, list] of lists) describeList(out, `${typeName(key)} - Elements`, list)
    describeList(out, `Content - ${kind}`, content)
  })
}

function createHandlers(): RenderHandlers {
  return {
    systemMessage: describe,
    table: describe,
    tableElement: describe,
    reference: describe,
    invalid: describe,
    blockContainer: describe,
    spanContainer: describe,
    listContainer: describe,
    textContainer: describe,
    block: describe,
    span: describe,
    unknown: describe,
  }
}

export const prettyPrintRenderer: Renderer = {
  name: "ast",
  format: { indent: ". ", escape: (text) => text },
  createHandlers,
}
