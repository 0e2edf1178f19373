import {
  ANONYMOUS_LINK_ID,
  type Block,
  type Document,
  type ExternalLinkDefinition,
  type FootnoteDefinition,
  type FootnoteLabel,
  type Header,
  type LinkAlias,
  type RawDocument,
  type RewriteRule,
} from "./ast"
import {
  citationLink,
  document as documentNode,
  externalLink,
  footnote,
  footnoteLink,
  header,
  image,
  internalLink,
  invalidSpan,
  section,
} from "./builders"
import { ConversionError } from "./errors"
import { id, optionsOf, withOptions } from "./options"
import { findTemporaries, forEachElement, rewriteElement } from "./traversal"

type LinkResolution =
  | { readonly kind: "external"; readonly url: string; readonly title?: string }
  | { readonly kind: "internal"; readonly id: string }

const FOOTNOTE_SYMBOLS = ["*", "†", "‡", "§", "¶", "#", "♠", "♥", "♦", "♣"]

export function footnoteSymbol(index: number): string {
  return FOOTNOTE_SYMBOLS[index % FOOTNOTE_SYMBOLS.length].repeat(Math.floor(index / FOOTNOTE_SYMBOLS.length) + 1)
}

interface ResolvedFootnote {
  readonly id: string
  readonly label: string
}

function labelKey(label: FootnoteLabel): string | undefined {
  switch (label.kind) {
    case "numeric":
      return String(label.number)
    case "autonumber-label":
      return `#${label.label}`
    default:
      return undefined
  }
}

/**
 * Numbers footnotes: explicit numbers are kept, auto-numbered footnotes take the
 * lowest number nobody claimed explicitly, auto-symbol footnotes take the symbols in order.
 */
class FootnoteTable {
  private readonly byKey = new Map<string, ResolvedFootnote>()
  private readonly autoNumbered: ResolvedFootnote[] = []
  private readonly autoSymbol: ResolvedFootnote[] = []
  private autoDefinitionIndex = 0
  private symbolDefinitionIndex = 0
  private autoReferenceIndex = 0
  private symbolReferenceIndex = 0

  constructor(definitions: readonly FootnoteDefinition[], reserve: (base: string) => string) {
    const used = new Set<number>()
    for (const { label } of definitions) if (label.kind === "numeric") used.add(label.number)
    let next = 1
    const nextNumber = () => {
      while (used.has(next)) next++
      used.add(next)
      return next
    }
    for (const { label } of definitions) {
      switch (label.kind) {
        case "numeric":
          this.register(String(label.number), { id: reserve(`footnote-${label.number}`), label: String(label.number) })
          break
        case "autonumber-label": {
          const n = nextNumber()
          this.register(`#${label.label}`, { id: reserve(`footnote-${n}`), label: String(n) })
          break
        }
        case "autonumber": {
          const n = nextNumber()
          this.autoNumbered.push({ id: reserve(`footnote-${n}`), label: String(n) })
          break
        }
        case "autosymbol": {
          const index = this.autoSymbol.length
          this.autoSymbol.push({ id: reserve(`footnote-symbol-${index + 1}`), label: footnoteSymbol(index) })
          break
        }
      }
    }
  }

  private register(key: string, resolved: ResolvedFootnote) {
    if (!this.byKey.has(key)) this.byKey.set(key, resolved)
  }

  definition(label: FootnoteLabel): ResolvedFootnote | undefined {
    const key = labelKey(label)
    if (key !== undefined) return this.byKey.get(key)
    return label.kind === "autonumber"
      ? this.autoNumbered[this.autoDefinitionIndex++]
      : this.autoSymbol[this.symbolDefinitionIndex++]
  }

  reference(label: FootnoteLabel): ResolvedFootnote | undefined {
    const key = labelKey(label)
    if (key !== undefined) return this.byKey.get(key)
    return label.kind === "autonumber"
      ? this.autoNumbered[this.autoReferenceIndex++]
      : this.autoSymbol[this.symbolReferenceIndex++]
  }
}

class LinkTable {
  private readonly definitions = new Map<string, ExternalLinkDefinition>()
  private readonly aliases = new Map<string, string>()
  private readonly internal = new Set<string>()
  private readonly anonymous: (ExternalLinkDefinition | LinkAlias)[] = []
  private anonymousIndex = 0

  constructor(document: Document) {
    forEachElement(document, (element) => {
      switch (element.type) {
        case "external_link_definition":
          if (element.id === ANONYMOUS_LINK_ID) this.anonymous.push(element)
          else if (!this.definitions.has(element.id)) this.definitions.set(element.id, element)
          break
        case "link_alias":
          if (element.id === ANONYMOUS_LINK_ID) this.anonymous.push(element)
          else if (!this.aliases.has(element.id)) this.aliases.set(element.id, element.target)
          break
        case "internal_link_target":
        case "header":
        case "decorated_header": {
          const targetId = element.options?.id
          if (targetId !== undefined) this.internal.add(targetId)
          break
        }
      }
    })
  }

  /** Follows alias chains; a chain that loops back resolves to nothing. */
  resolve(linkId: string, visited: Set<string> = new Set()): LinkResolution | undefined {
    if (visited.has(linkId)) return undefined
    visited.add(linkId)
    const definition = this.definitions.get(linkId)
    if (definition) return { kind: "external", url: definition.url, title: definition.title }
    const alias = this.aliases.get(linkId)
    if (alias !== undefined) return this.resolve(alias, visited)
    return this.internal.has(linkId) ? { kind: "internal", id: linkId } : undefined
  }

  /** Anonymous references take the anonymous definitions in document order. */
  nextAnonymous(): LinkResolution | undefined {
    const definition = this.anonymous[this.anonymousIndex++]
    if (definition === undefined) return undefined
    return definition.type === "link_alias"
      ? this.resolve(definition.target)
      : { kind: "external", url: definition.url, title: definition.title }
  }
}

/** Nests the blocks following each header into sections, by header level. */
export function buildSections(blocks: readonly Block[]): Block[] {
  const result: Block[] = []
  const open: { header: Header; content: Block[] }[] = []
  const append = (block: Block) => {
    const top = open[open.length - 1]
    if (top) top.content.push(block)
    else result.push(block)
  }
  const close = () => {
    const top = open.pop()
    if (top) append(section(top.header, top.content))
  }
  for (const block of blocks) {
    if (block.type === "header") {
      while (open.length && open[open.length - 1].header.level >= block.level) close()
      open.push({ header: block, content: [] })
    } else {
      append(block)
    }
  }
  while (open.length) close()
  return result
}

/** Returns `base`, or `base` with the first free `-2`, `-3`, ... suffix, and marks it used. */
function claimId(used: Set<string>, base: string): string {
  let unique = base
  for (let n = 2; used.has(unique); n++) unique = `${base}-${n}`
  used.add(unique)
  return unique
}

/**
 * The rules every dialect shares: link, image, footnote and citation resolution,
 * removal of definitions and section building. They also cover every temporary
 * a dialect's own rules left behind. Ids of `document` must already be unique;
 * generated footnote ids avoid them.
 */
export function createGenericRules(document: Document): RewriteRule[] {
  const links = new LinkTable(document)
  const footnoteDefinitions: FootnoteDefinition[] = []
  const citations = new Map<string, string>()
  const used = new Set<string>()
  forEachElement(document, (element) => {
    const elementId = optionsOf(element).id
    if (elementId !== undefined) used.add(elementId)
    if (element.type === "footnote_definition") footnoteDefinitions.push(element)
    else if (element.type === "citation" && !citations.has(element.label)) {
      citations.set(element.label, elementId ?? element.label)
    }
  })
  const footnotes = new FootnoteTable(footnoteDefinitions, (base) => claimId(used, base))

  const rule: RewriteRule = (element) => {
    switch (element.type) {
      case "link_reference": {
        const anonymous = element.id === ANONYMOUS_LINK_ID
        const target = anonymous ? links.nextAnonymous() : links.resolve(element.id)
        if (!target) {
          const message = anonymous ? "unresolved anonymous link reference" : `unresolved link reference: ${element.id}`
          return invalidSpan(message, element.source)
        }
        return target.kind === "external"
          ? externalLink(element.content, target.url, target.title, element.options)
          : internalLink(element.content, `#${target.id}`, element.options)
      }
      case "image_reference": {
        const target = element.id === ANONYMOUS_LINK_ID ? links.nextAnonymous() : links.resolve(element.id)
        if (target?.kind !== "external") return invalidSpan(`unresolved image reference: ${element.id}`, element.source)
        return image(element.text, target.url, target.title, element.options)
      }
      case "footnote_reference": {
        const target = footnotes.reference(element.label)
        return target
          ? footnoteLink(target.id, target.label, element.options)
          : invalidSpan(`unresolved footnote reference: ${element.source}`, element.source)
      }
      case "footnote_definition": {
        const target = footnotes.definition(element.label)
        return target ? footnote(target.label, element.content, id(target.id)) : null
      }
      case "citation_reference": {
        const citationId = citations.get(element.label)
        return citationId !== undefined
          ? citationLink(citationId, element.label, element.options)
          : invalidSpan(`unresolved citation reference: ${element.label}`, element.source)
      }
      case "substitution_reference":
        return invalidSpan(`unknown substitution id: ${element.id}`, `|${element.id}|`)
      case "interpreted_text":
        return invalidSpan(`unknown text role: ${element.role}`, element.source)
      case "decorated_header":
        return header(1, element.content, element.options)
      case "external_link_definition":
      case "link_alias":
      case "substitution_definition":
      case "customized_text_role":
        return null
      case "document":
        return element.content.some((block) => block.type === "header")
          ? documentNode(buildSections(element.content))
          : undefined
      default:
        return undefined
    }
  }
  return [rule]
}

/** Gives every element repeating an earlier id a `-2`, `-3`, ... suffix. */
export function ensureUniqueIds(doc: Document): Document {
  const used = new Set<string>()
  const result = rewriteElement(doc, [
    (element) => {
      if (element.type === "document") return undefined
      const current = optionsOf(element).id
      if (current === undefined) return undefined
      const unique = claimId(used, current)
      return unique === current ? undefined : withOptions(element, id(unique))
    },
  ])
  return result !== null && result.type === "document" ? result : doc
}

// references introduced by replacements (substitutions) are resolved by another pass
const MAX_PASSES = 3

/**
 * Makes the ids of a raw document unique, so that references resolve to the
 * element that ends up carrying the id, then applies `extraRules`, the dialect's
 * rules and the generic rules bottom-up. Ids introduced by rules are made unique
 * at the end.
 */
export function rewrite(raw: RawDocument, extraRules: readonly RewriteRule[] = []): Document {
  let current = ensureUniqueIds(raw.document)
  const rules = [...extraRules, ...raw.rewriteRules, ...createGenericRules(current)]
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = rewriteElement(current, rules)
    if (next === null || next.type !== "document") {
      throw new ConversionError("INVALID_REWRITE", "rewrite rules must keep the document root", {
        context: { result: next === null ? "removed" : next.type },
      })
    }
    current = next
    if (findTemporaries(current).length === 0) break
  }
  return ensureUniqueIds(current)
}
