export const MESSAGE_LEVELS = ["debug", "info", "warning", "error", "fatal"] as const

/** Severity of a system message, ordered from `debug` to `fatal`. */
export type MessageLevel = (typeof MESSAGE_LEVELS)[number]

export function compareLevels(a: MessageLevel, b: MessageLevel): number {
  return MESSAGE_LEVELS.indexOf(a) - MESSAGE_LEVELS.indexOf(b)
}

/**
 * Side channel carried by customizable elements.
 * Ids are unique across the whole document, styles keep first-seen order.
 */
export interface Options {
  readonly id?: string
  readonly styles: readonly string[]
  readonly fallback?: Element
}

interface NodeBase<T extends string> { readonly type: T; readonly options?: Options }
interface NodeWithContent<T extends string, C> extends NodeBase<T> { readonly content: readonly C[] }
interface NodeWithText<T extends string> extends NodeBase<T> { readonly content: string }

export interface HeaderDecoration {
  readonly char: string
  readonly overline: boolean
}

export type EnumType = "arabic" | "lower-alpha" | "upper-alpha" | "lower-roman" | "upper-roman"

export interface EnumFormat {
  readonly enumType: EnumType
  readonly prefix: string
  readonly suffix: string
}

export interface BulletFormat {
  readonly bullet: string
}

export type FootnoteLabel =
  | { readonly kind: "autonumber" }
  | { readonly kind: "autosymbol" }
  | { readonly kind: "numeric"; readonly number: number }
  | { readonly kind: "autonumber-label"; readonly label: string }

export type CellType = "head" | "body"

export type Document = { readonly type: "document"; readonly content: readonly Block[] }

export type Section = NodeWithContent<"section", Block> & { readonly header: Header }
export type Header = NodeWithContent<"header", Span> & { readonly level: number }
export type DecoratedHeader = NodeWithContent<"decorated_header", Span> & { readonly decoration: HeaderDecoration }
export type BlockSequence = NodeWithContent<"block_sequence", Block>
export type SpanSequence = NodeWithContent<"span_sequence", Span>
export type Paragraph = NodeWithContent<"paragraph", Span>
export type LiteralBlock = NodeWithText<"literal_block">
export type DoctestBlock = NodeWithText<"doctest_block">
export type QuotedBlock = NodeWithContent<"quoted_block", Block> & { readonly attribution: readonly Span[] }
export type BulletList = NodeWithContent<"bullet_list", ListItem> & { readonly format: BulletFormat }
export type EnumList = NodeWithContent<"enum_list", ListItem> & { readonly format: EnumFormat; readonly start: number }
export type DefinitionList = NodeWithContent<"definition_list", ListItem>
export type BulletListItem = NodeWithContent<"bullet_list_item", Block> & { readonly format: BulletFormat }
export type EnumListItem = NodeWithContent<"enum_list_item", Block> & {
  readonly format: EnumFormat
  readonly position: number
}
export type DefinitionListItem = NodeWithContent<"definition_list_item", Block> & { readonly term: readonly Span[] }
export type Line = NodeWithContent<"line", Span>
export type LineBlock = NodeWithContent<"line_block", LineBlockItem>
export type LineBlockItem = Line | LineBlock
export type Rule = NodeBase<"rule">
export type Comment = NodeWithText<"comment">

export type Table = NodeBase<"table"> & {
  readonly head: TableHead
  readonly body: TableBody
  readonly columns: Columns
}
export type TableHead = NodeWithContent<"table_head", Row>
export type TableBody = NodeWithContent<"table_body", Row>
export type Columns = NodeWithContent<"columns", Column>
export type Column = NodeBase<"column">
export type Row = NodeWithContent<"row", Cell>
export type Cell = NodeWithContent<"cell", Block> & {
  readonly cellType: CellType
  readonly colspan: number
  readonly rowspan: number
}

export type ExternalLinkDefinition = NodeBase<"external_link_definition"> & {
  readonly id: string
  readonly url: string
  readonly title?: string
}
export type LinkAlias = NodeBase<"link_alias"> & { readonly id: string; readonly target: string }
export type FootnoteDefinition = NodeWithContent<"footnote_definition", Block> & { readonly label: FootnoteLabel }
export type InternalLinkTarget = NodeBase<"internal_link_target">
export type Citation = NodeWithContent<"citation", Block> & { readonly label: string }
export type Footnote = NodeWithContent<"footnote", Block> & { readonly label: string }

export type Text = NodeWithText<"text">
export type Emphasized = NodeWithContent<"emphasized", Span>
export type Strong = NodeWithContent<"strong", Span>
export type Literal = NodeWithText<"literal">
export type ExternalLink = NodeWithContent<"external_link", Span> & { readonly url: string; readonly title?: string }
export type InternalLink = NodeWithContent<"internal_link", Span> & { readonly url: string; readonly title?: string }
export type FootnoteLink = NodeBase<"footnote_link"> & { readonly id: string; readonly label: string }
export type CitationLink = NodeBase<"citation_link"> & { readonly id: string; readonly label: string }
export type Image = NodeBase<"image"> & { readonly text: string; readonly url: string; readonly title?: string }
export type LineBreak = NodeBase<"line_break">

/** Id carried by anonymous references and definitions; they pair up in document order. */
export const ANONYMOUS_LINK_ID = "__anonymous"

export type LinkReference = NodeWithContent<"link_reference", Span> & { readonly id: string; readonly source: string }
export type ImageReference = NodeBase<"image_reference"> & {
  readonly text: string
  readonly id: string
  readonly source: string
}
export type FootnoteReference = NodeBase<"footnote_reference"> & { readonly label: FootnoteLabel; readonly source: string }
export type CitationReference = NodeBase<"citation_reference"> & { readonly label: string; readonly source: string }

// reStructuredText temporaries, resolved by the dialect's rewrite rules
export type SubstitutionDefinition = NodeBase<"substitution_definition"> & {
  readonly name: string
  readonly content: Span
}
export type SubstitutionReference = NodeBase<"substitution_reference"> & { readonly id: string; readonly source: string }
export type InterpretedText = NodeBase<"interpreted_text"> & {
  readonly role: string
  readonly text: string
  readonly source: string
}
export type CustomizedTextRole = NodeBase<"customized_text_role"> & {
  readonly name: string
  readonly base: string
  readonly styles: readonly string[]
}

export type SystemMessage = NodeWithText<"system_message"> & { readonly level: MessageLevel }
export type InvalidSpan = NodeBase<"invalid_span"> & { readonly message: SystemMessage; readonly fallback: Span }
export type InvalidBlock = NodeBase<"invalid_block"> & { readonly message: SystemMessage; readonly fallback: Block }

export type Block =
  | Section
  | Header
  | DecoratedHeader
  | BlockSequence
  | SpanSequence
  | Paragraph
  | LiteralBlock
  | DoctestBlock
  | QuotedBlock
  | BulletList
  | EnumList
  | DefinitionList
  | Line
  | LineBlock
  | Rule
  | Comment
  | Table
  | ExternalLinkDefinition
  | LinkAlias
  | FootnoteDefinition
  | InternalLinkTarget
  | Citation
  | Footnote
  | SubstitutionDefinition
  | CustomizedTextRole
  | SystemMessage
  | InvalidBlock

export type Span =
  | Text
  | Emphasized
  | Strong
  | Literal
  | ExternalLink
  | InternalLink
  | FootnoteLink
  | CitationLink
  | Image
  | LineBreak
  | LinkReference
  | ImageReference
  | FootnoteReference
  | CitationReference
  | SubstitutionReference
  | InterpretedText
  | SpanSequence
  | InternalLinkTarget
  | ExternalLinkDefinition
  | LinkAlias
  | SystemMessage
  | InvalidSpan

export type ListItem = BulletListItem | EnumListItem | DefinitionListItem

export type TableElement = TableHead | TableBody | Columns | Column | Row | Cell

export type Element = Document | Block | Span | ListItem | TableElement

export type ElementType = Element["type"]

export type BlockContainer =
  | Document
  | Section
  | BlockSequence
  | QuotedBlock
  | BulletListItem
  | EnumListItem
  | DefinitionListItem
  | LineBlock
  | FootnoteDefinition
  | Citation
  | Footnote
  | Cell
export type SpanContainer =
  | Header
  | DecoratedHeader
  | SpanSequence
  | Paragraph
  | Line
  | Emphasized
  | Strong
  | ExternalLink
  | InternalLink
  | LinkReference
export type ListContainer = BulletList | EnumList | DefinitionList
export type TextContainer = Text | Literal | LiteralBlock | DoctestBlock | Comment | SystemMessage
export type TableContainer = TableHead | TableBody | Columns | Row
export type Reference =
  | LinkReference
  | ImageReference
  | FootnoteReference
  | CitationReference
  | SubstitutionReference
  | InterpretedText
export type Temporary =
  | Reference
  | DecoratedHeader
  | ExternalLinkDefinition
  | LinkAlias
  | FootnoteDefinition
  | SubstitutionDefinition
  | CustomizedTextRole
export type LinkTarget = InternalLinkTarget | Citation | Footnote
export type Invalid = InvalidSpan | InvalidBlock
export type Customizable = Exclude<Element, Document>

/**
 * A parsed document that did not get any rewrite rules applied yet, together with
 * the rules of the dialect that produced it.
 */
export interface RawDocument {
  readonly document: Document
  readonly rewriteRules: readonly RewriteRule[]
}

/**
 * Returns the replacement for an element, `null` to remove it,
 * or `undefined` when the rule does not apply.
 */
export type RewriteRule = (element: Element) => Element | null | undefined

function typeSet<T extends ElementType>(types: Record<T, true>): ReadonlySet<string> {
  return new Set<string>(Object.keys(types))
}

const BLOCK_TYPES = typeSet<Block["type"]>({
  section: true,
  header: true,
  decorated_header: true,
  block_sequence: true,
  span_sequence: true,
  paragraph: true,
  literal_block: true,
  doctest_block: true,
  quoted_block: true,
  bullet_list: true,
  enum_list: true,
  definition_list: true,
  line: true,
  line_block: true,
  rule: true,
  comment: true,
  table: true,
  external_link_definition: true,
  link_alias: true,
  footnote_definition: true,
  internal_link_target: true,
  citation: true,
  footnote: true,
  substitution_definition: true,
  customized_text_role: true,
  system_message: true,
  invalid_block: true,
})

const SPAN_TYPES = typeSet<Span["type"]>({
  text: true,
  emphasized: true,
  strong: true,
  literal: true,
  external_link: true,
  internal_link: true,
  footnote_link: true,
  citation_link: true,
  image: true,
  line_break: true,
  link_reference: true,
  image_reference: true,
  footnote_reference: true,
  citation_reference: true,
  substitution_reference: true,
  interpreted_text: true,
  span_sequence: true,
  internal_link_target: true,
  external_link_definition: true,
  link_alias: true,
  system_message: true,
  invalid_span: true,
})

const LIST_ITEM_TYPES = typeSet<ListItem["type"]>({
  bullet_list_item: true,
  enum_list_item: true,
  definition_list_item: true,
})

const TABLE_ELEMENT_TYPES = typeSet<TableElement["type"]>({
  table_head: true,
  table_body: true,
  columns: true,
  column: true,
  row: true,
  cell: true,
})

const BLOCK_CONTAINER_TYPES = typeSet<BlockContainer["type"]>({
  document: true,
  section: true,
  block_sequence: true,
  quoted_block: true,
  bullet_list_item: true,
  enum_list_item: true,
  definition_list_item: true,
  line_block: true,
  footnote_definition: true,
  citation: true,
  footnote: true,
  cell: true,
})

const SPAN_CONTAINER_TYPES = typeSet<SpanContainer["type"]>({
  header: true,
  decorated_header: true,
  span_sequence: true,
  paragraph: true,
  line: true,
  emphasized: true,
  strong: true,
  external_link: true,
  internal_link: true,
  link_reference: true,
})

const LIST_CONTAINER_TYPES = typeSet<ListContainer["type"]>({
  bullet_list: true,
  enum_list: true,
  definition_list: true,
})

const TEXT_CONTAINER_TYPES = typeSet<TextContainer["type"]>({
  text: true,
  literal: true,
  literal_block: true,
  doctest_block: true,
  comment: true,
  system_message: true,
})

const REFERENCE_TYPES = typeSet<Reference["type"]>({
  link_reference: true,
  image_reference: true,
  footnote_reference: true,
  citation_reference: true,
  substitution_reference: true,
  interpreted_text: true,
})

const TEMPORARY_TYPES = typeSet<Temporary["type"]>({
  link_reference: true,
  image_reference: true,
  footnote_reference: true,
  citation_reference: true,
  substitution_reference: true,
  interpreted_text: true,
  decorated_header: true,
  external_link_definition: true,
  link_alias: true,
  footnote_definition: true,
  substitution_definition: true,
  customized_text_role: true,
})

const LINK_TARGET_TYPES = typeSet<LinkTarget["type"]>({
  internal_link_target: true,
  citation: true,
  footnote: true,
})

export function isBlock(element: Element): element is Block {
  return BLOCK_TYPES.has(element.type)
}

export function isSpan(element: Element): element is Span {
  return SPAN_TYPES.has(element.type)
}

export function isListItem(element: Element): element is ListItem {
  return LIST_ITEM_TYPES.has(element.type)
}

export function isTableElement(element: Element): element is TableElement {
  return TABLE_ELEMENT_TYPES.has(element.type)
}

export function isBlockContainer(element: Element): element is BlockContainer {
  return BLOCK_CONTAINER_TYPES.has(element.type)
}

export function isSpanContainer(element: Element): element is SpanContainer {
  return SPAN_CONTAINER_TYPES.has(element.type)
}

export function isListContainer(element: Element): element is ListContainer {
  return LIST_CONTAINER_TYPES.has(element.type)
}

export function isTextContainer(element: Element): element is TextContainer {
  return TEXT_CONTAINER_TYPES.has(element.type)
}

export function isReference(element: Element): element is Reference {
  return REFERENCE_TYPES.has(element.type)
}

export function isTemporary(element: Element): element is Temporary {
  return TEMPORARY_TYPES.has(element.type)
}

export function isLinkTarget(element: Element): element is LinkTarget {
  return LINK_TARGET_TYPES.has(element.type)
}

export function isInvalid(element: Element): element is Invalid {
  return element.type === "invalid_span" || element.type === "invalid_block"
}
