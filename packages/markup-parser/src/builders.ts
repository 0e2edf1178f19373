import type {
  Block,
  BlockSequence,
  CitationLink,
  CitationReference,
  Column,
  CustomizedTextRole,
  DoctestBlock,
  FootnoteDefinition,
  FootnoteLink,
  FootnoteReference,
  ImageReference,
  InterpretedText,
  LineBreak,
  LinkAlias,
  SubstitutionDefinition,
  SubstitutionReference,
  BulletFormat,
  BulletList,
  BulletListItem,
  Cell,
  CellType,
  Citation,
  Comment,
  DecoratedHeader,
  DefinitionList,
  DefinitionListItem,
  Document,
  Emphasized,
  EnumFormat,
  EnumList,
  EnumListItem,
  ExternalLink,
  ExternalLinkDefinition,
  Footnote,
  FootnoteLabel,
  Header,
  HeaderDecoration,
  Image,
  InternalLink,
  InternalLinkTarget,
  InvalidBlock,
  InvalidSpan,
  Line,
  LineBlock,
  LineBlockItem,
  LinkReference,
  ListItem,
  Literal,
  LiteralBlock,
  MessageLevel,
  Options,
  Paragraph,
  QuotedBlock,
  Row,
  Rule,
  Section,
  Span,
  SpanSequence,
  Strong,
  SystemMessage,
  Table,
  Text,
} from "./ast"
import { fallback, NO_OPT } from "./options"

function opt(options: Options | undefined): { options?: Options } {
  return options && options !== NO_OPT ? { options } : {}
}

function spans(content: readonly Span[] | string): readonly Span[] {
  return typeof content === "string" ? [text(content)] : content
}

export function document(content: readonly Block[]): Document {
  return { type: "document", content }
}

export function text(content: string, options?: Options): Text {
  return { type: "text", content, ...opt(options) }
}

export function literal(content: string, options?: Options): Literal {
  return { type: "literal", content, ...opt(options) }
}

export function emphasized(content: readonly Span[] | string, options?: Options): Emphasized {
  return { type: "emphasized", content: spans(content), ...opt(options) }
}

export function strong(content: readonly Span[] | string, options?: Options): Strong {
  return { type: "strong", content: spans(content), ...opt(options) }
}

export function paragraph(content: readonly Span[] | string, options?: Options): Paragraph {
  return { type: "paragraph", content: spans(content), ...opt(options) }
}

export function blockSequence(content: readonly Block[], options?: Options): BlockSequence {
  return { type: "block_sequence", content, ...opt(options) }
}

export function spanSequence(content: readonly Span[], options?: Options): SpanSequence {
  return { type: "span_sequence", content, ...opt(options) }
}

export function header(level: number, content: readonly Span[] | string, options?: Options): Header {
  return { type: "header", level, content: spans(content), ...opt(options) }
}

export function decoratedHeader(
  decoration: HeaderDecoration,
  content: readonly Span[] | string,
  options?: Options,
): DecoratedHeader {
  return { type: "decorated_header", decoration, content: spans(content), ...opt(options) }
}

export function section(headerNode: Header, content: readonly Block[], options?: Options): Section {
  return { type: "section", header: headerNode, content, ...opt(options) }
}

export function literalBlock(content: string, options?: Options): LiteralBlock {
  return { type: "literal_block", content, ...opt(options) }
}

export function quotedBlock(content: readonly Block[], attribution: readonly Span[] = [], options?: Options): QuotedBlock {
  return { type: "quoted_block", content, attribution, ...opt(options) }
}

export function bulletList(content: readonly ListItem[], format: BulletFormat, options?: Options): BulletList {
  return { type: "bullet_list", content, format, ...opt(options) }
}

export function bulletListItem(content: readonly Block[], format: BulletFormat, options?: Options): BulletListItem {
  return { type: "bullet_list_item", content, format, ...opt(options) }
}

export function enumList(content: readonly ListItem[], format: EnumFormat, start = 1, options?: Options): EnumList {
  return { type: "enum_list", content, format, start, ...opt(options) }
}

export function enumListItem(
  content: readonly Block[],
  format: EnumFormat,
  position: number,
  options?: Options,
): EnumListItem {
  return { type: "enum_list_item", content, format, position, ...opt(options) }
}

export function definitionList(content: readonly ListItem[], options?: Options): DefinitionList {
  return { type: "definition_list", content, ...opt(options) }
}

export function definitionListItem(
  term: readonly Span[] | string,
  content: readonly Block[],
  options?: Options,
): DefinitionListItem {
  return { type: "definition_list_item", term: spans(term), content, ...opt(options) }
}

export function line(content: readonly Span[] | string, options?: Options): Line {
  return { type: "line", content: spans(content), ...opt(options) }
}

export function lineBlock(content: readonly LineBlockItem[], options?: Options): LineBlock {
  return { type: "line_block", content, ...opt(options) }
}

/** A doctest block falls back to a literal block for renderers that do not know it. */
export function doctestBlock(content: string): DoctestBlock {
  return { type: "doctest_block", content, options: fallback(literalBlock(content)) }
}

export function rule(options?: Options): Rule {
  return { type: "rule", ...opt(options) }
}

export function comment(content: string, options?: Options): Comment {
  return { type: "comment", content, ...opt(options) }
}

export function cell(cellType: CellType, content: readonly Block[], colspan = 1, rowspan = 1, options?: Options): Cell {
  return { type: "cell", cellType, content, colspan, rowspan, ...opt(options) }
}

export function row(content: readonly Cell[], options?: Options): Row {
  return { type: "row", content, ...opt(options) }
}

export function column(options?: Options): Column {
  return { type: "column", ...opt(options) }
}

export function table(head: readonly Row[], body: readonly Row[], columns: readonly Column[] = [], options?: Options): Table {
  return {
    type: "table",
    head: { type: "table_head", content: head },
    body: { type: "table_body", content: body },
    columns: { type: "columns", content: columns },
    ...opt(options),
  }
}

export function externalLinkDefinition(linkId: string, url: string, title?: string): ExternalLinkDefinition {
  return title === undefined
    ? { type: "external_link_definition", id: linkId, url }
    : { type: "external_link_definition", id: linkId, url, title }
}

export function linkAlias(linkId: string, target: string): LinkAlias {
  return { type: "link_alias", id: linkId, target }
}

export function footnoteDefinition(label: FootnoteLabel, content: readonly Block[]): FootnoteDefinition {
  return { type: "footnote_definition", label, content }
}

export function internalLinkTarget(options: Options): InternalLinkTarget {
  return { type: "internal_link_target", ...opt(options) }
}

export function externalLink(content: readonly Span[] | string, url: string, title?: string, options?: Options): ExternalLink {
  return { type: "external_link", content: spans(content), url, ...(title === undefined ? {} : { title }), ...opt(options) }
}

export function internalLink(content: readonly Span[] | string, url: string, options?: Options): InternalLink {
  return { type: "internal_link", content: spans(content), url, ...opt(options) }
}

export function linkReference(content: readonly Span[] | string, linkId: string, source: string): LinkReference {
  return { type: "link_reference", content: spans(content), id: linkId, source }
}

export function imageReference(altText: string, linkId: string, source: string): ImageReference {
  return { type: "image_reference", text: altText, id: linkId, source }
}

export function footnoteReference(label: FootnoteLabel, source: string): FootnoteReference {
  return { type: "footnote_reference", label, source }
}

export function citationReference(label: string, source: string): CitationReference {
  return { type: "citation_reference", label, source }
}

export function footnoteLink(linkId: string, label: string, options?: Options): FootnoteLink {
  return { type: "footnote_link", id: linkId, label, ...opt(options) }
}

export function citationLink(linkId: string, label: string, options?: Options): CitationLink {
  return { type: "citation_link", id: linkId, label, ...opt(options) }
}

export function lineBreak(): LineBreak {
  return { type: "line_break" }
}

export function substitutionDefinition(name: string, content: Span): SubstitutionDefinition {
  return { type: "substitution_definition", name, content }
}

export function substitutionReference(name: string, source: string): SubstitutionReference {
  return { type: "substitution_reference", id: name, source }
}

export function interpretedText(role: string, content: string, source: string): InterpretedText {
  return { type: "interpreted_text", role, text: content, source }
}

export function customizedTextRole(name: string, base: string, roleStyles: readonly string[]): CustomizedTextRole {
  return { type: "customized_text_role", name, base, styles: roleStyles }
}

export function image(altText: string, url: string, title?: string, options?: Options): Image {
  return { type: "image", text: altText, url, ...(title === undefined ? {} : { title }), ...opt(options) }
}

export function footnote(label: string, content: readonly Block[], options?: Options): Footnote {
  return { type: "footnote", label, content, ...opt(options) }
}

export function citation(label: string, content: readonly Block[], options?: Options): Citation {
  return { type: "citation", label, content, ...opt(options) }
}

export function footnoteLabel(raw: string): FootnoteLabel {
  if (raw === "#") return { kind: "autonumber" }
  if (raw === "*") return { kind: "autosymbol" }
  if (raw.startsWith("#")) return { kind: "autonumber-label", label: raw.slice(1) }
  return { kind: "numeric", number: parseInt(raw, 10) }
}

export function systemMessage(level: MessageLevel, content: string): SystemMessage {
  return { type: "system_message", level, content }
}

export function invalidSpan(message: string, fallbackText: string, level: MessageLevel = "error"): InvalidSpan {
  return { type: "invalid_span", message: systemMessage(level, message), fallback: text(fallbackText) }
}

export function invalidBlock(message: string, fallbackBlock: Block, level: MessageLevel = "error"): InvalidBlock {
  return { type: "invalid_block", message: systemMessage(level, message), fallback: fallbackBlock }
}
