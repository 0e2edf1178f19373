import {
  compareLevels,
  isBlock,
  isBlockContainer,
  isInvalid,
  isListContainer,
  isReference,
  isSpan,
  isSpanContainer,
  isTableElement,
  isTextContainer,
  type Block,
  type BlockContainer,
  type Element,
  type Invalid,
  type InvalidSpan,
  type ListContainer,
  type MessageLevel,
  type Reference,
  type Span,
  type SpanContainer,
  type SystemMessage,
  type Table,
  type TableElement,
  type TextContainer,
} from "../ast"
import { invalidSpan } from "../builders"
import { MarkupWriter, StringSink, type OutputSink, type WriterFormat } from "./writer"

export interface RenderContext {
  readonly title: string
  /** Messages below this level are not shown. Without a level no message is shown. */
  readonly messageLevel?: MessageLevel
}

/** One handler per capability, tried in the order of the fields. */
export interface RenderHandlers {
  systemMessage(out: MarkupWriter, message: SystemMessage): void
  table(out: MarkupWriter, table: Table): void
  tableElement(out: MarkupWriter, element: TableElement): void
  reference(out: MarkupWriter, reference: Reference): void
  invalid(out: MarkupWriter, element: Invalid): void
  blockContainer(out: MarkupWriter, container: BlockContainer): void
  spanContainer(out: MarkupWriter, container: SpanContainer): void
  listContainer(out: MarkupWriter, container: ListContainer): void
  textContainer(out: MarkupWriter, container: TextContainer): void
  block(out: MarkupWriter, block: Block): void
  span(out: MarkupWriter, span: Span): void
  unknown(out: MarkupWriter, element: Element): void
}

export interface Renderer {
  readonly name: string
  readonly format: WriterFormat
  createHandlers(context: RenderContext): RenderHandlers
}

/**
 * Renders `element` itself when it returns true; returning false hands the
 * element on to the next override and finally to the renderer.
 */
export type RenderOverride = (element: Element, out: MarkupWriter, renderer: string) => boolean

export interface RenderOptions {
  title?: string
  messageLevel?: MessageLevel
  overrides?: readonly RenderOverride[]
}

export function dispatch(handlers: RenderHandlers, out: MarkupWriter, element: Element): void {
  if (element.type === "system_message") return handlers.systemMessage(out, element)
  if (element.type === "table") return handlers.table(out, element)
  if (isTableElement(element)) return handlers.tableElement(out, element)
  if (isReference(element)) return handlers.reference(out, element)
  if (isInvalid(element)) return handlers.invalid(out, element)
  if (isBlockContainer(element)) return handlers.blockContainer(out, element)
  if (isSpanContainer(element)) return handlers.spanContainer(out, element)
  if (isListContainer(element)) return handlers.listContainer(out, element)
  if (isTextContainer(element)) return handlers.textContainer(out, element)
  if (isBlock(element)) return handlers.block(out, element)
  if (isSpan(element)) return handlers.span(out, element)
  return handlers.unknown(out, element)
}

export function includesMessage(message: SystemMessage, floor: MessageLevel | undefined): boolean {
  return floor !== undefined && compareLevels(message.level, floor) >= 0
}

/** References still present at render time are shown as errors with their source as fallback. */
export function unresolvedReference(reference: Reference): InvalidSpan {
  return invalidSpan(`unresolved reference: ${reference.source}`, reference.source)
}

export function render(element: Element, sink: OutputSink, renderer: Renderer, options: RenderOptions = {}): void {
  const handlers = renderer.createHandlers({ title: options.title ?? "", messageLevel: options.messageLevel })
  const overrides = options.overrides ?? []
  const out = new MarkupWriter(sink, renderer.format, (child, writer) => {
    for (const override of overrides) {
      if (override(child, writer, renderer.name)) return
    }
    dispatch(handlers, writer, child)
  })
  out.element(element)
}

export function renderToString(element: Element, renderer: Renderer, options: RenderOptions = {}): string {
  const sink = new StringSink()
  render(element, sink, renderer, options)
  return sink.toString()
}
