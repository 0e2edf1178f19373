export * from "./ast"
export * from "./builders"
export * from "./options"
export * from "./traversal"
export { ConversionError, isConversionError, type ConversionErrorCode } from "./errors"
export {
  parseSpans,
  mergeAdjacentText,
  DelimiterSearch,
  type SpanMatch,
  type SpanParser,
  type SpanParsers,
} from "./inline-parser"
export { parseRstDocument, parseBlocks, createBlockContext, type BlockParser, type BlockContext } from "./rst/block-parser"
export { createRstSpanParsers, parseRstSpans } from "./rst/inline-parser"
export { createRstRewriteRules } from "./rst/rewrite-rules"
export { BUILT_IN_ROLES, DEFAULT_ROLE, type TextRole } from "./rst/text-roles"
export { parseMarkdownDocument } from "./markdown/block-parser"
export { createMarkdownSpanParsers, parseMarkdownSpans } from "./markdown/inline-parser"
export { rewrite, createGenericRules, ensureUniqueIds, buildSections } from "./rewrite"
export { MarkupWriter, StringSink, escapeXml, type OutputSink, type WriterFormat } from "./render/writer"
export {
  render,
  renderToString,
  dispatch,
  type Renderer,
  type RenderHandlers,
  type RenderOverride,
  type RenderOptions,
} from "./render/render"
export { docBookRenderer } from "./render/docbook"
export { htmlRenderer } from "./render/html"
export { prettyPrintRenderer } from "./render/pretty-print"
export { createLogger, type Logger, type LogLevel } from "./logger"
export { DebugSession, type DebugSnapshot } from "./debug"
export { orderPlugins, type MarkupPlugin } from "./plugin-system"
export * from "./formats"
export {
  convert,
  convertToSink,
  convertWithDebug,
  toDocument,
  parseDocument,
  resolveOptions,
  convertOptionsSchema,
  type ConvertOptions,
} from "./convert"
