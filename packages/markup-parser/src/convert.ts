import { z } from "zod"
import { MESSAGE_LEVELS, isInvalid, isReference, type Document, type RawDocument } from "./ast"
import { DebugSession, type DebugSnapshot } from "./debug"
import { ConversionError } from "./errors"
import { INPUT_FORMATS, OUTPUT_FORMATS, type InputFormat, type OutputFormat } from "./formats"
import { silentLogger, type Logger } from "./logger"
import { parseMarkdownDocument } from "./markdown/block-parser"
import {
  isMarkupPlugin,
  orderPlugins,
  pluginName,
  pluginRenderOverrides,
  pluginRewriteRules,
  type MarkupPlugin,
} from "./plugin-system"
import { docBookRenderer } from "./render/docbook"
import { htmlRenderer } from "./render/html"
import { prettyPrintRenderer } from "./render/pretty-print"
import { render, type Renderer } from "./render/render"
import { StringSink, type OutputSink } from "./render/writer"
import { rewrite } from "./rewrite"
import { parseRstDocument } from "./rst/block-parser"
import { collect, findTemporaries } from "./traversal"

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    typeof value.debug === "function" &&
    "warn" in value &&
    typeof value.warn === "function"
  )
}

export const convertOptionsSchema = z.object({
  from: z.enum(INPUT_FORMATS),
  to: z.enum(OUTPUT_FORMATS),
  title: z.string().optional(),
  messageLevel: z.enum(MESSAGE_LEVELS).optional(),
  plugins: z.array(z.custom<MarkupPlugin>(isMarkupPlugin, { message: "not a markup plugin" })).default([]),
  logger: z.custom<Logger>(isLogger, { message: "not a logger" }).optional(),
})

export type ConvertOptions = z.input<typeof convertOptionsSchema>
type ResolvedOptions = z.output<typeof convertOptionsSchema>

export type MarkupFormat = Exclude<InputFormat, "asciidoc">
export type RenderFormat = Exclude<OutputFormat, "pdf">

interface Pipeline {
  from: MarkupFormat
  to: RenderFormat
  title: string
  messageLevel: ResolvedOptions["messageLevel"]
  plugins: MarkupPlugin[]
  logger: Logger
}

/** Validates conversion options. Formats needing an external processor are rejected. */
export function resolveOptions(options: unknown): Pipeline {
  const result = convertOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    throw new ConversionError("INVALID_OPTIONS", `invalid conversion options: ${issues.join("; ")}`, {
      context: { issues },
      cause: result.error,
    })
  }
  const { from, to, title, messageLevel, plugins, logger } = result.data
  if (from === "asciidoc") {
    throw new ConversionError("UNSUPPORTED_FORMAT", "asciidoc input needs an external processor", { context: { from } })
  }
  if (to === "pdf") {
    throw new ConversionError("UNSUPPORTED_FORMAT", "pdf output needs an external formatter", { context: { to } })
  }
  return {
    from,
    to,
    title: title ?? "",
    messageLevel,
    plugins: orderPlugins(plugins),
    logger: logger ?? silentLogger,
  }
}

export function parseDocument(source: string, from: MarkupFormat, trace?: (message: string) => void): RawDocument {
  return from === "rst" ? parseRstDocument(source, { trace }) : parseMarkdownDocument(source, { trace })
}

export function rendererFor(to: RenderFormat): Renderer {
  switch (to) {
    case "docbook":
      return docBookRenderer
    case "ast":
      return prettyPrintRenderer
    default:
      return htmlRenderer
  }
}

/**
 * Temporaries other than references must be gone after rewriting;
 * leftover references are rendered as invalid spans.
 */
export function assertRenderable(document: Document): void {
  const leftovers = findTemporaries(document).filter((element) => !isReference(element))
  if (leftovers.length) {
    const types = [...new Set(leftovers.map((element) => element.type))]
    throw new ConversionError("UNRESOLVED_TEMPORARY", `unresolved temporary elements: ${types.join(", ")}`, {
      context: { types },
    })
  }
}

function resolveDocument(source: string, pipeline: Pipeline, session: DebugSession): Document {
  const { logger } = pipeline
  const raw = parseDocument(source, pipeline.from, session.log)
  logger.debug({ stage: "parse", format: pipeline.from, blocks: raw.document.content.length }, "parsed document")
  session.capture("parse", raw.document)

  const document = rewrite(raw, pluginRewriteRules(pipeline.plugins))
  const messages = collect(document, (element) => (isInvalid(element) ? element.message.content : undefined))
  logger.debug({ stage: "rewrite", invalid: messages.length }, "rewrote document")
  if (messages.length) {
    logger.warn({ count: messages.length, messages: messages.slice(0, 3) }, "document contains invalid elements")
  }
  session.capture("rewrite", document)
  return document
}

function renderResolved(document: Document, sink: OutputSink, pipeline: Pipeline, session: DebugSession) {
  assertRenderable(document)
  const renderer = rendererFor(pipeline.to)
  render(document, sink, renderer, {
    title: pipeline.title,
    messageLevel: pipeline.messageLevel,
    overrides: pluginRenderOverrides(pipeline.plugins),
  })
  pipeline.logger.debug({ stage: "render", format: renderer.name }, "rendered document")
  session.capture("render", document)
}

function applyOnRender(output: string, document: Document, pipeline: Pipeline, session: DebugSession): string {
  let result = output
  for (const plugin of pipeline.plugins) {
    if (plugin.onRender) {
      result = plugin.onRender(result, document)
      session.capture(`onRender(${pluginName(plugin)})`, document)
    }
  }
  return result
}

function convertWith(source: string, options: ConvertOptions, session: DebugSession): string {
  const pipeline = resolveOptions(options)
  const document = resolveDocument(source, pipeline, session)
  const sink = new StringSink()
  renderResolved(document, sink, pipeline, session)
  return applyOnRender(sink.toString(), document, pipeline, session)
}

/** Parses and rewrites `source` without rendering it. */
export function toDocument(source: string, options: ConvertOptions): Document {
  const pipeline = resolveOptions(options)
  return resolveDocument(source, pipeline, new DebugSession(false))
}

export function convert(source: string, options: ConvertOptions): string {
  return convertWith(source, options, new DebugSession(false))
}

/** Streams the output into `sink`. Plugins' `onRender` hooks do not apply here. */
export function convertToSink(source: string, sink: OutputSink, options: ConvertOptions): void {
  const pipeline = resolveOptions(options)
  const session = new DebugSession(false)
  renderResolved(resolveDocument(source, pipeline, session), sink, pipeline, session)
}

export function convertWithDebug(
  source: string,
  options: ConvertOptions,
): { output: string; snapshots: readonly DebugSnapshot[] } {
  const session = new DebugSession()
  const output = convertWith(source, options, session)
  return { output, snapshots: session.snapshots }
}
