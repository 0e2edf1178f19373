import type { Block, Element, EnumType } from "../ast"
import { createOptions, isEmptyOptions, mergeOptions, optionsOf, styles } from "../options"
import { includesMessage, unresolvedReference, type RenderContext, type RenderHandlers, type Renderer } from "./render"
import { escapeXml, type MarkupWriter } from "./writer"

const LIST_TYPE: Record<EnumType, string | undefined> = {
  arabic: undefined,
  "lower-alpha": "a",
  "upper-alpha": "A",
  "lower-roman": "i",
  "upper-roman": "I",
}

function renderFallback(out: MarkupWriter, element: Element): boolean {
  const fallback = optionsOf(element).fallback
  if (fallback === undefined) return false
  out.element(fallback)
  return true
}

/** A single child stays on the line of its parent tag. */
function renderItemContent(out: MarkupWriter, content: readonly Block[], close: string) {
  if (content.length === 1) out.element(content[0]).raw(close)
  else out.indented(content).newline().raw(close)
}

function createHandlers(context: RenderContext): RenderHandlers {
  return {
    systemMessage(out, message) {
      if (includesMessage(message, context.messageLevel)) {
        out.textTag("span", styles("system-message", message.level), message.content)
      }
    },

    table(out, table) {
      const parts: Element[] = []
      if (table.columns.content.length) parts.push(table.columns)
      if (table.head.content.length) parts.push(table.head)
      if (table.body.content.length) parts.push(table.body)
      out.blockTag("table", table.options, parts)
    },

    tableElement(out, element) {
      switch (element.type) {
        case "columns":
          out.blockTag("colgroup", element.options, element.content)
          break
        case "column":
          out.emptyTag("col", element.options)
          break
        case "table_head":
          out.blockTag("thead", element.options, element.content)
          break
        case "table_body":
          out.blockTag("tbody", element.options, element.content)
          break
        case "row":
          out.blockTag("tr", element.options, element.content)
          break
        case "cell": {
          const tag = element.cellType === "head" ? "th" : "td"
          out.open(tag, element.options, [
            ["colspan", element.colspan > 1 ? element.colspan : undefined],
            ["rowspan", element.rowspan > 1 ? element.rowspan : undefined],
          ])
          renderItemContent(out, element.content, `</${tag}>`)
          break
        }
      }
    },

    reference(out, reference) {
      out.element(unresolvedReference(reference))
    },

    invalid(out, element) {
      if (!includesMessage(element.message, context.messageLevel)) {
        out.element(element.fallback)
      } else if (element.type === "invalid_block") {
        out.raw("<p>").element(element.message).raw("</p>").newline().element(element.fallback)
      } else {
        out.element(element.message).raw(" ").element(element.fallback)
      }
    },

    blockContainer(out, container) {
      switch (container.type) {
        case "document":
          out.lines(container.content)
          return
        case "section":
          out.lines([container.header, ...container.content])
          return
        case "quoted_block":
          out.open("blockquote", container.options).withIndent(() => {
            for (const block of container.content) out.newline().element(block)
            if (container.attribution.length) {
              out.newline().open("p", styles("attribution")).raw("&mdash; ").inline(container.attribution).close("p")
            }
          })
          out.newline().close("blockquote")
          return
        case "bullet_list_item":
        case "enum_list_item":
          out.open("li", container.options)
          renderItemContent(out, container.content, "</li>")
          return
        case "definition_list_item":
          out.inlineTag("dt", container.options, container.term).newline().open("dd")
          renderItemContent(out, container.content, "</dd>")
          return
        case "line_block":
          out.blockTag("div", mergeOptions(styles("line-block"), optionsOf(container)), container.content)
          return
        case "footnote":
        case "citation":
          out
            .open("div", mergeOptions(styles(container.type), optionsOf(container)))
            .withIndent(() => {
              out.newline().textTag("span", styles("label"), `[${container.label}]`)
              for (const block of container.content) out.newline().element(block)
            })
            .newline()
            .close("div")
          return
        case "block_sequence":
          if (isEmptyOptions(optionsOf(container))) {
            out.lines(container.content)
            return
          }
          break
      }
      if (!renderFallback(out, container)) out.blockTag("div", optionsOf(container), container.content)
    },

    spanContainer(out, container) {
      switch (container.type) {
        case "paragraph":
          out.inlineTag("p", container.options, container.content)
          return
        case "emphasized":
          out.inlineTag("em", container.options, container.content)
          return
        case "strong":
          out.inlineTag("strong", container.options, container.content)
          return
        case "line":
          out.inlineTag("div", mergeOptions(styles("line"), optionsOf(container)), container.content)
          return
        case "header":
          out.inlineTag(`h${container.level}`, container.options, container.content)
          return
        case "external_link":
        case "internal_link":
          out.inlineTag("a", container.options, container.content, [
            ["href", container.url],
            ["title", container.title],
          ])
          return
        case "span_sequence":
          if (isEmptyOptions(optionsOf(container))) {
            out.inline(container.content)
            return
          }
          break
      }
      if (!renderFallback(out, container)) {
        if (isEmptyOptions(optionsOf(container))) out.inline(container.content)
        else out.inlineTag("span", container.options, container.content)
      }
    },

    listContainer(out, container) {
      switch (container.type) {
        case "bullet_list":
          out.blockTag("ul", container.options, container.content)
          return
        case "enum_list":
          out.blockTag("ol", container.options, container.content, [
            ["type", LIST_TYPE[container.format.enumType]],
            ["start", container.start !== 1 ? container.start : undefined],
          ])
          return
        case "definition_list":
          out.blockTag("dl", container.options, container.content)
          return
      }
    },

    textContainer(out, container) {
      switch (container.type) {
        case "text":
          out.text(container.content)
          return
        case "literal":
          out.open("code", container.options).preformatted(container.content).close("code")
          return
        case "literal_block": {
          const options = optionsOf(container)
          const code = createOptions({ styles: options.styles.map((style) => `language-${style}`) })
          out.open("pre", createOptions({ id: options.id })).open("code", code).preformatted(container.content)
          out.close("code").close("pre")
          return
        }
        case "comment":
          out.raw(`<!-- ${container.content.replace(/--/g, "- -")} -->`)
          return
      }
      if (!renderFallback(out, container)) out.text(container.content)
    },

    block(out, block) {
      switch (block.type) {
        case "rule":
          out.emptyTag("hr", block.options)
          return
        case "internal_link_target":
          out.open("a", block.options).close("a")
          return
      }
      renderFallback(out, block)
    },

    span(out, span) {
      switch (span.type) {
        case "footnote_link":
          out
            .open("a", mergeOptions(styles("footnote"), optionsOf(span)), [["href", `#${span.id}`]])
            .text(`[${span.label}]`)
            .close("a")
          return
        case "citation_link":
          out
            .open("a", mergeOptions(styles("citation"), optionsOf(span)), [["href", `#${span.id}`]])
            .text(`[${span.label}]`)
            .close("a")
          return
        case "image":
          out.emptyTag("img", span.options, [
            ["src", span.url],
            ["alt", span.text],
            ["title", span.title],
          ])
          return
        case "line_break":
          out.emptyTag("br")
          return
        case "internal_link_target":
          out.open("a", span.options).close("a")
          return
      }
      renderFallback(out, span)
    },

    unknown(out, element) {
      renderFallback(out, element)
    },
  }
}

export const htmlRenderer: Renderer = {
  name: "html",
  format: { indent: "  ", escape: escapeXml, styleAttribute: "class" },
  createHandlers,
}
