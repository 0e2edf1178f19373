import type { Block, EnumType, Element, Table } from "../ast"
import { isEmptyOptions, mergeOptions, optionsOf, styles } from "../options"
import { includesMessage, unresolvedReference, type RenderContext, type RenderHandlers, type Renderer } from "./render"
import { escapeXml, type MarkupWriter } from "./writer"

const DOCTYPE =
  '<!DOCTYPE article PUBLIC "-//OASIS//DTD DocBook XML V4.5//EN" "http://www.oasis-open.org/docbook/xml/4.5/docbookx.dtd">'

const NUMERATION: Record<EnumType, string | undefined> = {
  arabic: undefined,
  "lower-alpha": "loweralpha",
  "upper-alpha": "upperalpha",
  "lower-roman": "lowerroman",
  "upper-roman": "upperroman",
}

/** Renders a fallback when the element carries one. */
function renderFallback(out: MarkupWriter, element: Element): boolean {
  const fallback = optionsOf(element).fallback
  if (fallback === undefined) return false
  out.element(fallback)
  return true
}

/** A single paragraph or span sequence collapses into one `para`. */
function renderBlocks(out: MarkupWriter, blocks: readonly Block[], close: string) {
  const [only] = blocks
  if (blocks.length === 1 && only.type === "span_sequence") {
    out.raw("<para>").element(only).raw("</para>").raw(close)
  } else if (blocks.length === 1 && only.type === "paragraph") {
    out.inlineTag("para", only.options, only.content).raw(close)
  } else {
    out.indented(blocks).newline().raw(close)
  }
}

/** Column count comes from the first body row, or the first head row of a table without body. */
export function columnCount(table: Table): number {
  const [firstRow] = table.body.content.length ? table.body.content : table.head.content
  return firstRow ? firstRow.content.length : 0
}

function createHandlers(context: RenderContext): RenderHandlers {
  return {
    systemMessage(out, message) {
      if (includesMessage(message, context.messageLevel)) {
        out.raw("<warning><para>").text(message.content).raw("</para></warning>")
      }
    },

    table(out, table) {
      if (!table.head.content.length && !table.body.content.length) {
        renderFallback(out, table)
        return
      }
      const parts: Element[] = [...table.columns.content]
      if (table.head.content.length) parts.push(table.head)
      if (table.body.content.length) parts.push(table.body)
      out
        .open("informaltable", table.options)
        .withIndent(() => {
          out.newline().blockTag("tgroup", undefined, parts, [["cols", columnCount(table)]])
        })
        .newline()
        .close("informaltable")
    },

    tableElement(out, element) {
      switch (element.type) {
        case "table_head":
          out.blockTag("thead", element.options, element.content)
          break
        case "table_body":
          out.blockTag("tbody", element.options, element.content)
          break
        case "row":
          out.blockTag("row", element.options, element.content)
          break
        case "columns":
          out.lines(element.content)
          break
        case "column":
          out.emptyTag("colspec", element.options)
          break
        case "cell":
          out.open("entry", element.options, [["morerows", element.rowspan > 1 ? element.rowspan - 1 : undefined]])
          renderBlocks(out, element.content, "</entry>")
          break
      }
    },

    reference(out, reference) {
      out.element(unresolvedReference(reference))
    },

    invalid(out, element) {
      if (!includesMessage(element.message, context.messageLevel)) {
        out.element(element.fallback)
      } else if (element.type === "invalid_block") {
        out.element(element.message).newline().element(element.fallback)
      } else {
        out.element(element.message).raw(" ").element(element.fallback)
      }
    },

    blockContainer(out, container) {
      switch (container.type) {
        case "document":
          out
            .raw(DOCTYPE)
            .newline()
            .raw("<article>")
            .withIndent(() => {
              out.newline().raw("<artheader><title>").text(context.title).raw("</title></artheader>")
              for (const block of container.content) out.newline().element(block)
            })
            .newline()
            .raw("</article>")
          return
        case "section":
          out.blockTag("section", container.options, [container.header, ...container.content])
          return
        case "quoted_block":
          if (container.attribution.length === 0) {
            out.open("blockquote", container.options)
            renderBlocks(out, container.content, "</blockquote>")
          } else {
            out
              .open("blockquote", container.options)
              .withIndent(() => {
                out.newline().inlineTag("attribution", undefined, container.attribution)
                for (const block of container.content) out.newline().element(block)
              })
              .newline()
              .close("blockquote")
          }
          return
        case "bullet_list_item":
        case "enum_list_item":
          out.open("listitem", container.options)
          renderBlocks(out, container.content, "</listitem>")
          return
        case "definition_list_item":
          out.raw("<glossentry>").inlineTag("glossterm", container.options, container.term).newline().raw("<glossdef>")
          renderBlocks(out, container.content, "</glossdef></glossentry>")
          return
        case "line_block":
          out.blockTag("literallayout", container.options, container.content)
          return
        case "footnote":
          out.blockTag("footnote", container.options, container.content)
          return
        case "citation":
          out
            .open("sidebar", mergeOptions(styles("citation"), optionsOf(container)))
            .withIndent(() => {
              out.newline().textTag("title", undefined, `[${container.label}]`)
              for (const block of container.content) out.newline().element(block)
            })
            .newline()
            .close("sidebar")
          return
        case "block_sequence":
          if (isEmptyOptions(optionsOf(container))) {
            out.lines(container.content)
            return
          }
          break
      }
      if (!renderFallback(out, container)) out.blockTag("sidebar", optionsOf(container), container.content)
    },

    spanContainer(out, container) {
      switch (container.type) {
        case "paragraph":
          out.inlineTag("para", container.options, container.content)
          return
        case "emphasized":
          out.inlineTag("emphasis", container.options, container.content)
          return
        case "strong":
          out.inlineTag("emphasis", mergeOptions(styles("strong"), optionsOf(container)), container.content)
          return
        case "line":
          out.inline(container.content)
          return
        case "header":
          out.inlineTag("title", container.options, container.content)
          return
        case "external_link":
          out.inlineTag("ulink", container.options, container.content, [["url", container.url]])
          return
        case "internal_link":
          if (container.url.startsWith("#")) {
            out.inlineTag("link", container.options, container.content, [["linkend", container.url.slice(1)]])
          } else {
            out.inlineTag("ulink", container.options, container.content, [["url", container.url]])
          }
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
        else out.inlineTag("phrase", container.options, container.content)
      }
    },

    listContainer(out, container) {
      switch (container.type) {
        case "enum_list":
          out.blockTag("orderedlist", container.options, container.content, [
            ["numeration", NUMERATION[container.format.enumType]],
          ])
          return
        case "bullet_list":
          out.blockTag("itemizedlist", container.options, container.content)
          return
        case "definition_list":
          out.blockTag("glosslist", container.options, container.content)
          return
      }
    },

    textContainer(out, container) {
      switch (container.type) {
        case "text":
          out.text(container.content)
          return
        case "literal":
          out.open("literal", container.options).preformatted(container.content).close("literal")
          return
        case "literal_block":
          out.open("programlisting", container.options).preformatted(container.content).close("programlisting")
          return
        case "comment":
          out.raw(`<!-- ${container.content.replace(/--/g, "- -")} -->`)
          return
      }
      if (!renderFallback(out, container)) out.text(container.content)
    },

    block(out, block) {
      switch (block.type) {
        case "rule":
          out.emptyTag("para", mergeOptions(styles("rule"), optionsOf(block)))
          return
        case "internal_link_target":
          out.emptyTag("anchor", block.options)
          return
      }
      renderFallback(out, block)
    },

    span(out, span) {
      switch (span.type) {
        case "citation_link":
          out
            .open("link", mergeOptions(styles("citation"), optionsOf(span)), [["linkend", span.id]])
            .text(`[${span.label}]`)
            .close("link")
          return
        case "footnote_link":
          out
            .open("link", mergeOptions(styles("footnote"), optionsOf(span)), [["linkend", span.id]])
            .text(`[${span.label}]`)
            .close("link")
          return
        case "image":
          out
            .open("inlinemediaobject", span.options)
            .raw("<imageobject>")
            .emptyTag("imagedata", undefined, [["fileref", span.url]])
            .raw("</imageobject>")
          if (span.text) out.raw("<textobject><phrase>").text(span.text).raw("</phrase></textobject>")
          out.close("inlinemediaobject")
          return
        case "line_break":
          out.newline()
          return
        case "internal_link_target":
          out.emptyTag("anchor", span.options)
          return
      }
      renderFallback(out, span)
    },

    unknown(out, element) {
      renderFallback(out, element)
    },
  }
}

export const docBookRenderer: Renderer = {
  name: "docbook",
  format: { indent: "  ", escape: escapeXml, styleAttribute: "role" },
  createHandlers,
}
