import type { Element, Options } from "../ast"
import { ConversionError } from "../errors"
import { NO_OPT } from "../options"

/** Where rendered output goes. The writer never closes it. */
export interface OutputSink {
  write(chunk: string): void
}

export class StringSink implements OutputSink {
  private readonly chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  toString(): string {
    return this.chunks.join("")
  }
}

export interface WriterFormat {
  /** Prepended once per nesting level after every line break. */
  readonly indent: string
  readonly escape: (text: string) => string
  /** Attribute receiving the styles of an element, `role` or `class`. */
  readonly styleAttribute?: string
}

export type Attributes = ReadonlyArray<readonly [string, string | number | undefined]>

export type ElementRenderer = (element: Element, out: MarkupWriter) => void

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
}

/**
 * Writer shared by all renderers. Children are always handed back to the
 * composite render function, so overrides apply at every depth.
 */
export class MarkupWriter {
  private level = 0

  constructor(
    private readonly sink: OutputSink,
    private readonly format: WriterFormat,
    private readonly render: ElementRenderer,
  ) {}

  private write(chunk: string): this {
    if (!chunk) return this
    try {
      this.sink.write(chunk)
    } catch (error) {
      throw new ConversionError("OUTPUT_FAILED", "cannot write to the output sink", { cause: error })
    }
    return this
  }

  private indentation(): string {
    return this.format.indent.repeat(this.level)
  }

  raw(text: string): this {
    return this.write(text)
  }

  /** Escaped text; line breaks keep the current indentation. */
  text(text: string): this {
    return this.write(this.format.escape(text).replace(/\n/g, `\n${this.indentation()}`))
  }

  /** Escaped text written exactly as given. */
  preformatted(text: string): this {
    return this.write(this.format.escape(text))
  }

  newline(): this {
    return this.write(`\n${this.indentation()}`)
  }

  element(element: Element): this {
    this.render(element, this)
    return this
  }

  inline(elements: readonly Element[]): this {
    for (const element of elements) this.render(element, this)
    return this
  }

  /** Elements on consecutive lines at the current level. */
  lines(elements: readonly Element[]): this {
    elements.forEach((element, index) => {
      if (index > 0) this.newline()
      this.render(element, this)
    })
    return this
  }

  withIndent(body: () => void): this {
    this.level++
    try {
      body()
    } finally {
      this.level--
    }
    return this
  }

  /** Each element on its own line, one level deeper. */
  indented(elements: readonly Element[]): this {
    return this.withIndent(() => {
      for (const element of elements) this.newline().element(element)
    })
  }

  attributes(options: Options = NO_OPT, attrs: Attributes = []): string {
    const all: (readonly [string, string | number | undefined])[] = [["id", options.id]]
    if (this.format.styleAttribute && options.styles.length) all.push([this.format.styleAttribute, options.styles.join(" ")])
    all.push(...attrs)
    return all
      .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
      .map(([name, value]) => ` ${name}="${this.format.escape(String(value))}"`)
      .join("")
  }

  open(tag: string, options?: Options, attrs?: Attributes): this {
    return this.write(`<${tag}${this.attributes(options, attrs)}>`)
  }

  emptyTag(tag: string, options?: Options, attrs?: Attributes): this {
    return this.write(`<${tag}${this.attributes(options, attrs)}/>`)
  }

  close(tag: string): this {
    return this.write(`</${tag}>`)
  }

  /** Tag with its children inline. */
  inlineTag(tag: string, options: Options | undefined, children: readonly Element[], attrs?: Attributes): this {
    return this.open(tag, options, attrs).inline(children).close(tag)
  }

  /** Tag with its children indented on their own lines. */
  blockTag(tag: string, options: Options | undefined, children: readonly Element[], attrs?: Attributes): this {
    return this.open(tag, options, attrs).indented(children).newline().close(tag)
  }

  textTag(tag: string, options: Options | undefined, text: string, attrs?: Attributes): this {
    return this.open(tag, options, attrs).text(text).close(tag)
  }
}
