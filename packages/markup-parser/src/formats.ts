export const INPUT_FORMATS = ["markdown", "rst", "asciidoc"] as const
export const OUTPUT_FORMATS = ["html", "docbook", "pdf", "ast"] as const

export type InputFormat = (typeof INPUT_FORMATS)[number]
export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

const INPUT_NAMES: Record<string, InputFormat> = {
  md: "markdown",
  markdown: "markdown",
  rst: "rst",
  rest: "rst",
  adoc: "asciidoc",
  asciidoc: "asciidoc",
}

const OUTPUT_NAMES: Record<string, OutputFormat> = {
  html: "html",
  htm: "html",
  xml: "docbook",
  docbook: "docbook",
  pdf: "pdf",
  ast: "ast",
  txt: "ast",
}

/** The extension of a file name, or the name itself when it has none. */
function formatKey(nameOrPath: string): string {
  const base = nameOrPath.split(/[\\/]/).pop() ?? nameOrPath
  const dot = base.lastIndexOf(".")
  return (dot === -1 ? base : base.slice(dot + 1)).toLowerCase()
}

export function inputFormatFor(nameOrPath: string): InputFormat {
  return INPUT_NAMES[formatKey(nameOrPath)] ?? "markdown"
}

export function outputFormatFor(nameOrPath: string): OutputFormat {
  return OUTPUT_NAMES[formatKey(nameOrPath)] ?? "html"
}
