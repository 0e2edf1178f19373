export interface RefDefinition {
  label: string
  url: string
  title?: string
}

export interface ListLine {
  ordered: boolean
  start: number
  bulletChar?: string
  delimiter?: "." | ")"
  content: string
}

/** Normalizes line breaks and expands tabs to 8-column stops. */
export function toLines(source: string, tabWidth = 8): string[] {
  return source.replace(/\r\n?/g, "\n").split("\n").map((line) => expandTabs(line, tabWidth))
}

export function expandTabs(line: string, tabWidth: number): string {
  if (!line.includes("\t")) return line
  let result = ""
  for (const char of line) {
    if (char === "\t") result += " ".repeat(tabWidth - (result.length % tabWidth))
    else result += char
  }
  return result
}

export function isBlankLine(line: string | undefined): boolean {
  return line === undefined || line.trim() === ""
}

export function indentOf(line: string): number {
  const m = line.match(/^ */)
  return m ? m[0].length : 0
}

export function skipBlankLines(lines: readonly string[], start: number): number {
  let i = start
  while (i < lines.length && isBlankLine(lines[i])) i++
  return i
}

/** Removes the common indentation of the non-blank lines and trailing blank lines. */
export function dedent(lines: readonly string[]): string[] {
  const result = [...lines]
  while (result.length && isBlankLine(result[result.length - 1])) result.pop()
  const indents = result.filter((l) => !isBlankLine(l)).map(indentOf)
  const min = indents.length ? Math.min(...indents) : 0
  return result.map((l) => (isBlankLine(l) ? "" : l.slice(min)))
}

export interface IndentedBlock {
  lines: string[]
  minIndent: number
  /** Index of the first line after the block. */
  end: number
}

/**
 * Collects lines indented by at least `minIndent` columns, including the blank lines
 * between them. The first line is taken as is. Trailing blank lines are not part of
 * the block.
 */
export function indentedBlock(
  lines: readonly string[],
  start: number,
  options: { minIndent?: number; endsOnBlankLine?: boolean; stopAt?: (line: string, index: number) => boolean } = {},
): IndentedBlock {
  const minIndent = options.minIndent ?? 1
  let end = start + 1
  let i = start + 1
  while (i < lines.length) {
    const line = lines[i]
    if (isBlankLine(line)) {
      if (options.endsOnBlankLine) break
      i++
      continue
    }
    if (indentOf(line) < minIndent) break
    if (options.stopAt && options.stopAt(line, i)) break
    i++
    end = i
  }
  const block = lines.slice(start, end)
  const indents = block.filter((l) => !isBlankLine(l)).map(indentOf)
  return { lines: block, minIndent: indents.length ? Math.min(...indents) : 0, end }
}

export function normalizeRefLabel(str: string) {
  return str.trim().toLowerCase().replace(/\s+/g, " ")
}

export function parseRefDefLine(line: string): RefDefinition | null {
  const re = /^[ ]{0,3}\[([^\]]*)\]:\s*(?:<(.*?)>|(\S+?))(?:\s*(?:"([^"]*)"|'([^']*)'|\(([^)]*)\)))?\s*$/
  const m = line.match(re)
  if (!m) {
    // title directly after the destination, without whitespace
    const noSpaceRe = /^[ ]{0,3}\[([^\]]*)\]:\s*(?:<(.*?)>|(\S+))(?:"([^"]*)"|(?:'([^']*)')|\(([^)]*)\))\s*$/
    const mNoSpace = line.match(noSpaceRe)
    if (!mNoSpace) return null
    return {
      label: mNoSpace[1] || "",
      url: mNoSpace[2] || mNoSpace[3] || "",
      title: mNoSpace[4] || mNoSpace[5] || mNoSpace[6] || undefined,
    }
  }

  return {
    label: m[1] || "",
    url: m[2] || m[3] || "",
    title: m[4] || m[5] || m[6] || undefined,
  }
}

export function parseListLine(line: string): ListLine | null {
  const bulletRe = /^[ ]{0,3}([*+\-])([ ]+|$)(.*)$/
  const mBullet = line.match(bulletRe)
  if (mBullet) {
    return {
      ordered: false,
      start: 1,
      bulletChar: mBullet[1],
      content: mBullet[3] || "",
    }
  }

  const ordRe = /^[ ]{0,3}(\d{1,9})([.)])([ ]+|$)(.*)$/
  const mOrd = line.match(ordRe)
  if (mOrd) {
    let n = parseInt(mOrd[1], 10)
    if (isNaN(n)) n = 1
    return {
      ordered: true,
      start: n,
      delimiter: mOrd[2] === ")" ? ")" : ".",
      content: mOrd[4] || "",
    }
  }

  return null
}
