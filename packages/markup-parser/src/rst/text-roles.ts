import type { CustomizedTextRole, Span } from "../ast"
import { emphasized, literal, strong, text } from "../builders"
import { styles, withOptions } from "../options"

export type TextRole = (content: string) => Span

/** Role used for interpreted text without an explicit role. */
export const DEFAULT_ROLE = "title-reference"

export const BUILT_IN_ROLES: ReadonlyMap<string, TextRole> = new Map<string, TextRole>([
  ["emphasis", (content) => emphasized(content)],
  ["strong", (content) => strong(content)],
  ["literal", (content) => literal(content)],
  [DEFAULT_ROLE, (content) => emphasized(content, styles("title-reference"))],
  ["subscript", (content) => text(content, styles("subscript"))],
  ["superscript", (content) => text(content, styles("superscript"))],
])

/**
 * Builds the role table of a document: the built-in roles plus the roles it
 * customizes with `.. role::`. A customized role applies its base role and adds
 * its styles; roles may build on roles defined earlier in the document.
 */
export function createTextRoles(definitions: readonly CustomizedTextRole[]): Map<string, TextRole> {
  const roles = new Map(BUILT_IN_ROLES)
  for (const definition of definitions) {
    const base = roles.get(definition.base) ?? roles.get(DEFAULT_ROLE)
    if (!base) continue
    const roleStyles = styles(...definition.styles)
    roles.set(definition.name, (content) => withOptions(base(content), roleStyles))
  }
  return roles
}
