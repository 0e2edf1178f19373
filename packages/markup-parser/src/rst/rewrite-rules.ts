import {
  isSpan,
  type CustomizedTextRole,
  type Document,
  type HeaderDecoration,
  type RewriteRule,
  type Span,
  type SubstitutionReference,
} from "../ast"
import { header, invalidSpan } from "../builders"
import { forEachElement, rewriteElement } from "../traversal"
import { createTextRoles } from "./text-roles"

function decorationKey(decoration: HeaderDecoration): string {
  return decoration.overline ? `${decoration.char}/overline` : decoration.char
}

/**
 * Rules resolving the reStructuredText temporaries of `document`: substitution
 * references, interpreted text and decorated headers. Header levels follow the
 * order in which decoration styles first appear in the document.
 */
export function createRstRewriteRules(document: Document): RewriteRule[] {
  const substitutions = new Map<string, Span>()
  const roleDefinitions: CustomizedTextRole[] = []
  const decorations: string[] = []

  forEachElement(document, (element) => {
    if (element.type === "substitution_definition" && !substitutions.has(element.name)) {
      substitutions.set(element.name, element.content)
    } else if (element.type === "customized_text_role") {
      roleDefinitions.push(element)
    } else if (element.type === "decorated_header") {
      const key = decorationKey(element.decoration)
      if (!decorations.includes(key)) decorations.push(key)
    }
  })

  const roles = createTextRoles(roleDefinitions)
  const expanding = new Set<string>()

  const levelOf = (decoration: HeaderDecoration): number => {
    const key = decorationKey(decoration)
    if (!decorations.includes(key)) decorations.push(key)
    return decorations.indexOf(key) + 1
  }

  // substitutions may refer to other substitutions; their content is rewritten on use
  const expand = (reference: SubstitutionReference): Span => {
    const content = substitutions.get(reference.id)
    if (content === undefined) return invalidSpan(`unknown substitution id: ${reference.id}`, `|${reference.id}|`)
    if (expanding.has(reference.id)) {
      return invalidSpan(`circular substitution reference: ${reference.id}`, `|${reference.id}|`)
    }
    expanding.add(reference.id)
    try {
      const expanded = rewriteElement(content, [rule])
      return expanded !== null && isSpan(expanded) ? expanded : invalidSpan(`empty substitution: ${reference.id}`, `|${reference.id}|`)
    } finally {
      expanding.delete(reference.id)
    }
  }

  const rule: RewriteRule = (element) => {
    switch (element.type) {
      case "substitution_reference":
        return expand(element)
      case "interpreted_text": {
        const role = roles.get(element.role)
        return role ? role(element.text) : invalidSpan(`unknown text role: ${element.role}`, `\`${element.text}\``)
      }
      case "decorated_header":
        return header(levelOf(element.decoration), element.content, element.options)
      case "substitution_definition":
      case "customized_text_role":
        return null
      default:
        return undefined
    }
  }

  return [rule]
}
