import type { Customizable, Element, Options } from "./ast"

/** The empty options value. Merging with it is an identity operation. */
export const NO_OPT: Options = Object.freeze({ styles: Object.freeze([]) })

export function createOptions(init: { id?: string; styles?: readonly string[]; fallback?: Element }): Options {
  const styles = dedupe(init.styles ?? [])
  if (init.id === undefined && styles.length === 0 && init.fallback === undefined) return NO_OPT
  return { id: init.id, styles, fallback: init.fallback }
}

export function id(value: string): Options {
  return createOptions({ id: value })
}

export function styles(...values: string[]): Options {
  return createOptions({ styles: values })
}

export function fallback(value: Element): Options {
  return createOptions({ fallback: value })
}

/**
 * Merges two options values. Id and fallback of `right` win when present,
 * styles are unioned in first-seen order.
 */
export function mergeOptions(left: Options, right: Options): Options {
  if (left === NO_OPT) return right
  if (right === NO_OPT) return left
  return {
    id: right.id ?? left.id,
    styles: dedupe([...left.styles, ...right.styles]),
    fallback: right.fallback ?? left.fallback,
  }
}

export function optionsOf(element: Element): Options {
  return "options" in element && element.options ? element.options : NO_OPT
}

/** Returns a copy of `element` with `options` merged into its own. */
export function withOptions<E extends Customizable>(element: E, options: Options): E {
  if (options === NO_OPT) return element
  return { ...element, options: mergeOptions(optionsOf(element), options) }
}

export function isEmptyOptions(options: Options): boolean {
  return options.id === undefined && options.styles.length === 0 && options.fallback === undefined
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)]
}
