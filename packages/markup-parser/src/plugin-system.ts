import type { Document, RewriteRule } from "./ast"
import type { RenderOverride } from "./render/render"

/** Extension points of a single conversion. Plugins are passed per call. */
export interface MarkupPlugin {
  name?: string
  /** Lower runs first, default 0 */
  priority?: number
  rewriteRules?: readonly RewriteRule[]
  renderOverrides?: readonly RenderOverride[]
  onRender?(output: string, document: Document): string
}

export function isMarkupPlugin(value: unknown): value is MarkupPlugin {
  if (typeof value !== "object" || value === null) return false
  if ("priority" in value && value.priority !== undefined && typeof value.priority !== "number") return false
  if ("name" in value && value.name !== undefined && typeof value.name !== "string") return false
  if ("onRender" in value && value.onRender !== undefined && typeof value.onRender !== "function") return false
  if ("rewriteRules" in value && value.rewriteRules !== undefined && !Array.isArray(value.rewriteRules)) return false
  if ("renderOverrides" in value && value.renderOverrides !== undefined && !Array.isArray(value.renderOverrides)) {
    return false
  }
  return true
}

/** Ascending priority; plugins of equal priority keep the order they were given in. */
export function orderPlugins(plugins: readonly MarkupPlugin[]): MarkupPlugin[] {
  return plugins
    .map((plugin, index) => ({ plugin, index }))
    .sort((a, b) => (a.plugin.priority ?? 0) - (b.plugin.priority ?? 0) || a.index - b.index)
    .map(({ plugin }) => plugin)
}

export function pluginRewriteRules(plugins: readonly MarkupPlugin[]): RewriteRule[] {
  return plugins.flatMap((plugin) => plugin.rewriteRules ?? [])
}

export function pluginRenderOverrides(plugins: readonly MarkupPlugin[]): RenderOverride[] {
  return plugins.flatMap((plugin) => plugin.renderOverrides ?? [])
}

export function pluginName(plugin: MarkupPlugin): string {
  return plugin.name ?? "anonymous"
}
