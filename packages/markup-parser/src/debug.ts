import type { Document } from "./ast"
import { prettyPrintRenderer } from "./render/pretty-print"
import { renderToString } from "./render/render"

export interface DebugSnapshot {
  stage: string
  document: Document
  /** Structural dump of `document` */
  dump: string
  /** Trace lines recorded since the previous snapshot */
  logs: string[]
}

/**
 * Collects trace lines and per-stage snapshots of one conversion.
 * Trees are immutable, so snapshots keep them without copying.
 */
export class DebugSession {
  private logs: string[] = []
  private readonly captured: DebugSnapshot[] = []

  constructor(readonly enabled = true) {}

  readonly log = (message: string): void => {
    if (this.enabled) this.logs.push(message)
  }

  capture(stage: string, document: Document): void {
    if (!this.enabled) return
    this.captured.push({
      stage,
      document,
      dump: renderToString(document, prettyPrintRenderer),
      logs: this.logs,
    })
    this.logs = []
  }

  get snapshots(): readonly DebugSnapshot[] {
    return this.captured
  }
}
