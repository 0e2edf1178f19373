export type ConversionErrorCode =
  | "INVALID_OPTIONS"
  | "UNSUPPORTED_FORMAT"
  | "UNRESOLVED_TEMPORARY"
  | "INVALID_REWRITE"
  | "OUTPUT_FAILED"

type ConversionErrorOptions = {
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Raised for configuration problems, structural defects and output failures.
 * Malformed markup never raises; it degrades to text or invalid nodes.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: ConversionErrorCode, message: string, options: ConversionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "ConversionError"
    this.code = code
    this.context = options.context
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError
}
