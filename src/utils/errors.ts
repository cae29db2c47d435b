export type PortSpecErrorReason =
  | 'empty'
  | 'non-numeric'
  | 'malformed-range'
  | 'out-of-range'
  | 'inverted-range'

const REASON_TEXT: Record<PortSpecErrorReason, string> = {
  'empty': 'empty port token',
  'non-numeric': 'not a number',
  'malformed-range': 'malformed range',
  'out-of-range': 'port must be between 1 and 65535',
  'inverted-range': 'range start is greater than range end',
}

/**
 * A port specification could not be parsed. Raised before any socket is opened.
 */
export class PortSpecError extends Error {
  readonly token: string
  readonly reason: PortSpecErrorReason
  /** 1-based index of the token within the comma separated list */
  readonly position: number

  constructor(token: string, reason: PortSpecErrorReason, position: number, spec: string) {
    // An empty token says nothing on its own, so point into the whole spec instead
    const message = reason === 'empty' && spec.trim() !== ''
      ? `Invalid port specification "${spec}": ${REASON_TEXT[reason]} (token ${position})`
      : `Invalid port specification "${reason === 'empty' ? spec : token}": ${REASON_TEXT[reason]}`
    super(message)
    this.name = 'PortSpecError'
    this.token = token
    this.reason = reason
    this.position = position
  }
}

/**
 * An option value (concurrency, timeout, log level) failed validation
 */
export class ConfigError extends Error {
  readonly option: string

  constructor(option: string, message: string) {
    super(message)
    this.name = 'ConfigError'
    this.option = option
  }
}

export class TargetResolutionError extends Error {
  readonly target: string
  readonly code?: string

  constructor(target: string, code?: string) {
    super(`Unable to resolve target "${target}"${code ? ` (${code})` : ''}`)
    this.name = 'TargetResolutionError'
    this.target = target
    this.code = code
  }
}

/**
 * A connect attempt failed for a reason other than refusal or timeout,
 * e.g. EHOSTUNREACH. Scoped to a single port.
 */
export class ProbeError extends Error {
  readonly port: number
  readonly code?: string

  constructor(port: number, message: string, code?: string) {
    super(message)
    this.name = 'ProbeError'
    this.port = port
    this.code = code
  }
}

/**
 * A probe was cancelled because its scan was aborted
 */
export class ScanAbortedError extends Error {
  constructor() {
    super('Scan aborted')
    this.name = 'ScanAbortedError'
  }
}

/**
 * Read the errno-style `code` off an unknown thrown value
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
