import type { ProbeError } from '../utils/errors.js'

/**
 * Unique ports in ascending order, each within 1-65535
 */
export type PortSet = readonly number[]

export interface ScanConfig {
  /** Target as the user gave it (hostname or literal) */
  readonly target: string
  /** Resolved IP literal every probe connects to */
  readonly address: string
  readonly family: 4 | 6
  readonly ports: PortSet
  readonly concurrency: number
  readonly timeoutMs: number
  readonly verbose: boolean
}

interface OutcomeBase {
  port: number
  /** Time from connect start until the outcome was decided */
  elapsedMs: number
}

export interface SettledOutcome extends OutcomeBase {
  state: 'open' | 'closed' | 'timeout'
}

export interface ErrorOutcome extends OutcomeBase {
  state: 'error'
  error: ProbeError
}

export type ProbeOutcome = SettledOutcome | ErrorOutcome

export interface ScanSummary {
  target: string
  address: string
  scanned: number
  open: number[]
  closed: number
  timedOut: number
  errors: number
  aborted: boolean
  durationMs: number
}
