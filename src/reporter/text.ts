import { STATUS_PREFIX } from '../utils/version.js'
import { formatPortSet } from '../scanner/port-spec.js'
import { isReported, type OutputSink, type Reporter } from './reporter.js'
import type { ProbeOutcome, ScanConfig, ScanSummary } from '../types/scan.js'

export const FINISHED_MARKER = `${STATUS_PREFIX} Finished scan`
export const ABORTED_MARKER = `${STATUS_PREFIX} Scan aborted`

/**
 * Render one outcome as "<port>: <classification>"
 */
export function formatOutcome(outcome: ProbeOutcome): string {
  switch (outcome.state) {
    case 'open':
      return `${outcome.port}: open`
    case 'closed':
      return `${outcome.port}: closed`
    case 'timeout':
      return `${outcome.port}: timed out`
    case 'error':
      return `${outcome.port}: error (${outcome.error.code ?? outcome.error.message})`
  }
}

/**
 * Human readable line output. Without `verbose` only open ports and errors
 * are printed.
 */
export class TextReporter implements Reporter {
  private readonly out: OutputSink
  private readonly verbose: boolean

  constructor(out: OutputSink, verbose = false) {
    this.out = out
    this.verbose = verbose
  }

  start(config: ScanConfig): void {
    if (!this.verbose) return
    const target = config.target === config.address
      ? config.address
      : `${config.target} (${config.address})`
    this.line(`${STATUS_PREFIX} Scanning ${config.ports.length} ports on ${target}`)
    this.line(`${STATUS_PREFIX} Ports: ${formatPortSet(config.ports)}`)
    this.line(`${STATUS_PREFIX} Concurrency: ${config.concurrency}`)
    this.line(`${STATUS_PREFIX} Timeout: ${config.timeoutMs / 1000}`)
  }

  outcome(outcome: ProbeOutcome): void {
    if (isReported(outcome, this.verbose)) {
      this.line(formatOutcome(outcome))
    }
  }

  finish(summary: ScanSummary): void {
    this.line(summary.aborted ? ABORTED_MARKER : FINISHED_MARKER)
  }

  private line(text: string): void {
    this.out.write(`${text}\n`)
  }
}
