import { isReported, type OutputSink, type Reporter } from './reporter.js'
import type { ProbeOutcome, ScanConfig, ScanSummary } from '../types/scan.js'

/**
 * JSON lines output: a start record, one record per reported outcome and a
 * closing summary record.
 */
export class JsonReporter implements Reporter {
  private readonly out: OutputSink
  private readonly verbose: boolean

  constructor(out: OutputSink, verbose = false) {
    this.out = out
    this.verbose = verbose
  }

  start(config: ScanConfig): void {
    this.record({
      type: 'start',
      target: config.target,
      address: config.address,
      ports: config.ports.length,
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
    })
  }

  outcome(outcome: ProbeOutcome): void {
    if (!isReported(outcome, this.verbose)) return

    if (outcome.state === 'error') {
      this.record({
        type: 'outcome',
        port: outcome.port,
        state: outcome.state,
        elapsedMs: outcome.elapsedMs,
        error: outcome.error.code ?? outcome.error.message,
      })
      return
    }

    this.record({
      type: 'outcome',
      port: outcome.port,
      state: outcome.state,
      elapsedMs: outcome.elapsedMs,
    })
  }

  finish(summary: ScanSummary): void {
    this.record({ type: 'summary', ...summary })
  }

  private record(value: Record<string, unknown>): void {
    this.out.write(`${JSON.stringify(value)}\n`)
  }
}
