import type { ScanSession } from '../scanner/port-scan.js'
import type { ProbeOutcome, ScanConfig, ScanSummary } from '../types/scan.js'

/** Anything lines can be written to, e.g. process.stdout */
export interface OutputSink {
  write(chunk: string): unknown
}

/**
 * Consumer of a scan's outcome stream
 */
export interface Reporter {
  start(config: ScanConfig): void
  outcome(outcome: ProbeOutcome): void
  finish(summary: ScanSummary): void
}

/**
 * Whether an outcome is shown: open ports and errors always, the rest only when verbose
 */
export function isReported(outcome: ProbeOutcome, verbose: boolean): boolean {
  return verbose || outcome.state === 'open' || outcome.state === 'error'
}

/**
 * Drain a scan session into a reporter in arrival order and return the
 * summary. Resolves only after every probe of the session has settled.
 */
export async function consumeOutcomes(session: ScanSession, reporter: Reporter): Promise<ScanSummary> {
  const started = Date.now()
  const { config } = session
  const open: number[] = []
  let scanned = 0
  let closed = 0
  let timedOut = 0
  let errors = 0

  reporter.start(config)

  for await (const outcome of session) {
    scanned++
    switch (outcome.state) {
      case 'open':
        open.push(outcome.port)
        break
      case 'closed':
        closed++
        break
      case 'timeout':
        timedOut++
        break
      case 'error':
        errors++
        break
    }
    reporter.outcome(outcome)
  }

  await session.done

  const summary: ScanSummary = {
    target: config.target,
    address: config.address,
    scanned,
    open: open.sort((a, b) => a - b),
    closed,
    timedOut,
    errors,
    aborted: session.aborted,
    durationMs: Date.now() - started,
  }

  reporter.finish(summary)
  return summary
}
