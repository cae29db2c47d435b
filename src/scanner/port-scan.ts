import type { Logger } from '../utils/logger.js'
import { Channel } from '../utils/channel.js'
import { ProbeError, ScanAbortedError, errorCode } from '../utils/errors.js'
import { Semaphore } from '../utils/semaphore.js'
import { formatPortSet } from './port-spec.js'
import { probePort, type ProbeFn } from './tcp.js'
import type { ProbeOutcome, ScanConfig } from '../types/scan.js'

export interface ScanOptions {
  /** Admission limiter; defaults to a new Semaphore sized to `config.concurrency` */
  limiter?: Semaphore
  /** Aborting this signal cancels the scan */
  signal?: AbortSignal
  probe?: ProbeFn
  logger?: Logger
}

/**
 * One running scan: the probes in flight for a ScanConfig and the stream
 * of their outcomes, in completion order.
 */
export class ScanSession implements AsyncIterable<ProbeOutcome> {
  readonly config: ScanConfig
  readonly done: Promise<void>

  private readonly channel = new Channel<ProbeOutcome>()
  private readonly controller = new AbortController()
  private readonly limiter: Semaphore
  private readonly probe: ProbeFn
  private readonly logger?: Logger
  private readonly externalSignal?: AbortSignal
  private active = 0
  private peak = 0
  private emitted = 0

  constructor(config: ScanConfig, options: ScanOptions = {}) {
    this.config = config
    this.limiter = options.limiter ?? new Semaphore(config.concurrency)
    this.probe = options.probe ?? probePort
    this.logger = options.logger
    this.externalSignal = options.signal

    if (this.externalSignal?.aborted) {
      this.controller.abort()
    } else {
      this.externalSignal?.addEventListener('abort', this.onExternalAbort, { once: true })
    }

    this.done = this.run()
  }

  /** Probes currently awaiting an outcome */
  get inFlight(): number {
    return this.active
  }

  /** Highest number of probes that were in flight at the same time */
  get peakInFlight(): number {
    return this.peak
  }

  get aborted(): boolean {
    return this.controller.signal.aborted
  }

  /**
   * Cancel every in-flight probe and stop admitting new ones. Outcomes
   * already emitted stay in the stream; cancelled ports emit nothing.
   */
  abort(): void {
    if (this.aborted) return
    this.logger?.debug(`Aborting scan of ${this.config.address} (${this.active} probes in flight)`)
    this.controller.abort()
  }

  [Symbol.asyncIterator](): AsyncIterator<ProbeOutcome> {
    return this.channel[Symbol.asyncIterator]()
  }

  private readonly onExternalAbort = () => this.abort()

  private async run(): Promise<void> {
    const { address, ports, timeoutMs } = this.config
    const signal = this.controller.signal
    const pending = new Set<Promise<void>>()

    this.logger?.debug(
      `Scan starting for ${address}: ${ports.length} ports [${formatPortSet(ports)}], ` +
      `concurrency ${this.limiter.size}, timeout ${timeoutMs}ms`
    )

    try {
      for (const port of ports) {
        await this.limiter.acquire(signal)
        if (signal.aborted) {
          this.limiter.release()
          break
        }
        const task: Promise<void> = this.launch(port, address, timeoutMs, signal)
          .finally(() => {
            pending.delete(task)
            this.limiter.release()
          })
        pending.add(task)
      }
      await Promise.all(pending)
    } catch (error) {
      if (!(error instanceof ScanAbortedError)) {
        this.channel.fail(error)
      }
    } finally {
      await Promise.allSettled(pending)
      this.externalSignal?.removeEventListener('abort', this.onExternalAbort)
      this.channel.close()
      this.logger?.debug(
        `Scan ${this.aborted ? 'aborted' : 'complete'} for ${address}: ` +
        `${this.emitted}/${ports.length} outcomes, peak ${this.peak} in flight`
      )
    }
  }

  private async launch(port: number, address: string, timeoutMs: number, signal: AbortSignal): Promise<void> {
    this.active++
    this.peak = Math.max(this.peak, this.active)
    const started = Date.now()

    try {
      const outcome = await this.probe(address, port, timeoutMs, signal)
      if (!signal.aborted) {
        this.emit(outcome)
      }
    } catch (error) {
      if (error instanceof ScanAbortedError || signal.aborted) return

      const message = error instanceof Error ? error.message : 'Unknown error'
      this.logger?.warn(`Probe for port ${port} failed unexpectedly: ${message}`)
      this.emit({
        port,
        state: 'error',
        elapsedMs: Date.now() - started,
        error: new ProbeError(port, message, errorCode(error)),
      })
    } finally {
      this.active--
    }
  }

  private emit(outcome: ProbeOutcome): void {
    this.emitted++
    this.channel.push(outcome)
  }
}

/**
 * Start scanning every port in `config.ports` against `config.address`,
 * keeping at most `config.concurrency` connect attempts in flight.
 */
export function scanPorts(config: ScanConfig, options: ScanOptions = {}): ScanSession {
  return new ScanSession(config, options)
}
