import * as net from 'net'
import { ProbeError, ScanAbortedError } from '../utils/errors.js'
import type { ProbeOutcome } from '../types/scan.js'

export type ProbeFn = (
  address: string,
  port: number,
  timeoutMs: number,
  signal?: AbortSignal
) => Promise<ProbeOutcome>

/**
 * Attempt a single TCP connection to `address:port`.
 *
 * Resolves `open` on connect, `closed` on ECONNREFUSED, `timeout` when the
 * deadline passes first and `error` for any other socket failure. Rejects
 * with ScanAbortedError if `signal` aborts before an outcome is decided.
 * The socket is destroyed on every path.
 */
export function probePort(
  address: string,
  port: number,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<ProbeOutcome> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScanAbortedError())
      return
    }

    const started = Date.now()
    const socket = new net.Socket()
    let settled = false

    const finish = (outcome: ProbeOutcome | ScanAbortedError) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      socket.destroy()
      if (outcome instanceof ScanAbortedError) {
        reject(outcome)
      } else {
        resolve(outcome)
      }
    }

    const elapsed = () => Date.now() - started

    const timer = setTimeout(() => {
      finish({ port, state: 'timeout', elapsedMs: elapsed() })
    }, timeoutMs)

    const onAbort = () => finish(new ScanAbortedError())
    signal?.addEventListener('abort', onAbort, { once: true })

    socket.on('connect', () => {
      finish({ port, state: 'open', elapsedMs: elapsed() })
    })

    socket.on('error', (err: NodeJS.ErrnoException) => {
      switch (err.code) {
        case 'ECONNREFUSED':
          finish({ port, state: 'closed', elapsedMs: elapsed() })
          break
        case 'ETIMEDOUT':
          finish({ port, state: 'timeout', elapsedMs: elapsed() })
          break
        default:
          finish({
            port,
            state: 'error',
            elapsedMs: elapsed(),
            error: new ProbeError(port, err.message, err.code),
          })
      }
    })

    socket.connect(port, address)
  })
}
