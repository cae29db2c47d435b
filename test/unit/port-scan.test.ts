import { describe, it, expect, afterEach } from 'vitest'
import { createServer, type Server } from 'node:net'
import { scanPorts, type ScanSession } from '../../src/scanner/port-scan.js'
import type { ProbeFn } from '../../src/scanner/tcp.js'
import { Semaphore } from '../../src/utils/semaphore.js'
import { ScanAbortedError } from '../../src/utils/errors.js'
import type { PortSet, ProbeOutcome, ScanConfig } from '../../src/types/scan.js'

function scanConfig(ports: PortSet, concurrency: number): ScanConfig {
  return {
    target: '127.0.0.1',
    address: '127.0.0.1',
    family: 4,
    ports,
    concurrency,
    timeoutMs: 1000,
    verbose: false,
  }
}

function range(low: number, high: number): number[] {
  return Array.from({ length: high - low + 1 }, (_, i) => low + i)
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

async function collect(session: ScanSession): Promise<ProbeOutcome[]> {
  const outcomes: ProbeOutcome[] = []
  for await (const outcome of session) {
    outcomes.push(outcome)
  }
  await session.done
  return outcomes
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address()
      if (addr && typeof addr === 'object') {
        resolve(addr.port)
      } else {
        reject(new Error('Unable to determine server port'))
      }
    })
  })
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()))
}

describe('scanPorts', () => {
  it('never runs more probes than the concurrency cap', async () => {
    let active = 0
    let max = 0
    const probe: ProbeFn = async (_address, port) => {
      active++
      max = Math.max(max, active)
      await sleep((port % 4) * 3)
      active--
      return { port, state: port % 5 === 0 ? 'open' : 'closed', elapsedMs: 0 }
    }

    const session = scanPorts(scanConfig(range(1, 40), 5), { probe })
    const outcomes = await collect(session)

    expect(max).toBe(5)
    expect(session.peakInFlight).toBe(5)
    expect(session.inFlight).toBe(0)
    expect(outcomes).toHaveLength(40)
  })

  it('yields exactly one outcome per port', async () => {
    const probe: ProbeFn = async (_address, port) => {
      await sleep(port % 3)
      return { port, state: 'closed', elapsedMs: 0 }
    }

    const outcomes = await collect(scanPorts(scanConfig(range(100, 160), 7), { probe }))
    const ports = outcomes.map(o => o.port).sort((a, b) => a - b)
    expect(ports).toEqual(range(100, 160))
  })

  it('emits outcomes in completion order, not port order', async () => {
    const delays: Record<number, number> = { 1: 60, 2: 0, 3: 20 }
    const probe: ProbeFn = async (_address, port) => {
      await sleep(delays[port])
      return { port, state: 'open', elapsedMs: delays[port] }
    }

    const outcomes = await collect(scanPorts(scanConfig([1, 2, 3], 3), { probe }))
    expect(outcomes.map(o => o.port)).toEqual([2, 3, 1])
  })

  it('emits an outcome as soon as its probe resolves', async () => {
    let releaseSlow: () => void = () => {}
    const slow = new Promise<void>((resolve) => { releaseSlow = resolve })
    const probe: ProbeFn = async (_address, port) => {
      if (port === 2) await slow
      return { port, state: 'open', elapsedMs: 0 }
    }

    const session = scanPorts(scanConfig([1, 2], 2), { probe })
    const iterator = session[Symbol.asyncIterator]()

    expect(await iterator.next()).toMatchObject({ done: false, value: { port: 1 } })
    expect(session.inFlight).toBe(1)

    releaseSlow()
    expect(await iterator.next()).toMatchObject({ done: false, value: { port: 2 } })
    expect(await iterator.next()).toMatchObject({ done: true })
  })

  it('starts the next port when a slot frees up', async () => {
    const started: number[] = []
    const probe: ProbeFn = async (_address, port) => {
      started.push(port)
      await sleep(port === 1 ? 0 : 40)
      return { port, state: 'closed', elapsedMs: 0 }
    }

    const session = scanPorts(scanConfig([1, 2, 3], 2), { probe })
    const iterator = session[Symbol.asyncIterator]()

    expect(await iterator.next()).toMatchObject({ value: { port: 1 } })
    await sleep(5)
    expect(started).toEqual([1, 2, 3])
    await collect(session)
  })

  it('turns an unexpected probe failure into an error outcome without stopping siblings', async () => {
    const probe: ProbeFn = async (_address, port) => {
      if (port === 2) {
        throw Object.assign(new Error('socket exploded'), { code: 'EMFILE' })
      }
      return { port, state: 'closed', elapsedMs: 0 }
    }

    const outcomes = await collect(scanPorts(scanConfig([1, 2, 3], 1), { probe }))
    expect(outcomes.map(o => o.port)).toEqual([1, 2, 3])

    const failed = outcomes[1]
    expect(failed.state).toBe('error')
    if (failed.state !== 'error') return
    expect(failed.error.code).toBe('EMFILE')
    expect(failed.error.message).toBe('socket exploded')
    expect(failed.error.port).toBe(2)
  })

  it('cancels in-flight probes on abort and emits nothing for them', async () => {
    const started: number[] = []
    let cancelled = 0
    const probe: ProbeFn = (_address, port, _timeoutMs, signal) => {
      started.push(port)
      if (port <= 2) {
        return sleep(0).then(() => ({ port, state: 'open' as const, elapsedMs: 0 }))
      }
      return new Promise<ProbeOutcome>((_resolve, reject) => {
        if (signal?.aborted) {
          cancelled++
          reject(new ScanAbortedError())
          return
        }
        signal?.addEventListener('abort', () => {
          cancelled++
          reject(new ScanAbortedError())
        }, { once: true })
      })
    }

    const session = scanPorts(scanConfig(range(1, 10), 3), { probe })
    const outcomes: ProbeOutcome[] = []
    for await (const outcome of session) {
      outcomes.push(outcome)
      if (outcomes.length === 2) session.abort()
    }
    await session.done

    expect(outcomes.map(o => o.port)).toEqual([1, 2])
    expect(session.aborted).toBe(true)
    expect(session.inFlight).toBe(0)
    expect(cancelled).toBe(started.length - 2)
    expect(started.length).toBeLessThanOrEqual(5)
  })

  it('starts nothing when the external signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const started: number[] = []
    const probe: ProbeFn = async (_address, port) => {
      started.push(port)
      return { port, state: 'open', elapsedMs: 0 }
    }

    const session = scanPorts(scanConfig([1, 2, 3], 2), { probe, signal: controller.signal })
    expect(await collect(session)).toEqual([])
    expect(started).toEqual([])
    expect(session.aborted).toBe(true)
  })

  it('aborts when the external signal fires mid-scan', async () => {
    const controller = new AbortController()
    const probe: ProbeFn = (_address, _port, _timeoutMs, signal) =>
      new Promise<ProbeOutcome>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new ScanAbortedError()), { once: true })
      })

    const session = scanPorts(scanConfig(range(1, 20), 4), { probe, signal: controller.signal })
    await sleep(5)
    expect(session.inFlight).toBe(4)

    controller.abort()
    expect(await collect(session)).toEqual([])
    expect(session.inFlight).toBe(0)
  })

  it('shares a limiter between sessions', async () => {
    const limiter = new Semaphore(2)
    let active = 0
    let max = 0
    const probe: ProbeFn = async (_address, port) => {
      active++
      max = Math.max(max, active)
      await sleep(2)
      active--
      return { port, state: 'closed', elapsedMs: 0 }
    }

    const [a, b] = await Promise.all([
      collect(scanPorts(scanConfig(range(1, 6), 2), { probe, limiter })),
      collect(scanPorts(scanConfig(range(7, 12), 2), { probe, limiter })),
    ])

    expect(a).toHaveLength(6)
    expect(b).toHaveLength(6)
    expect(max).toBe(2)
    expect(limiter.inUse).toBe(0)
  })

  describe('against loopback', () => {
    let server: Server | undefined

    afterEach(async () => {
      if (server) {
        await close(server)
        server = undefined
      }
    })

    it('finds a single open port', async () => {
      server = createServer((socket) => socket.destroy())
      const port = await listen(server)

      const outcomes = await collect(scanPorts(scanConfig([port], 1)))
      expect(outcomes).toHaveLength(1)
      expect(outcomes[0]).toMatchObject({ port, state: 'open' })
    })

    it('classifies a port with no listener as closed', async () => {
      server = createServer((socket) => socket.destroy())
      const openPort = await listen(server)
      const spare = createServer()
      const closedPort = await listen(spare)
      await close(spare)

      const outcomes = await collect(scanPorts(scanConfig([openPort, closedPort], 2)))
      const byPort = new Map(outcomes.map(o => [o.port, o.state]))
      expect(byPort.get(openPort)).toBe('open')
      expect(byPort.get(closedPort)).toBe('closed')
    })
  })
})
