import { PortSpecError } from '../utils/errors.js'
import type { PortSet } from '../types/scan.js'

export const MIN_PORT = 1
export const MAX_PORT = 65535

export const DEFAULT_PORT_SPEC = '1-1024'

interface TokenContext {
  token: string
  position: number
  spec: string
}

function parsePortNumber(value: string, { token, position, spec }: TokenContext): number {
  if (!/^\d+$/.test(value)) {
    throw new PortSpecError(token, 'non-numeric', position, spec)
  }
  const port = parseInt(value, 10)
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new PortSpecError(token, 'out-of-range', position, spec)
  }
  return port
}

/**
 * Parse a port specification such as "22,80,8000-8002" into a sorted,
 * deduplicated port set.
 *
 * Tokens are comma separated. A token with a `-` is an inclusive range,
 * anything else a single port. Overlapping tokens are merged silently.
 *
 * @throws PortSpecError naming the first offending token
 */
export function parsePortSpec(spec: string): PortSet {
  if (spec.trim() === '') {
    throw new PortSpecError(spec, 'empty', 1, spec)
  }

  const ports = new Set<number>()
  const tokens = spec.split(',')

  for (const [index, raw] of tokens.entries()) {
    const token = raw.trim()
    const context: TokenContext = { token, position: index + 1, spec }
    if (token === '') {
      throw new PortSpecError(raw, 'empty', context.position, spec)
    }

    if (!token.includes('-')) {
      ports.add(parsePortNumber(token, context))
      continue
    }

    const bounds = token.split('-').map(b => b.trim())
    if (bounds.length !== 2 || bounds[0] === '' || bounds[1] === '') {
      throw new PortSpecError(token, 'malformed-range', context.position, spec)
    }

    const low = parsePortNumber(bounds[0], context)
    const high = parsePortNumber(bounds[1], context)
    if (low > high) {
      throw new PortSpecError(token, 'inverted-range', context.position, spec)
    }

    for (let port = low; port <= high; port++) {
      ports.add(port)
    }
  }

  return [...ports].sort((a, b) => a - b)
}

/**
 * Render a port set in compact form, collapsing consecutive runs into ranges
 */
export function formatPortSet(ports: PortSet): string {
  const parts: string[] = []
  let i = 0

  while (i < ports.length) {
    const start = ports[i]
    let end = start
    while (i + 1 < ports.length && ports[i + 1] === end + 1) {
      end = ports[++i]
    }
    parts.push(start === end ? `${start}` : `${start}-${end}`)
    i++
  }

  return parts.join(',')
}
