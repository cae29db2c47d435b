import { isIP } from 'net'
import { lookup } from 'dns/promises'
import { TargetResolutionError, errorCode } from './errors.js'

export interface ResolvedTarget {
  address: string
  family: 4 | 6
}

/**
 * Strip the brackets from an IPv6 literal written as "[::1]"
 */
export function normalizeTarget(target: string): string {
  const trimmed = target.trim()
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    return trimmed.slice(1, -1)
  }
  return trimmed
}

/**
 * Resolve a scan target to a single address. IP literals are returned as is;
 * hostnames are looked up once so every probe connects to the same address.
 */
export async function resolveTarget(target: string): Promise<ResolvedTarget> {
  const host = normalizeTarget(target)
  if (host === '') {
    throw new TargetResolutionError(target)
  }

  const family = isIP(host)
  if (family === 4 || family === 6) {
    return { address: host, family }
  }

  try {
    const result = await lookup(host)
    if (result.family !== 4 && result.family !== 6) {
      throw new TargetResolutionError(target)
    }
    return { address: result.address, family: result.family }
  } catch (error) {
    if (error instanceof TargetResolutionError) throw error
    throw new TargetResolutionError(target, errorCode(error))
  }
}
