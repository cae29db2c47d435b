import { ConfigError } from './utils/errors.js'
import { resolveTarget } from './utils/ip-utils.js'
import { isLogLevel, type LogLevel } from './utils/logger.js'
import { DEFAULT_PORT_SPEC, parsePortSpec } from './scanner/port-spec.js'
import type { ScanConfig } from './types/scan.js'

export interface Config {
  target: string
  ports: string
  concurrency: number
  timeoutSeconds: number
  verbose: boolean
  json: boolean
  logLevel: LogLevel
  logDir?: string
}

/** Raw option values as they arrive from the command line */
export interface ConfigInput {
  target: string
  ports?: string
  concurrency?: string
  timeout?: string
  verbose?: boolean
  json?: boolean
  logLevel?: string
  logDir?: string
}

export const DEFAULT_CONCURRENCY = 1000
export const DEFAULT_TIMEOUT_SECONDS = 3
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

// setTimeout cannot wait longer than 2^31-1 ms
export const MAX_TIMEOUT_SECONDS = 2_147_483

function parsePositiveInteger(option: string, value: string): number {
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(option, `Invalid ${option} "${value}": expected a positive integer`)
  }
  const parsed = parseInt(trimmed, 10)
  if (parsed < 1 || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(option, `Invalid ${option} "${value}": expected a positive integer`)
  }
  return parsed
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined
}

/**
 * Merge command line options with EYES_* environment overrides and defaults.
 * Command line values win over the environment.
 */
export function loadConfig(input: ConfigInput, env: NodeJS.ProcessEnv = process.env): Config {
  const concurrency = input.concurrency ?? nonEmpty(env['EYES_CONCURRENCY'])
  const timeout = input.timeout ?? nonEmpty(env['EYES_TIMEOUT'])
  const logLevel = input.logLevel ?? nonEmpty(env['EYES_LOG_LEVEL']) ?? DEFAULT_LOG_LEVEL

  const timeoutSeconds = timeout !== undefined
    ? parsePositiveInteger('timeout', timeout)
    : DEFAULT_TIMEOUT_SECONDS
  if (timeoutSeconds > MAX_TIMEOUT_SECONDS) {
    throw new ConfigError('timeout', `Invalid timeout "${timeoutSeconds}": must be at most ${MAX_TIMEOUT_SECONDS} seconds`)
  }

  if (!isLogLevel(logLevel)) {
    throw new ConfigError('log-level', `Invalid log level "${logLevel}": expected error, warn, info or debug`)
  }

  return {
    target: input.target,
    ports: input.ports ?? nonEmpty(env['EYES_PORTS']) ?? DEFAULT_PORT_SPEC,
    concurrency: concurrency !== undefined
      ? parsePositiveInteger('concurrency', concurrency)
      : DEFAULT_CONCURRENCY,
    timeoutSeconds,
    verbose: input.verbose ?? false,
    json: input.json ?? false,
    logLevel,
    logDir: input.logDir ?? nonEmpty(env['EYES_LOG_DIR']),
  }
}

/**
 * Build the immutable ScanConfig for one scan: parse the port specification
 * (failing before any socket is opened) and resolve the target.
 */
export async function createScanConfig(config: Config): Promise<ScanConfig> {
  const ports = parsePortSpec(config.ports)
  const { address, family } = await resolveTarget(config.target)

  return Object.freeze({
    target: config.target,
    address,
    family,
    ports: Object.freeze([...ports]),
    concurrency: config.concurrency,
    timeoutMs: config.timeoutSeconds * 1000,
    verbose: config.verbose,
  })
}
