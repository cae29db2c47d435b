import { Command, CommanderError } from 'commander'
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_LOG_LEVEL,
  DEFAULT_TIMEOUT_SECONDS,
  createScanConfig,
  loadConfig,
  type Config,
} from './config.js'
import { consumeOutcomes, type OutputSink, type Reporter } from './reporter/reporter.js'
import { JsonReporter } from './reporter/json.js'
import { TextReporter } from './reporter/text.js'
import { DEFAULT_PORT_SPEC } from './scanner/port-spec.js'
import { scanPorts } from './scanner/port-scan.js'
import { ConfigError, PortSpecError, TargetResolutionError } from './utils/errors.js'
import { createLogger, LOG_LEVELS, type Logger } from './utils/logger.js'
import { PRODUCT_NAME, VERSION } from './utils/version.js'
import type { ScanConfig } from './types/scan.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2
export const EXIT_ABORTED = 130

export interface CliIo {
  stdout: OutputSink
  stderr: OutputSink
  env?: NodeJS.ProcessEnv
  /** Aborting this signal cancels a running scan (SIGINT/SIGTERM) */
  signal?: AbortSignal
  /** Use this logger instead of creating one from the options */
  logger?: Logger
}

type CliOptions = {
  ports?: string
  concurrency?: string
  timeout?: string
  verbose?: boolean
  json?: boolean
  logLevel?: string
  logDir?: string
}

function buildProgram(io: CliIo): Command {
  return new Command()
    .name(PRODUCT_NAME)
    .description('Scan a host for TCP ports that accept connections')
    .version(VERSION)
    .argument('<target>', 'IP address or hostname to scan')
    .option('-p, --ports <spec>', `ports to scan, e.g. 22,80,8000-8100 (default: ${DEFAULT_PORT_SPEC})`)
    .option('-c, --concurrency <n>', `number of simultaneous connect attempts (default: ${DEFAULT_CONCURRENCY})`)
    .option('-t, --timeout <seconds>', `connection timeout in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})`)
    .option('-v, --verbose', 'print every port with its state, not only open ones')
    .option('--json', 'print JSON lines instead of text')
    .option('--log-level <level>', `log level: ${LOG_LEVELS.join(', ')} (default: ${DEFAULT_LOG_LEVEL})`)
    .option('--log-dir <dir>', 'also write logs to daily rotating files in this directory')
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
}

function describeError(error: Error): string {
  if (error instanceof PortSpecError) {
    return `${error.name}: token ${error.position} "${error.token}" (${error.reason})`
  }
  if (error instanceof TargetResolutionError) {
    return `${error.name}: target "${error.target}" (${error.code ?? 'no code'})`
  }
  if (error instanceof ConfigError) {
    return `${error.name}: option --${error.option}`
  }
  return error.stack ?? `${error.name}: ${error.message}`
}

function fail(io: CliIo, error: Error, logger?: Logger): void {
  io.stderr.write(`error: ${error.message}\n`)
  logger?.debug(describeError(error))
}

/**
 * Run the scanner for the given user arguments (without node and script path)
 * and return the process exit code.
 */
export async function run(argv: string[], io: CliIo): Promise<number> {
  const program = buildProgram(io)

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE
    }
    throw error
  }

  const [target] = program.args
  const opts = program.opts<CliOptions>()

  let config: Config
  try {
    config = loadConfig({ target, ...opts }, io.env ?? process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      // no logger of our own exists before the config is loaded
      fail(io, error, io.logger)
      return EXIT_USAGE
    }
    throw error
  }

  const ownLogger = io.logger === undefined
  const logger = io.logger ?? createLogger(config.logLevel, config.logDir)

  try {
    let scanConfig: ScanConfig
    try {
      scanConfig = await createScanConfig(config)
    } catch (error) {
      if (error instanceof PortSpecError) {
        fail(io, error, logger)
        return EXIT_USAGE
      }
      if (error instanceof TargetResolutionError) {
        fail(io, error, logger)
        return EXIT_FAILURE
      }
      throw error
    }

    if (scanConfig.concurrency > scanConfig.ports.length) {
      logger.debug(`Concurrency ${scanConfig.concurrency} exceeds port count, at most ${scanConfig.ports.length} probes will run at once`)
    }

    const reporter: Reporter = config.json
      ? new JsonReporter(io.stdout, config.verbose)
      : new TextReporter(io.stdout, config.verbose)

    const session = scanPorts(scanConfig, { signal: io.signal, logger })
    const summary = await consumeOutcomes(session, reporter)

    logger.info(
      `Scan of ${summary.address} ${summary.aborted ? 'aborted' : 'finished'} in ${summary.durationMs}ms: ` +
      `${summary.open.length} open, ${summary.closed} closed, ${summary.timedOut} timed out, ${summary.errors} errors`
    )

    return summary.aborted ? EXIT_ABORTED : EXIT_OK
  } finally {
    if (ownLogger) {
      logger.close()
    }
  }
}
