#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'

import { loadInstallerConfig } from './cli/config.js'
import type { InstallerConfig } from './cli/config.js'
import { createFileLogger, installLogPath } from './core/audit.js'
import { createRunContext } from './core/context.js'
import { errorMessage, InstallerError } from './core/errors.js'
import { InteractiveGate } from './core/gate.js'
import { ReversalEngine } from './core/reverse.js'
import { runInstall } from './core/runner.js'
import { defaultPhases, launcherPath } from './phases/index.js'
import type { RunContext } from './types.js'

type Argv = string[]

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_PARTIAL_REVERSAL = 2

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = EXIT_FAILURE) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = EXIT_FAILURE): never {
  throw new CliExit(msg, code)
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (!names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  let found = false
  for (let idx = args.findIndex(a => names.includes(a)); idx >= 0; idx = args.findIndex(a => names.includes(a))) {
    args.splice(idx, 1)
    found = true
  }
  return found
}

export interface CliOptions {
  dryRun: boolean
  reverse: boolean
  help: boolean
  configPath?: string
}

export function parseArgs(argv: Argv): CliOptions {
  const args = [...argv]
  const help = hasFlag(args, ['-h', '--help'])
  const dryRun = hasFlag(args, ['--dry-run'])
  const reverse = hasFlag(args, ['--reverse', '--rollback', '--undo'])
  const configPath = popFlagValue(args, ['--config'])
  if (args.length) die(`Unknown argument: ${args[0]} (use --help for usage)`)
  return { dryRun, reverse, help, configPath }
}

function printHelp(): void {
  const msg = `
reversible-installer

Usage:
  reversible-installer                 Run the installer (every phase asks for approval)
  reversible-installer --dry-run       Show what would be done without making changes
  reversible-installer --reverse       Undo previous installations using the journal
                                       (aliases: --rollback, --undo)
  reversible-installer --config <path> Read settings from a JSON file
                                       (default: ./installer.config.json when present)
  reversible-installer --help          Show this help message
`
  process.stdout.write(msg.trimStart())
}

function showBanner(ctx: RunContext, config: InstallerConfig) {
  const { logger } = ctx
  logger.info(`${config.appName} installer for Linux (Wayland + KDE Plasma)`)
  logger.info(`Mode:              ${ctx.reverseMode ? 'reverse' : 'install'}${ctx.dryRun ? ' (dry-run)' : ''}`)
  logger.info(`Working directory: ${process.cwd()}`)
  logger.info(`State directory:   ${ctx.stateDir}`)
  logger.info(`Date:              ${new Date().toString()}`)
  logger.info(`User:              ${os.userInfo().username}`)
}

async function reverse(ctx: RunContext, config: InstallerConfig): Promise<number> {
  const engine = new ReversalEngine(ctx, {
    gate: new InteractiveGate(ctx),
    launcherLinks: [{ link: config.binLink, target: launcherPath(config) }],
    executionLog: createFileLogger(installLogPath(ctx)),
  })
  const outcome = await engine.run()
  if (outcome.status === 'aborted') return EXIT_OK
  return outcome.report.errors.length ? EXIT_PARTIAL_REVERSAL : EXIT_OK
}

async function install(ctx: RunContext, config: InstallerConfig): Promise<number> {
  const { status } = await runInstall({
    ctx,
    config,
    phases: defaultPhases(),
    gate: new InteractiveGate(ctx),
  })
  return status === 'failed' ? EXIT_FAILURE : EXIT_OK
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const opts = parseArgs(argv)
    if (opts.help) {
      printHelp()
      return EXIT_OK
    }

    let config: InstallerConfig
    try {
      config = await loadInstallerConfig(opts.configPath)
    } catch (e) {
      die(errorMessage(e))
    }

    const ctx = createRunContext({
      dryRun: opts.dryRun,
      reverseMode: opts.reverse,
      stateDir: config.stateDir,
      privilegedRoots: config.privilegedRoots,
    })
    showBanner(ctx, config)

    try {
      return ctx.reverseMode ? await reverse(ctx, config) : await install(ctx, config)
    } catch (e) {
      if (e instanceof InstallerError) {
        ctx.logger.error(`${e.code}: ${e.message}`)
        return EXIT_FAILURE
      }
      throw e
    }
  } catch (e) {
    if (e instanceof CliExit) {
      const msg = e.message || 'Command failed'
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      return e.exitCode
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      const msg = err instanceof Error && err.stack ? err.stack : String(err)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
