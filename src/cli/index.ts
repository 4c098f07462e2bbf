#!/usr/bin/env node
/**
 * neuroreport CLI
 *
 * Generation orchestration and two-stage rendering for neuropsychological reports
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createCLI } from 'cli-args-parser'
import { formatErrorForCli, isNeuroreportError } from '../lib/errors.js'
import { loadWorkflowSettings } from '../lib/workflow.js'
import { createCliSchema, toCliArgs } from './args.js'
import { runDomains } from './commands/domains.js'
import { runGenerate } from './commands/generate.js'
import { runInit } from './commands/init.js'
import { runProtected } from './commands/protected.js'
import { runRenderCommand } from './commands/render.js'
import { runRun } from './commands/run.js'
import { c, print } from './lib/colors.js'
import type { CommandContext } from './lib/context.js'
import * as ui from './ui.js'

const VERSION = process.env.NEUROREPORT_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this file to the nearest package.json (src/cli or dist/cli)
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

const cli = createCLI(createCliSchema(VERSION))

async function main(): Promise<number> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)

  // Apply global working directory override before resolving config
  if (args.path) {
    const targetDir = path.resolve(args.path)
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      print.error(`Path does not exist or is not a directory: ${targetDir}`)
      return 1
    }
    process.chdir(targetDir)
  }

  if (result.options.version) {
    ui.output(`neuroreport v${VERSION}`)
    return 0
  }

  // Handle help before the error check, so `run --help` works
  if (result.options.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return 0
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(String(error))
    }
    return 1
  }

  const command = result.command[0]
  const verbose = args.verbose ?? false
  const quiet = args.quiet ?? false
  const jsonOutput = args.json ?? false
  ui.setQuiet(quiet)

  try {
    switch (command) {
      case 'init':
        return await runInit({ args, subject: args.subject, jsonOutput })

      case 'domains':
        return await runDomains({ jsonOutput })
    }

    const settings = loadWorkflowSettings()
    ui.verbose(`Workspace: ${settings.workspaceRoot}`, verbose)

    const context: CommandContext = {
      args,
      settings,
      subject: args.subject ?? settings.subject,
      verbose,
      quiet,
      jsonOutput
    }

    switch (command) {
      case 'run':
        return await runRun(context)

      case 'generate':
      case 'gen':
        return await runGenerate(context)

      case 'render':
        return await runRenderCommand(context)

      case 'protected':
        return await runProtected(context)

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('neuroreport --help')}" for usage information`)
        return 1
    }
  } catch (err) {
    if (isNeuroreportError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (verbose && err instanceof Error && err.stack) {
      print.error(err.stack)
    } else {
      print.error(err instanceof Error ? err.message : String(err))
    }
    return 1
  }
}

main().then(
  code => {
    process.exitCode = code
  },
  (err: unknown) => {
    print.error(`Fatal ${formatErrorForCli(err)}`)
    process.exit(1)
  }
)
