/**
 * CLI schema and argument mapping
 */

import type { CLISchema, CommandParseResult } from 'cli-args-parser'
import type { CLIArgs } from '../types.js'
import { neuroreportFormatter } from './lib/colors.js'

const generationOptions = {
  force: {
    type: 'boolean',
    description: 'Regenerate every section, overwriting hand-edited files'
  },
  'protect-edits': {
    type: 'boolean',
    description: 'Keep hand-edited sections (default: generation.protect_edits)'
  },
  domains: {
    type: 'string',
    description: 'Comma-separated domain keys or labels to process (e.g. iq,memory)'
  },
  strict: {
    type: 'boolean',
    description: 'Exit with code 2 when any domain failed'
  }
} as const

export function createCliSchema(version: string): CLISchema {
  return {
    name: 'neuroreport',
    version,
    description: 'Generate, protect and render multi-section neuropsychological reports',
    autoShort: false,
    strict: true,
    formatter: neuroreportFormatter,
    help: {
      includeGlobalOptionsInCommands: true
    },

    options: {
      help: {
        short: 'h',
        type: 'boolean',
        default: false,
        description: 'Show help'
      },
      version: {
        type: 'boolean',
        default: false,
        description: 'Show version'
      },
      subject: {
        short: 's',
        type: 'string',
        description: 'Subject label for the output file (default: subject.label)'
      },
      path: {
        type: 'string',
        description: 'Workspace directory (default: current directory)'
      },
      verbose: {
        short: 'v',
        type: 'boolean',
        default: false,
        description: 'Show per-domain detail'
      },
      quiet: {
        short: 'q',
        type: 'boolean',
        default: false,
        description: 'Only print errors and data'
      },
      json: {
        type: 'boolean',
        default: false,
        description: 'Print machine-readable JSON to stdout'
      }
    },

    commands: {
      run: {
        description: 'Generate all sections, write the manifest and render the report',
        options: {
          ...generationOptions,
          'two-stage': {
            type: 'boolean',
            description: 'Render twice around the enrichment wait (default: render.two_stage)'
          },
          render: {
            type: 'boolean',
            description: 'Render after generation (default: render.enabled)'
          }
        }
      },
      generate: {
        description: 'Generate sections and write the manifest only',
        aliases: ['gen'],
        options: generationOptions
      },
      render: {
        description: 'Render the existing manifest',
        options: {
          'two-stage': {
            type: 'boolean',
            description: 'Render twice around the enrichment wait (default: render.two_stage)'
          }
        }
      },
      protected: {
        description: 'List section files edited by hand since generation'
      },
      domains: {
        description: 'List registered domains in section order'
      },
      init: {
        description: 'Create .neuroreport/config.yaml',
        options: {
          force: {
            type: 'boolean',
            default: false,
            description: 'Overwrite an existing config'
          }
        }
      }
    }
  }
}

function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function optBoolean(opts: Record<string, unknown>, key: string): boolean | undefined {
  const value = opts[key]
  if (typeof value === 'boolean') return value
  if (value === 'true') return true
  if (value === 'false') return false
  return undefined
}

/**
 * Map a parse result to CLIArgs. Options left unset stay undefined so the
 * config decides.
 */
export function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts: Record<string, unknown> = result.options
  const positional: Record<string, unknown> = result.positional

  const args: string[] = [...result.command]
  for (const value of Object.values(positional)) {
    if (typeof value === 'string') {
      args.push(value)
    }
  }
  for (const value of result.rest) {
    args.push(String(value))
  }

  return {
    _: args,
    subject: optString(opts, 'subject'),
    path: optString(opts, 'path'),
    verbose: optBoolean(opts, 'verbose'),
    quiet: optBoolean(opts, 'quiet'),
    json: optBoolean(opts, 'json'),
    force: optBoolean(opts, 'force'),
    'protect-edits': optBoolean(opts, 'protect-edits'),
    'two-stage': optBoolean(opts, 'two-stage'),
    render: optBoolean(opts, 'render'),
    domains: optString(opts, 'domains'),
    strict: optBoolean(opts, 'strict')
  }
}
