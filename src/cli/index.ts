#!/usr/bin/env node
/**
 * CLI entry point for engine-options.
 *
 * Parses command line arguments with meow and prints the engine's
 * option table after applying any `--set` writes.
 *
 * @example
 * ```bash
 * engine-options                                  # Print the option table
 * engine-options --set Hash=256 --set Threads=8   # Apply writes first
 * engine-options --json --strict --set Hash=0     # Fail on rejected writes
 * ```
 */
import meow from 'meow'

import { runCli } from './run.js'
import type { CliFlags } from './run.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ engine-options [options]

  Options
    --set, -s <name=value>  Write an option (repeatable, applied in order)
    --json                  Output option descriptors as JSON
    --strict                Fail when a write is rejected
    --log-level <level>     silent, error, warn, info or verbose (default: warn)
    --help, -h              Show this help
    --version               Show version

  Environment
    ENGINE_LOG_LEVEL        Log level when --log-level is not given
    ENGINE_DEBUG            Print every observer event to stderr

  Examples
    $ engine-options
    $ engine-options --set "Hash=256" --set "Analysis Contempt=White"
    $ engine-options --json --strict --set "Threads=8"
`


/**
 * Parse CLI arguments with meow.
 */
function parseCli(): CliFlags {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            set: {
                type: 'string',
                shortFlag: 's',
                isMultiple: true,
                default: []
            },
            json: {
                type: 'boolean',
                default: false
            },
            strict: {
                type: 'boolean',
                default: false
            },
            logLevel: {
                type: 'string'
            }
        }
    })

    return {
        set: cli.flags.set,
        json: cli.flags.json,
        strict: cli.flags.strict,
        logLevel: cli.flags.logLevel
    }
}


process.exitCode = await runCli(parseCli(), {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    color: process.stderr.isTTY === true
})
