import yargs from 'yargs'
import { createCommand, type CreatePatchDeps } from './commands/create.js'
import { ENV_DEBUG, ENV_PATCHES_DIR } from './constants.js'
import { InputError } from './errors.js'

/**
 * Configuration options for running vendor-patch programmatically.
 */
export interface VendorPatchOptions {
  /** Directory patch files are written to (default: patches). */
  patchesDir?: string
  /** Enable debug logging. */
  debug?: boolean
  /** Replace git and the terminal prompt, e.g. in tests or editor integrations. */
  deps?: (cwd: string) => CreatePatchDeps
}

/**
 * Run vendor-patch programmatically with provided arguments and options.
 * Maps options to environment variables before executing the yargs command.
 *
 * @param args - Command line arguments (e.g., ['drupal/webform', '-m', 'Fix validation']).
 * @returns Exit code (0 for success, non-zero for failure).
 */
export async function runVendorPatch(
  args: string[],
  options?: VendorPatchOptions,
): Promise<number> {
  // Map options to environment variables.
  if (options?.patchesDir) {
    process.env[ENV_PATCHES_DIR] = options.patchesDir
  }
  if (options?.debug) {
    process.env[ENV_DEBUG] = '1'
  }

  let exitCode = 0

  try {
    await yargs(args)
      .scriptName('vendor-patch')
      .usage('$0 <vendor/package> [options]')
      .command(
        createCommand({
          deps: options?.deps,
          onExit: code => {
            exitCode = code
          },
        }),
      )
      .help()
      .alias('h', 'help')
      .strict()
      .exitProcess(false)
      .fail((message, error) => {
        throw error ?? new InputError(message)
      })
      .parse()

    return exitCode
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`Error: ${message}`)
    if (process.env[ENV_DEBUG]) {
      console.error('vendor-patch error:', error)
    }
    return 1
  }
}
