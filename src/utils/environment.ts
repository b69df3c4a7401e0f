import * as fs from 'fs/promises'
import { EnvironmentError } from '../errors.js'
import type { VersionControl } from '../vcs/types.js'

/**
 * Verify git is usable, the project is a work tree and the manifest exists
 */
export async function checkEnvironment(
  vcs: VersionControl,
  manifestPath: string,
): Promise<void> {
  try {
    vcs.checkAvailable()
  } catch (err) {
    const detail = err instanceof Error ? `: ${err.message}` : ''
    throw new EnvironmentError(
      `Missing required dependency: git${detail}. Please install it before running vendor-patch.`,
    )
  }

  if (!vcs.isInsideWorkTree()) {
    throw new EnvironmentError('vendor-patch must be run inside a git repository.')
  }

  try {
    await fs.access(manifestPath)
  } catch {
    throw new EnvironmentError(`composer.json not found at ${manifestPath}`)
  }
}
