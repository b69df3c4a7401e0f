import { EmptyChangeError, UserAbortError } from '../errors.js'
import type { VersionControl } from '../vcs/types.js'

export interface CaptureOptions {
  packageId: string
  /** Package directory relative to the project root */
  location: string
  /** Blocks until the user has finished editing; false aborts */
  confirm: () => Promise<boolean>
  /** Runs after modifications are found and before the diff is taken */
  onChangesDetected?: (files: string[]) => Promise<void>
  silent?: boolean
}

export interface CapturedChanges {
  modifiedFiles: string[]
  /** Raw diff with project-relative paths */
  diff: string
}

/**
 * Bracket a manual edit session on a package directory.
 *
 * The directory is force-staged so the index holds its pre-edit state.
 * Once staging succeeded, the working copy is restored and unstaged on
 * every exit path: abort, no changes, hook failure, diff failure and
 * success alike.
 */
export async function captureChanges(
  vcs: VersionControl,
  options: CaptureOptions,
): Promise<CapturedChanges> {
  const { packageId, location, confirm, onChangesDetected, silent } = options

  if (!silent) {
    console.log(`Staging package files for patch at: ${location}`)
  }
  vcs.forceAdd(location)

  try {
    if (!silent) {
      console.log(`✓ Done!`)
      console.log(
        `\nModify the required files for package: ${packageId} at ${location}`,
      )
    }

    const confirmed = await confirm()
    if (!confirmed) {
      throw new UserAbortError()
    }

    const modifiedFiles = vcs.listModified(location)
    if (modifiedFiles.length === 0) {
      throw new EmptyChangeError(packageId, location)
    }

    await onChangesDetected?.(modifiedFiles)

    return { modifiedFiles, diff: vcs.diff(location) }
  } finally {
    if (!silent) {
      console.log('Restoring/Un-staging the modified files...')
    }
    vcs.restore(location)
    vcs.unstage(location)
  }
}
