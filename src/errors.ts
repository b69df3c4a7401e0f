/**
 * Error types for vendor-patch runs.
 * Each failure class carries the context the operator needs to follow up.
 */

export type VendorPatchErrorKind =
  | 'environment'
  | 'input'
  | 'resolution'
  | 'user-abort'
  | 'empty-change'
  | 'registry'
  | 'vcs'

export abstract class VendorPatchError extends Error {
  abstract readonly kind: VendorPatchErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Missing git, not inside a work tree, or no manifest
 */
export class EnvironmentError extends VendorPatchError {
  readonly kind = 'environment'
}

/**
 * Malformed package identifier or bad command line
 */
export class InputError extends VendorPatchError {
  readonly kind = 'input'
}

export class ResolutionError extends VendorPatchError {
  readonly kind = 'resolution'

  constructor(
    public readonly path: string,
    public readonly packageType: string,
  ) {
    super(`Package not found at: ${path} (type: ${packageType})`)
  }
}

export class UserAbortError extends VendorPatchError {
  readonly kind = 'user-abort'

  constructor() {
    super('Patch creation aborted.')
  }
}

export class EmptyChangeError extends VendorPatchError {
  readonly kind = 'empty-change'

  constructor(
    public readonly packageId: string,
    public readonly path: string,
  ) {
    super(`No modified files found in package: ${packageId} at ${path}`)
  }
}

/**
 * The patch file exists but composer.json could not be updated.
 * The manifest has been restored from its backup.
 */
export class RegistryError extends VendorPatchError {
  readonly kind = 'registry'

  constructor(
    public readonly patchFile: string,
    public readonly reason: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Manifest update failed: ${reason}. The patch file ${patchFile} was kept; register it manually.`,
    )
  }
}

export class VcsCommandError extends VendorPatchError {
  readonly kind = 'vcs'

  constructor(
    public readonly operation: string,
    public readonly exitCode: number | null,
    public readonly path: string,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim()
    super(
      `git ${operation} failed for ${path} (exit code: ${exitCode ?? 'unknown'})` +
        (detail ? `: ${detail}` : ''),
    )
  }
}

export function isVendorPatchError(err: unknown): err is VendorPatchError {
  return err instanceof VendorPatchError
}
