import * as fs from 'fs/promises'
import { BACKUP_SUFFIX, TEMP_SUFFIX } from '../constants.js'
import { RegistryError } from '../errors.js'
import type { PatchEntry } from '../schema/manifest-schema.js'
import { addPatchEntry, parseManifest, serializeManifest } from './operations.js'

export interface RegisterPatchOptions {
  manifestPath: string
  packageId: string
  /** Patch path as it should appear in the manifest */
  patchPath: string
  description?: string
}

export interface RegisterPatchResult {
  entry: PatchEntry
  backupPath: string
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Record a patch in composer.json.
 *
 * A backup copy is written to `<manifest>.bak` before anything else and
 * left in place. The updated document goes to `<manifest>.tmp` and is
 * renamed over the manifest. On any failure the temp file is removed,
 * the manifest is copied back from the backup and a RegistryError is
 * thrown, also when either cleanup step fails. The patch file itself is
 * never touched here.
 */
export async function registerPatch(
  options: RegisterPatchOptions,
): Promise<RegisterPatchResult> {
  const { manifestPath, packageId, patchPath, description } = options
  const backupPath = manifestPath + BACKUP_SUFFIX
  const tempPath = manifestPath + TEMP_SUFFIX

  try {
    await fs.copyFile(manifestPath, backupPath)
  } catch (err) {
    const error = toError(err)
    throw new RegistryError(
      patchPath,
      `could not back up ${manifestPath} (${error.message})`,
      error,
    )
  }

  try {
    const content = await fs.readFile(manifestPath, 'utf-8')
    const { raw, entry } = addPatchEntry(
      parseManifest(content),
      packageId,
      patchPath,
      description,
    )
    await fs.writeFile(tempPath, serializeManifest(raw), 'utf-8')
    await fs.rename(tempPath, manifestPath)
    return { entry, backupPath }
  } catch (err) {
    const error = toError(err)
    const reasons = [error.message]
    try {
      await fs.rm(tempPath, { force: true })
    } catch (rmErr) {
      reasons.push(`could not remove ${tempPath} (${toError(rmErr).message})`)
    }
    try {
      await fs.copyFile(backupPath, manifestPath)
    } catch (restoreErr) {
      reasons.push(
        `could not restore ${manifestPath} from ${backupPath} (${toError(restoreErr).message})`,
      )
    }
    throw new RegistryError(patchPath, reasons.join('; '), error)
  }
}
