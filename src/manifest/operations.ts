import * as fs from 'fs/promises'
import { MANIFEST_INDENT } from '../constants.js'
import {
  ComposerManifestSchema,
  type ComposerManifest,
  type PatchEntry,
} from '../schema/manifest-schema.js'
import type { InstallerPathRule } from '../types.js'

/**
 * A parsed composer.json: the raw document, kept for rewriting with
 * its key order intact, and the validated view of the fields we use.
 */
export interface ManifestDocument {
  raw: Record<string, unknown>
  manifest: ComposerManifest
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a parsed manifest object
 */
export function validateManifest(parsed: unknown): {
  success: boolean
  document?: ManifestDocument
  error?: string
} {
  if (!isPlainObject(parsed)) {
    return { success: false, error: 'manifest root must be a JSON object' }
  }
  const result = ComposerManifestSchema.safeParse(parsed)
  if (result.success) {
    return { success: true, document: { raw: parsed, manifest: result.data } }
  }
  return {
    success: false,
    error: result.error.message,
  }
}

/**
 * Parse manifest text, throwing on invalid JSON or an invalid shape
 */
export function parseManifest(content: string): ManifestDocument {
  const parsed: unknown = JSON.parse(content)
  const result = validateManifest(parsed)
  if (!result.document) {
    throw new Error(`Invalid composer.json: ${result.error}`)
  }
  return result.document
}

/**
 * Read and parse a manifest from the filesystem
 */
export async function readManifest(path: string): Promise<ManifestDocument> {
  const content = await fs.readFile(path, 'utf-8')
  return parseManifest(content)
}

export function serializeManifest(raw: Record<string, unknown>): string {
  return JSON.stringify(raw, null, MANIFEST_INDENT) + '\n'
}

/**
 * Custom install locations in manifest-declared order
 */
export function getInstallerPathRules(
  manifest: ComposerManifest,
): InstallerPathRule[] {
  const installerPaths = manifest.extra?.['installer-paths'] ?? {}
  return Object.entries(installerPaths).map(([template, targets]) => ({
    template,
    targets,
  }))
}

/**
 * Whether the package appears in require or require-dev
 */
export function isDeclaredDependency(
  manifest: ComposerManifest,
  packageId: string,
): boolean {
  return (
    manifest.require?.[packageId] !== undefined ||
    manifest['require-dev']?.[packageId] !== undefined
  )
}

export function getPatchEntry(
  manifest: ComposerManifest,
  packageId: string,
): PatchEntry | undefined {
  return manifest.extra?.patches?.[packageId]
}

/**
 * Compute the entry for a package after adding one patch.
 * - Without a description the entry is a list; duplicates are not appended.
 * - With a description the entry is a description -> path map.
 * Mixing the two shapes for one package is rejected.
 */
export function extendPatchEntry(
  existing: PatchEntry | undefined,
  patchPath: string,
  description?: string,
): PatchEntry {
  if (description) {
    if (Array.isArray(existing)) {
      throw new Error(
        'existing patches for this package are a list; cannot add a described patch',
      )
    }
    return { ...(existing ?? {}), [description]: patchPath }
  }

  if (existing !== undefined && !Array.isArray(existing)) {
    throw new Error(
      'existing patches for this package are described; a description is required',
    )
  }
  const paths = existing ?? []
  return paths.includes(patchPath) ? [...paths] : [...paths, patchPath]
}

/**
 * Return a new raw document with the patch recorded under
 * extra.patches[packageId]. The input document is not modified.
 */
export function addPatchEntry(
  document: ManifestDocument,
  packageId: string,
  patchPath: string,
  description?: string,
): { raw: Record<string, unknown>; entry: PatchEntry } {
  const entry = extendPatchEntry(
    getPatchEntry(document.manifest, packageId),
    patchPath,
    description,
  )

  const raw = structuredClone(document.raw)
  const extra = isPlainObject(raw.extra) ? raw.extra : {}
  const patches = isPlainObject(extra.patches) ? extra.patches : {}
  patches[packageId] = entry
  extra.patches = patches
  raw.extra = extra

  return { raw, entry }
}
