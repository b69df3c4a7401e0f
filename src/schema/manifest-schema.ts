import { z } from 'zod'

export const DEFAULT_MANIFEST_PATH = 'composer.json'

export const PatchEntrySchema = z.union([
  z.array(z.string()), // Patch paths without descriptions
  z.record(
    z.string(), // Description like "Fix webform validation"
    z.string(), // Patch path
  ),
])

/**
 * Value stored under `extra.patches[<package>]`
 */
export type PatchEntry = z.infer<typeof PatchEntrySchema>

export const InstallerPathsSchema = z.record(
  z.string(), // Directory template like "web/modules/contrib/{$name}"
  z.array(z.string()), // Selectors like "type:drupal-module"
)

export const ComposerExtraSchema = z
  .object({
    patches: z
      .record(
        z.string(), // Package identifier like "drupal/webform"
        PatchEntrySchema,
      )
      .optional(),
    'installer-paths': InstallerPathsSchema.optional(),
  })
  .passthrough()

/**
 * The parts of composer.json this tool reads or writes.
 * Everything else passes through untouched.
 */
export const ComposerManifestSchema = z
  .object({
    type: z.string().optional(),
    require: z.record(z.string(), z.string()).optional(),
    'require-dev': z.record(z.string(), z.string()).optional(),
    extra: ComposerExtraSchema.optional(),
  })
  .passthrough()

export type ComposerManifest = z.infer<typeof ComposerManifestSchema>

/**
 * A package's own composer.json; only its type matters here
 */
export const PackageManifestSchema = z
  .object({
    type: z.string().min(1).optional(),
  })
  .passthrough()
