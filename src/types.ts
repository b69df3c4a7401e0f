import type { PatchEntry } from './schema/manifest-schema.js'

export interface PackageIdentifier {
  namespace: string
  name: string
  /** Canonical `namespace/name` form, used as the manifest key */
  id: string
}

/**
 * A custom install location from `extra.installer-paths`
 */
export interface InstallerPathRule {
  /** Directory template, e.g. `web/modules/contrib/{$name}` */
  template: string
  /** Selectors such as `type:drupal-module` or `vendor/package` */
  targets: string[]
}

export type PackageTypeSource = 'installed' | 'inferred' | 'default'

export interface PackageClassification {
  type: string
  source: PackageTypeSource
  /** Nested composer.json the type was read from, when `source` is `installed` */
  manifestPath?: string
}

export interface CreatePatchResult {
  packageId: string
  packageType: string
  packagePath: string
  /** Patch file path relative to the project root, as recorded in the manifest */
  patchFile: string
  manifestEntry: PatchEntry
  modifiedFiles: string[]
}
