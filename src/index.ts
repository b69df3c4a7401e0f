export type {
  PackageIdentifier,
  InstallerPathRule,
  PackageClassification,
  CreatePatchResult,
} from './types.js'
export { formatPatchResult, log, error } from './utils.js'
export * from './errors.js'

// Re-export schema
export * from './schema/manifest-schema.js'

// Re-export package location utilities
export * from './package/index.js'

// Re-export patch capture and rewriting
export * from './patch/capture.js'
export * from './patch/rewrite.js'
export * from './patch/file-name.js'

// Re-export manifest utilities
export * from './manifest/operations.js'
export * from './manifest/registry.js'

// Re-export version control
export type { VersionControl } from './vcs/types.js'
export { GitVersionControl, execGit, type GitExec } from './vcs/git.js'

export {
  createVendorPatch,
  type CreatePatchOptions,
  type CreatePatchDeps,
} from './commands/create.js'
export { runVendorPatch, type VendorPatchOptions } from './run.js'

// Re-export constants
export * from './constants.js'
