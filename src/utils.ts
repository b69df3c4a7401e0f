import type { CreatePatchResult } from './types.js'

export function formatPatchResult(result: CreatePatchResult): string {
  let message = `✓ Created ${result.patchFile} for ${result.packageId} (${result.packagePath})`
  if (result.modifiedFiles.length > 0) {
    message += `\n  Modified files: ${result.modifiedFiles.join(', ')}`
  }
  return message
}

export function log(message: string, verbose: boolean = false): void {
  if (verbose) {
    console.log(`[vendor-patch] ${message}`)
  }
}

export function error(message: string): void {
  console.error(`[vendor-patch] ERROR: ${message}`)
}
