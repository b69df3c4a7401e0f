import type { PackageIdentifier } from '../types.js'

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/**
 * e.g., acme/widget -> patch_acme_widget_20240102_030405.patch
 */
export function defaultPatchFileName(
  pkg: PackageIdentifier,
  date: Date = new Date(),
): string {
  return `patch_${pkg.namespace}_${pkg.name}_${formatTimestamp(date)}.patch`
}
