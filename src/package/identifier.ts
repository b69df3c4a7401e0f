import { InputError } from '../errors.js'
import type { PackageIdentifier } from '../types.js'

/**
 * Parse a `vendor/package` string.
 * e.g., "drupal/webform" -> { namespace: "drupal", name: "webform", id: "drupal/webform" }
 */
export function parsePackageIdentifier(input: string): PackageIdentifier {
  const parts = input.split('/')
  if (parts.length !== 2) {
    throw new InputError(
      `Invalid package identifier "${input}": expected <vendor>/<package>`,
    )
  }

  const [namespace, name] = parts
  if (!namespace || !name) {
    throw new InputError(
      `Invalid package identifier "${input}": vendor and package must not be empty`,
    )
  }

  return { namespace, name, id: `${namespace}/${name}` }
}

/**
 * Non-throwing variant for argument validation
 */
export function isPackageIdentifier(input: string): boolean {
  const parts = input.split('/')
  return parts.length === 2 && parts.every(part => part.length > 0)
}
