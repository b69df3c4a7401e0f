import * as fs from 'fs/promises'
import * as path from 'path'
import { VENDOR_DIR } from '../constants.js'
import { ResolutionError } from '../errors.js'
import type { InstallerPathRule, PackageIdentifier } from '../types.js'

export const NAME_PLACEHOLDER = '{$name}'

export function getVendorPath(pkg: PackageIdentifier): string {
  return `${VENDOR_DIR}/${pkg.namespace}/${pkg.name}`
}

/**
 * Find the first rule, in declared order, that targets the package type
 */
export function findInstallerPathRule(
  rules: readonly InstallerPathRule[],
  packageType: string,
): InstallerPathRule | undefined {
  const selector = `type:${packageType}`
  return rules.find(rule => rule.targets.includes(selector))
}

/**
 * Compute the project-relative directory of a package.
 * Only `{$name}` is substituted; other placeholders are left as written.
 */
export function resolvePackagePath(
  pkg: PackageIdentifier,
  rules: readonly InstallerPathRule[],
  packageType: string,
): string {
  const rule = findInstallerPathRule(rules, packageType)
  if (!rule) {
    return getVendorPath(pkg)
  }
  return rule.template.split(NAME_PLACEHOLDER).join(pkg.name)
}

/**
 * Ensure the resolved directory exists under the project root
 */
export async function assertPackageDirectory(
  projectRoot: string,
  packagePath: string,
  packageType: string,
): Promise<void> {
  try {
    const stat = await fs.stat(path.join(projectRoot, packagePath))
    if (stat.isDirectory()) {
      return
    }
  } catch {
    // Missing, reported below
  }
  throw new ResolutionError(packagePath, packageType)
}
