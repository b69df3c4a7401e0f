import * as fs from 'fs/promises'
import * as path from 'path'
import { VENDOR_DIR } from '../constants.js'
import { PackageManifestSchema } from '../schema/manifest-schema.js'
import type { PackageClassification, PackageIdentifier } from '../types.js'

export const DEFAULT_PACKAGE_TYPE = 'library'

/**
 * Directories a package may already be installed in, highest priority first.
 * Covers the standard vendor directory and the Drupal install roots.
 */
export function getCandidateDirectories(pkg: PackageIdentifier): string[] {
  return [
    `${VENDOR_DIR}/${pkg.namespace}/${pkg.name}`,
    `web/modules/contrib/${pkg.name}`,
    `web/modules/custom/${pkg.name}`,
    `web/themes/contrib/${pkg.name}`,
    `web/themes/custom/${pkg.name}`,
    `web/profiles/contrib/${pkg.name}`,
    `web/profiles/custom/${pkg.name}`,
    `web/libraries/${pkg.name}`,
    'web/core',
    `drush/Commands/contrib/${pkg.name}`,
  ]
}

export interface TypeRule {
  type: string
  matches: (packageId: string) => boolean
}

/**
 * Naming conventions for packages that are declared but not installed.
 * Evaluated top to bottom; the first match wins.
 */
export const TYPE_INFERENCE_RULES: readonly TypeRule[] = [
  { type: 'drupal-core', matches: id => id.startsWith('drupal/core') },
  { type: 'drupal-library', matches: id => id.startsWith('drupal-library/') },
  { type: 'drupal-library', matches: id => id.startsWith('bower-asset/') },
  {
    type: 'drupal-theme',
    matches: id => id.startsWith('drupal/') && id.includes('theme'),
  },
  { type: 'drupal-module', matches: id => id.startsWith('drupal/') },
  {
    type: 'drupal-drush',
    matches: id => id.startsWith('drush/') || id.includes('drush'),
  },
]

export function inferPackageType(
  packageId: string,
  rules: readonly TypeRule[] = TYPE_INFERENCE_RULES,
): string {
  const rule = rules.find(r => r.matches(packageId))
  return rule ? rule.type : DEFAULT_PACKAGE_TYPE
}

/**
 * Read the type declared by an installed package's composer.json.
 * Returns null when the file does not exist; an unreadable or
 * type-less manifest counts as a library.
 */
export async function readInstalledType(
  manifestPath: string,
): Promise<string | null> {
  try {
    await fs.access(manifestPath)
  } catch {
    return null
  }

  let content: string
  try {
    content = await fs.readFile(manifestPath, 'utf-8')
  } catch {
    return DEFAULT_PACKAGE_TYPE
  }

  try {
    const result = PackageManifestSchema.safeParse(JSON.parse(content))
    return (result.success && result.data.type) || DEFAULT_PACKAGE_TYPE
  } catch {
    // Invalid JSON
    return DEFAULT_PACKAGE_TYPE
  }
}

export interface ClassifyOptions {
  projectRoot: string
  /** Whether the project manifest requires the package */
  declared: boolean
  rules?: readonly TypeRule[]
}

/**
 * Determine a package's Composer type.
 * The first candidate directory holding a composer.json decides; otherwise
 * declared packages are classified by name and everything else is a library.
 */
export async function classifyPackage(
  pkg: PackageIdentifier,
  options: ClassifyOptions,
): Promise<PackageClassification> {
  for (const dir of getCandidateDirectories(pkg)) {
    const manifestPath = path.join(options.projectRoot, dir, 'composer.json')
    const type = await readInstalledType(manifestPath)
    if (type !== null) {
      return { type, source: 'installed', manifestPath }
    }
  }

  if (options.declared) {
    return { type: inferPackageType(pkg.id, options.rules), source: 'inferred' }
  }

  return { type: DEFAULT_PACKAGE_TYPE, source: 'default' }
}
