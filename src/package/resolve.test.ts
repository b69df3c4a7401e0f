import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import * as path from 'path'
import {
  createTestDir,
  removeTestDir,
  createTestPackage,
} from '../test-utils.js'
import {
  assertPackageDirectory,
  findInstallerPathRule,
  resolvePackagePath,
} from './resolve.js'
import { parsePackageIdentifier } from './identifier.js'
import { ResolutionError } from '../errors.js'
import type { InstallerPathRule } from '../types.js'

const DRUPAL_RULES: InstallerPathRule[] = [
  { template: 'web/core', targets: ['type:drupal-core'] },
  { template: 'web/libraries/{$name}', targets: ['type:drupal-library', 'type:bower-asset'] },
  { template: 'web/modules/contrib/{$name}', targets: ['type:drupal-module'] },
  { template: 'web/themes/contrib/{$name}', targets: ['type:drupal-theme'] },
  { template: 'drush/Commands/contrib/{$name}', targets: ['type:drupal-drush'] },
]

describe('package path resolution', () => {
  const widget = parsePackageIdentifier('acme/widget')

  describe('resolvePackagePath', () => {
    it('should use the vendor directory without rules', () => {
      assert.equal(resolvePackagePath(widget, [], 'library'), 'vendor/acme/widget')
    })

    it('should use the vendor directory when no rule targets the type', () => {
      assert.equal(
        resolvePackagePath(widget, DRUPAL_RULES, 'library'),
        'vendor/acme/widget',
      )
    })

    it('should substitute the package name into a matching rule', () => {
      const rules: InstallerPathRule[] = [
        { template: 'custom/modules/{$name}', targets: ['type:special-module'] },
      ]
      assert.equal(
        resolvePackagePath(widget, rules, 'special-module'),
        'custom/modules/widget',
      )
    })

    it('should resolve each Drupal type to its directory', () => {
      const webform = parsePackageIdentifier('drupal/webform')
      assert.equal(resolvePackagePath(webform, DRUPAL_RULES, 'drupal-module'), 'web/modules/contrib/webform')
      assert.equal(resolvePackagePath(webform, DRUPAL_RULES, 'drupal-theme'), 'web/themes/contrib/webform')
      assert.equal(resolvePackagePath(webform, DRUPAL_RULES, 'drupal-library'), 'web/libraries/webform')
      assert.equal(resolvePackagePath(webform, DRUPAL_RULES, 'drupal-drush'), 'drush/Commands/contrib/webform')
      assert.equal(resolvePackagePath(webform, DRUPAL_RULES, 'drupal-core'), 'web/core')
    })

    it('should pick the first declared rule when several match', () => {
      const rules: InstallerPathRule[] = [
        { template: 'first/{$name}', targets: ['type:drupal-module'] },
        { template: 'second/{$name}', targets: ['type:drupal-module'] },
      ]
      assert.equal(resolvePackagePath(widget, rules, 'drupal-module'), 'first/widget')
      assert.equal(
        resolvePackagePath(widget, [...rules].reverse(), 'drupal-module'),
        'second/widget',
      )
    })

    it('should require an exact type selector', () => {
      const rules: InstallerPathRule[] = [
        { template: 'modules/{$name}', targets: ['type:drupal-module'] },
      ]
      assert.equal(resolvePackagePath(widget, rules, 'drupal'), 'vendor/acme/widget')
    })

    it('should ignore package-name selectors', () => {
      const rules: InstallerPathRule[] = [
        { template: 'special/{$name}', targets: ['acme/widget'] },
      ]
      assert.equal(resolvePackagePath(widget, rules, 'library'), 'vendor/acme/widget')
    })

    // Only {$name} is substituted; other installer placeholders stay literal
    it('should leave other placeholders untouched', () => {
      const rules: InstallerPathRule[] = [
        { template: 'packages/{$vendor}/{$name}', targets: ['type:library'] },
      ]
      assert.equal(resolvePackagePath(widget, rules, 'library'), 'packages/{$vendor}/widget')
    })

    it('should replace every {$name} occurrence', () => {
      const rules: InstallerPathRule[] = [
        { template: 'libs/{$name}/{$name}', targets: ['type:library'] },
      ]
      assert.equal(resolvePackagePath(widget, rules, 'library'), 'libs/widget/widget')
    })

    it('should be deterministic for the same inputs', () => {
      const first = resolvePackagePath(widget, DRUPAL_RULES, 'drupal-module')
      const second = resolvePackagePath(widget, DRUPAL_RULES, 'drupal-module')
      assert.equal(first, second)
    })
  })

  describe('findInstallerPathRule', () => {
    it('should return undefined when nothing matches', () => {
      assert.equal(findInstallerPathRule(DRUPAL_RULES, 'library'), undefined)
    })

    it('should match any selector in the target list', () => {
      assert.equal(
        findInstallerPathRule(DRUPAL_RULES, 'bower-asset')?.template,
        'web/libraries/{$name}',
      )
    })
  })

  describe('assertPackageDirectory', () => {
    let testDir: string

    before(async () => {
      testDir = await createTestDir('resolve-')
    })

    after(async () => {
      await removeTestDir(testDir)
    })

    it('should accept an existing directory', async () => {
      await createTestPackage(testDir, 'custom/modules/widget', { 'widget.php': '<?php\n' })
      await assertPackageDirectory(testDir, 'custom/modules/widget', 'special-module')
    })

    it('should report the path and type when the directory is missing', async () => {
      await assert.rejects(
        assertPackageDirectory(testDir, 'vendor/acme/missing', 'library'),
        (err: unknown) => {
          assert.ok(err instanceof ResolutionError)
          assert.equal(err.path, 'vendor/acme/missing')
          assert.equal(err.packageType, 'library')
          assert.equal(err.message, 'Package not found at: vendor/acme/missing (type: library)')
          return true
        },
      )
    })

    it('should reject a file in place of the directory', async () => {
      await createTestPackage(testDir, 'vendor/acme', { 'file-not-dir': 'x' })
      await assert.rejects(
        assertPackageDirectory(testDir, path.join('vendor/acme', 'file-not-dir'), 'library'),
        ResolutionError,
      )
    })
  })
})
