import { describe, it, before, after, afterEach, mock } from 'node:test'
import assert from 'node:assert/strict'
import * as fs from 'fs/promises'
import * as path from 'path'
import {
  createTestDir,
  removeTestDir,
  createTestPackage,
  writeTestManifest,
  readProjectFile,
  pathExists,
  FakeVersionControl,
  ScriptedPrompter,
} from './test-utils.js'
import { runVendorPatch } from './run.js'
import { ENV_DEBUG, ENV_PATCHES_DIR } from './constants.js'
import type { CreatePatchDeps } from './commands/create.js'

describe('runVendorPatch', () => {
  let testDir: string
  let caseCount = 0
  const savedEnv = {
    patchesDir: process.env[ENV_PATCHES_DIR],
    debug: process.env[ENV_DEBUG],
  }

  before(async () => {
    testDir = await createTestDir('run-')
  })

  after(async () => {
    await removeTestDir(testDir)
  })

  afterEach(() => {
    for (const [key, value] of [
      [ENV_PATCHES_DIR, savedEnv.patchesDir],
      [ENV_DEBUG, savedEnv.debug],
    ] as const) {
      if (value === undefined) {
        delete process.env[key]
      } else {
        process.env[key] = value
      }
    }
  })

  async function setupProject(): Promise<string> {
    const root = path.join(testDir, `case-${++caseCount}`)
    await writeTestManifest(root, { require: { 'acme/widget': '^1.0' } })
    await createTestPackage(root, 'vendor/acme/widget', { 'README.md': 'widget\n' })
    return root
  }

  function depsFor(root: string, answers: string[]): () => CreatePatchDeps {
    return () => ({
      vcs: new FakeVersionControl(root),
      prompter: new ScriptedPrompter(answers, async () => {
        await fs.writeFile(path.join(root, 'vendor/acme/widget/README.md'), 'patched\n')
      }),
    })
  }

  it('should return 0 and write the patch on success', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(
      ['acme/widget', '--cwd', root, '--silent', '-n', 'readme.patch', '-m', 'Readme'],
      { deps: depsFor(root, ['y']) },
    )

    assert.equal(code, 0)
    assert.equal(
      await readProjectFile(root, 'patches/readme.patch'),
      [
        'diff --git a/README.md b/README.md',
        '--- a/README.md',
        '+++ b/README.md',
        '@@ -1,1 +1,1 @@',
        '-widget',
        '+patched',
        '',
      ].join('\n'),
    )
  })

  it('should write to the configured patches directory', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(
      ['acme/widget', '--cwd', root, '--silent', '-n', 'readme.patch', '-m', 'Readme'],
      { patchesDir: 'custom-patches', deps: depsFor(root, ['y']) },
    )

    assert.equal(code, 0)
    assert.equal(await pathExists(path.join(root, 'custom-patches/readme.patch')), true)
    assert.equal(await pathExists(path.join(root, 'patches')), false)
  })

  it('should return 1 when the user aborts', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(['acme/widget', '--cwd', root, '--silent'], {
      deps: depsFor(root, ['n']),
    })

    assert.equal(code, 1)
    assert.equal(await readProjectFile(root, 'vendor/acme/widget/README.md'), 'widget\n')
    assert.equal(await pathExists(path.join(root, 'patches')), false)
  })

  it('should return 1 for a malformed package identifier', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(['acme', '--cwd', root, '--silent'], {
      deps: depsFor(root, ['y']),
    })

    assert.equal(code, 1)
  })

  it('should return 1 for an unknown option', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(['acme/widget', '--cwd', root, '--bogus'], {
      deps: depsFor(root, ['y']),
    })

    assert.equal(code, 1)
  })

  it('should return 1 when the package is missing', async () => {
    const root = await setupProject()

    const code = await runVendorPatch(['acme/gadget', '--cwd', root, '--silent'], {
      deps: depsFor(root, ['y']),
    })

    assert.equal(code, 1)
  })

  it('should print usage, examples and supported locations for --help', async () => {
    const lines: string[] = []
    const logMock = mock.method(console, 'log', (...args: unknown[]) => {
      lines.push(args.map(String).join(' '))
    })

    const code = await runVendorPatch(['--help']).finally(() => logMock.mock.restore())

    const help = lines.join('\n')
    assert.equal(code, 0)
    assert.match(help, /vendor-patch <vendor\/package> \[options\]/)
    assert.match(help, /vendor-patch drupal\/webform -n fix-validation\.patch/)
    assert.match(help, /web\/modules\/contrib, web\/modules\/custom/)
  })
})
