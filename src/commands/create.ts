import * as fs from 'fs/promises'
import * as path from 'path'
import type { CommandModule } from 'yargs'
import {
  DEFAULT_MANIFEST_PATH,
  DEFAULT_PATCHES_DIR,
  ENV_DEBUG,
  ENV_PATCHES_DIR,
} from '../constants.js'
import { EnvironmentError, InputError, UserAbortError } from '../errors.js'
import {
  getInstallerPathRules,
  isDeclaredDependency,
  readManifest,
  type ManifestDocument,
} from '../manifest/operations.js'
import { registerPatch } from '../manifest/registry.js'
import {
  assertPackageDirectory,
  classifyPackage,
  isPackageIdentifier,
  parsePackageIdentifier,
  resolvePackagePath,
} from '../package/index.js'
import { captureChanges } from '../patch/capture.js'
import { defaultPatchFileName } from '../patch/file-name.js'
import { rewritePatchPaths } from '../patch/rewrite.js'
import type { CreatePatchResult } from '../types.js'
import { error, formatPatchResult, log } from '../utils.js'
import { checkEnvironment } from '../utils/environment.js'
import { createTerminalPrompter, type Prompter } from '../utils/prompt.js'
import { GitVersionControl } from '../vcs/git.js'
import type { VersionControl } from '../vcs/types.js'

export interface CreatePatchOptions {
  /** `vendor/package` as typed by the user */
  packageName: string
  /** Project root */
  cwd: string
  /** composer.json path, absolute or relative to cwd */
  manifestPath: string
  /** Output directory, absolute or relative to cwd */
  patchesDir: string
  /** Patch file name; asked for when missing */
  name?: string
  /** Patch description; asked for when missing */
  message?: string
  projectRelative: boolean
  silent?: boolean
  /** Clock for the default file name */
  now?: () => Date
}

export interface CreatePatchDeps {
  vcs: VersionControl
  prompter: Prompter
}

function resolveFrom(cwd: string, target: string): string {
  return path.isAbsolute(target) ? target : path.join(cwd, target)
}

function toManifestPath(cwd: string, file: string): string {
  return path.relative(cwd, file).split(path.sep).join('/')
}

/**
 * Create a patch for one package and record it in composer.json.
 *
 * Runs once per invocation: environment check, classification, path
 * resolution, the staged edit session, diff rewriting, writing the patch
 * file and finally the manifest update. Every failure before the manifest
 * update leaves the work tree and composer.json as they were; a failed
 * manifest update keeps the written patch file.
 */
export async function createVendorPatch(
  options: CreatePatchOptions,
  deps: CreatePatchDeps,
): Promise<CreatePatchResult> {
  const { cwd, silent } = options
  const { vcs, prompter } = deps
  const pkg = parsePackageIdentifier(options.packageName)
  const manifestPath = resolveFrom(cwd, options.manifestPath)

  await checkEnvironment(vcs, manifestPath)

  let manifestDoc: ManifestDocument
  try {
    manifestDoc = await readManifest(manifestPath)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new EnvironmentError(`Could not read ${manifestPath}: ${message}`)
  }
  const { manifest } = manifestDoc

  const classification = await classifyPackage(pkg, {
    projectRoot: cwd,
    declared: isDeclaredDependency(manifest, pkg.id),
  })
  const packagePath = resolvePackagePath(
    pkg,
    getInstallerPathRules(manifest),
    classification.type,
  )
  log(
    classification.source === 'installed'
      ? `Type read from ${classification.manifestPath}`
      : classification.source === 'inferred'
        ? `Type inferred from package name ${pkg.id}`
        : `${pkg.id} is neither installed nor required; assuming a library`,
    Boolean(process.env[ENV_DEBUG]),
  )
  await assertPackageDirectory(cwd, packagePath, classification.type)

  if (!silent) {
    console.log(
      `Resolved ${pkg.id} (type: ${classification.type}) to ${packagePath}`,
    )
  }

  let patchName = options.name
  let description = options.message

  const captured = await captureChanges(vcs, {
    packageId: pkg.id,
    location: packagePath,
    silent,
    confirm: () =>
      prompter.confirm(
        'Once you have finished making the changes:\n' +
          '- Press y to continue.\n' +
          '- Press a or any other key to abort.\n' +
          'Your choice: ',
      ),
    onChangesDetected: async files => {
      if (!silent) {
        console.log('Modified files:')
        for (const file of files) {
          console.log(`  ${file}`)
        }
      }
      if (!patchName) {
        patchName = await prompter.ask(
          `Enter patch file name (default: patch_${pkg.namespace}_${pkg.name}_{date}.patch, press Enter to skip): `,
        )
      }
      if (!description) {
        description = await prompter.ask(
          'Enter patch description (optional, press Enter to skip): ',
        )
      }
    },
  })

  const fileName = patchName || defaultPatchFileName(pkg, options.now?.())
  const patchFile = path.join(resolveFrom(cwd, options.patchesDir), fileName)
  const recordedPath = toManifestPath(cwd, patchFile)

  if (!silent) {
    console.log(`Creating patch file: ${recordedPath}...`)
    if (!options.projectRelative) {
      console.log('Converting patch to vendor-relative paths...')
    }
  }
  const body = rewritePatchPaths(captured.diff, packagePath, {
    projectRelative: options.projectRelative,
  })
  await fs.mkdir(path.dirname(patchFile), { recursive: true })
  await fs.writeFile(patchFile, body, 'utf-8')

  const { entry } = await registerPatch({
    manifestPath,
    packageId: pkg.id,
    patchPath: recordedPath,
    description: description || undefined,
  })

  if (!silent) {
    console.log(`Updated ${path.basename(manifestPath)} with new patch`)
  }

  return {
    packageId: pkg.id,
    packageType: classification.type,
    packagePath,
    patchFile: recordedPath,
    manifestEntry: entry,
    modifiedFiles: captured.modifiedFiles,
  }
}

interface CreateArgs {
  package: string
  name?: string
  message?: string
  'project-relative': boolean
  cwd: string
  'manifest-path': string
  'patches-dir': string
  silent: boolean
}

export interface CreateCommandOptions {
  /** Collaborators for a project root; git and the terminal by default */
  deps?: (cwd: string) => CreatePatchDeps
  /** Receives the exit code once the handler finishes */
  onExit?: (code: number) => void
}

function defaultDeps(cwd: string): CreatePatchDeps {
  return {
    vcs: new GitVersionControl(cwd),
    prompter: createTerminalPrompter(),
  }
}

/**
 * Run the command for parsed arguments and report the outcome.
 * Returns the process exit code.
 */
export async function runCreate(
  argv: CreateArgs,
  deps: CreatePatchDeps,
): Promise<number> {
  try {
    const result = await createVendorPatch(
      {
        packageName: argv.package,
        cwd: argv.cwd,
        manifestPath: argv['manifest-path'],
        patchesDir: argv['patches-dir'],
        name: argv.name,
        message: argv.message,
        projectRelative: argv['project-relative'],
        silent: argv.silent,
      },
      deps,
    )
    if (!argv.silent) {
      console.log(formatPatchResult(result))
    }
    return 0
  } catch (err) {
    if (err instanceof UserAbortError) {
      console.error(err.message)
      return 1
    }
    const errorMessage = err instanceof Error ? err.message : String(err)
    error(errorMessage)
    if (process.env[ENV_DEBUG] && err instanceof Error && err.stack) {
      console.error(err.stack)
    }
    return 1
  }
}

export function createCommand(
  options: CreateCommandOptions = {},
): CommandModule<{}, CreateArgs> {
  const resolveDeps = options.deps ?? defaultDeps
  const onExit =
    options.onExit ??
    ((code: number) => {
      process.exitCode = code
    })

  return {
    command: '$0 <package>',
    describe:
      'Create a patch for a Composer package from manual edits and register it in composer.json',
    builder: yargs => {
      return yargs
        .positional('package', {
          describe: 'Package to patch as <vendor>/<package>',
          type: 'string',
          demandOption: true,
        })
        .option('name', {
          alias: 'n',
          describe: 'Custom patch file name',
          type: 'string',
        })
        .option('message', {
          alias: 'm',
          describe: 'Patch description recorded in composer.json',
          type: 'string',
        })
        .option('project-relative', {
          alias: 'r',
          describe:
            'Keep paths relative to the project root (default: vendor-relative)',
          type: 'boolean',
          default: false,
        })
        .option('cwd', {
          describe: 'Project root',
          type: 'string',
          default: process.cwd(),
        })
        .option('manifest-path', {
          describe: 'Path to composer.json',
          type: 'string',
          default: DEFAULT_MANIFEST_PATH,
        })
        .option('patches-dir', {
          describe: 'Directory the patch file is written to',
          type: 'string',
          default: process.env[ENV_PATCHES_DIR] || DEFAULT_PATCHES_DIR,
        })
        .option('silent', {
          alias: 's',
          describe: 'Only print prompts and errors',
          type: 'boolean',
          default: false,
        })
        .check(argv => {
          if (!isPackageIdentifier(argv.package)) {
            throw new InputError(
              `Invalid package identifier "${argv.package}": expected <vendor>/<package>`,
            )
          }
          return true
        })
        .example('$0 magento/module-url-rewrite', 'Patch a package in vendor/')
        .example(
          '$0 drupal/webform -n fix-validation.patch -m "Fixed webform validation"',
          'Patch a Drupal module with a custom name and description',
        )
        .example(
          '$0 bower-asset/photoswipe -n photoswipe-fix.patch',
          'Patch a front-end library installed through installer-paths',
        )
        .epilogue(
          [
            'Patches are recorded under extra.patches and applied by cweagans/composer-patches.',
            '',
            'Supported package locations:',
            '  vendor/<vendor>/<package>',
            '  web/modules/contrib, web/modules/custom',
            '  web/themes/contrib, web/themes/custom',
            '  web/libraries',
            '  drush/Commands/contrib',
            '  any path declared in extra.installer-paths',
          ].join('\n'),
        )
    },
    handler: async argv => {
      onExit(await runCreate(argv, resolveDeps(argv.cwd)))
    },
  }
}
