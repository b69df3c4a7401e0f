/**
 * Test utilities for vendor-patch tests
 */
import * as fs from 'fs/promises'
import * as path from 'path'
import * as os from 'os'
import { existsSync, readdirSync, readFileSync, writeFileSync } from 'fs'
import { structuredPatch } from 'diff'
import { VcsCommandError } from './errors.js'
import { isConfirmation, type Prompter } from './utils/prompt.js'
import type { VersionControl } from './vcs/types.js'

/**
 * Create a temporary test directory
 */
export async function createTestDir(prefix: string = 'vendor-patch-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

/**
 * Remove a directory recursively
 */
export async function removeTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/**
 * Write composer.json the way Composer formats it
 */
export async function writeTestManifest(
  projectRoot: string,
  manifest: Record<string, unknown>,
): Promise<string> {
  await fs.mkdir(projectRoot, { recursive: true })
  const manifestPath = path.join(projectRoot, 'composer.json')
  await fs.writeFile(manifestPath, JSON.stringify(manifest, null, 4) + '\n')
  return manifestPath
}

/**
 * Create a package directory with the given files, relative to the project root
 */
export async function createTestPackage(
  projectRoot: string,
  packageDir: string,
  files: Record<string, string>,
): Promise<string> {
  const pkgDir = path.join(projectRoot, packageDir)
  await fs.mkdir(pkgDir, { recursive: true })

  for (const [filePath, content] of Object.entries(files)) {
    const fullPath = path.join(pkgDir, filePath)
    await fs.mkdir(path.dirname(fullPath), { recursive: true })
    await fs.writeFile(fullPath, content)
  }

  return pkgDir
}

/**
 * Read file content relative to the project root
 */
export async function readProjectFile(
  projectRoot: string,
  filePath: string,
): Promise<string> {
  return fs.readFile(path.join(projectRoot, filePath), 'utf-8')
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}

function listFiles(root: string, dir: string): string[] {
  const results: string[] = []
  const absolute = path.join(root, dir)
  if (!existsSync(absolute)) return results
  for (const entry of readdirSync(absolute, { withFileTypes: true })) {
    const rel = `${dir}/${entry.name}`
    if (entry.isDirectory()) {
      results.push(...listFiles(root, rel))
    } else if (entry.isFile()) {
      results.push(rel)
    }
  }
  return results
}

export type FakeVcsOperation =
  | 'forceAdd'
  | 'listModified'
  | 'diff'
  | 'restore'
  | 'unstage'

/**
 * In-process stand-in for git over a real directory.
 * The index is a map of project-relative path to staged content.
 */
export class FakeVersionControl implements VersionControl {
  readonly index = new Map<string, string>()
  /** Every operation in call order */
  readonly operations: FakeVcsOperation[] = []

  constructor(
    private readonly root: string,
    private readonly options: {
      available?: boolean
      insideWorkTree?: boolean
      failOn?: FakeVcsOperation
    } = {},
  ) {}

  private record(op: FakeVcsOperation, target: string): void {
    this.operations.push(op)
    if (this.options.failOn === op) {
      throw new VcsCommandError(op, 128, target, `fatal: simulated ${op} failure`)
    }
  }

  private staged(dir: string): string[] {
    return [...this.index.keys()].filter(file => file.startsWith(`${dir}/`)).sort()
  }

  private read(file: string): string | undefined {
    const absolute = path.join(this.root, file)
    return existsSync(absolute) ? readFileSync(absolute, 'utf-8') : undefined
  }

  checkAvailable(): void {
    if (this.options.available === false) {
      throw new VcsCommandError('--version', 127, this.root, 'git: command not found')
    }
  }

  isInsideWorkTree(): boolean {
    return this.options.insideWorkTree ?? true
  }

  forceAdd(dir: string): void {
    this.record('forceAdd', dir)
    for (const file of listFiles(this.root, dir)) {
      this.index.set(file, readFileSync(path.join(this.root, file), 'utf-8'))
    }
  }

  listModified(dir: string): string[] {
    this.record('listModified', dir)
    return this.staged(dir).filter(file => this.read(file) !== this.index.get(file))
  }

  diff(dir: string): string {
    this.record('diff', dir)
    const lines: string[] = []
    for (const file of this.staged(dir)) {
      const before = this.index.get(file) ?? ''
      const after = this.read(file)
      if (after === before) continue

      const patch = structuredPatch(`a/${file}`, `b/${file}`, before, after ?? '')
      lines.push(`diff --git a/${file} b/${file}`)
      lines.push(`--- a/${file}`)
      lines.push(after === undefined ? '+++ /dev/null' : `+++ b/${file}`)
      for (const hunk of patch.hunks) {
        lines.push(
          `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
        )
        lines.push(...hunk.lines)
      }
    }
    return lines.length > 0 ? lines.join('\n') + '\n' : ''
  }

  restore(dir: string): void {
    this.record('restore', dir)
    for (const file of this.staged(dir)) {
      writeFileSync(path.join(this.root, file), this.index.get(file) ?? '')
    }
  }

  unstage(dir: string): void {
    this.record('unstage', dir)
    for (const file of this.staged(dir)) {
      this.index.delete(file)
    }
  }
}

/**
 * Prompter that replays fixed answers and records the questions asked.
 * Runs `onConfirm` (e.g. simulated edits) before answering a confirmation.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []

  constructor(
    private readonly answers: string[],
    private readonly onConfirm?: () => Promise<void>,
  ) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question)
    return this.answers.shift() ?? ''
  }

  async confirm(question: string): Promise<boolean> {
    await this.onConfirm?.()
    return isConfirmation(await this.ask(question))
  }
}
