import { execFileSync } from 'child_process'
import { VcsCommandError } from '../errors.js'
import type { VersionControl } from './types.js'

export interface ExecResult {
  status: number | null
  stdout: string
  stderr: string
}

/**
 * Runs `git <args>` in a directory. Swappable for tests.
 */
export type GitExec = (args: string[], cwd: string) => ExecResult

function readOutput(value: unknown): string {
  if (typeof value === 'string') return value
  if (Buffer.isBuffer(value)) return value.toString('utf-8')
  return ''
}

export const execGit: GitExec = (args, cwd) => {
  try {
    const stdout = execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    })
    return { status: 0, stdout, stderr: '' }
  } catch (error) {
    if (error instanceof Error) {
      const status = 'status' in error && typeof error.status === 'number'
        ? error.status
        : null
      return {
        status,
        stdout: 'stdout' in error ? readOutput(error.stdout) : '',
        stderr: 'stderr' in error ? readOutput(error.stderr) || error.message : error.message,
      }
    }
    return { status: null, stdout: '', stderr: String(error) }
  }
}

/**
 * git pathspec for everything below a directory
 */
export function toPathspec(dir: string): string {
  return dir.replace(/\/+$/, '') + '/'
}

export class GitVersionControl implements VersionControl {
  constructor(
    private readonly cwd: string,
    private readonly exec: GitExec = execGit,
  ) {}

  private run(operation: string, args: string[], path: string): string {
    const result = this.exec(args, this.cwd)
    if (result.status !== 0) {
      throw new VcsCommandError(operation, result.status, path, result.stderr)
    }
    return result.stdout
  }

  checkAvailable(): void {
    this.run('--version', ['--version'], this.cwd)
  }

  isInsideWorkTree(): boolean {
    const result = this.exec(['rev-parse', '--is-inside-work-tree'], this.cwd)
    return result.status === 0 && result.stdout.trim() === 'true'
  }

  forceAdd(path: string): void {
    this.run('add', ['add', '-f', '--', toPathspec(path)], path)
  }

  listModified(path: string): string[] {
    const output = this.run(
      'ls-files',
      ['ls-files', '-m', '--', toPathspec(path)],
      path,
    )
    return output.split('\n').filter(line => line.length > 0)
  }

  diff(path: string): string {
    // Pin the output format against user config (color, noprefix, external tools).
    // --relative keeps paths relative to cwd when the project is below the repository root.
    return this.run(
      'diff',
      [
        'diff',
        '--relative',
        '--no-color',
        '--no-ext-diff',
        '--src-prefix=a/',
        '--dst-prefix=b/',
        '--',
        toPathspec(path),
      ],
      path,
    )
  }

  restore(path: string): void {
    this.run('restore', ['restore', '--', toPathspec(path)], path)
  }

  unstage(path: string): void {
    this.run('reset', ['reset', '-q', 'HEAD', '--', toPathspec(path)], path)
  }
}
