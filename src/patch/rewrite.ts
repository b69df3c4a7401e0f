/**
 * Path rewriting for captured diffs.
 *
 * git reports paths relative to the project root, e.g.
 * `a/vendor/acme/widget/src/Foo.php`. Patch consumers apply patches from the
 * package root, so by default the package directory prefix is removed from
 * every file marker. Only header lines are touched; hunk bodies are skipped
 * by counting the line totals in each `@@` header.
 */

export interface RewriteOptions {
  /** Keep paths relative to the project root */
  projectRelative?: boolean
}

const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+\d+(?:,(\d+))? @@/

const MARKER_LINES = ['diff --git ', '--- ', '+++ ', 'Binary files ']
const PLAIN_PATH_LINES = ['rename from ', 'rename to ', 'copy from ', 'copy to ']

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Normalize a package location to `dir/sub` form: forward slashes,
 * no leading `./`, no trailing slash.
 */
export function normalizeLocation(location: string): string {
  return location
    .replace(/\\/g, '/')
    .replace(/^(\.\/)+/, '')
    .replace(/\/+$/, '')
}

function rewriteHeaderLine(line: string, markerPattern: RegExp, prefix: string): string {
  if (MARKER_LINES.some(start => line.startsWith(start))) {
    return line.replace(markerPattern, '$1$2/')
  }
  const keyword = PLAIN_PATH_LINES.find(start => line.startsWith(start))
  if (keyword && line.startsWith(prefix, keyword.length)) {
    return keyword + line.slice(keyword.length + prefix.length)
  }
  return line
}

/**
 * Remove `<location>/` from the old/new file markers of a unified diff
 */
export function stripLocationPrefix(diff: string, location: string): string {
  const prefix = normalizeLocation(location) + '/'
  const markerPattern = new RegExp(`(^|\\s)([ab])/${escapeRegExp(prefix)}`, 'g')

  let oldRemaining = 0
  let newRemaining = 0

  return diff
    .split('\n')
    .map(line => {
      if (oldRemaining > 0 || newRemaining > 0) {
        if (line.startsWith('-')) {
          oldRemaining--
        } else if (line.startsWith('+')) {
          newRemaining--
        } else if (!line.startsWith('\\')) {
          oldRemaining--
          newRemaining--
        }
        return line
      }

      const hunk = HUNK_HEADER.exec(line)
      if (hunk) {
        oldRemaining = hunk[1] === undefined ? 1 : Number(hunk[1])
        newRemaining = hunk[2] === undefined ? 1 : Number(hunk[2])
        return line
      }

      return rewriteHeaderLine(line, markerPattern, prefix)
    })
    .join('\n')
}

export function rewritePatchPaths(
  diff: string,
  location: string,
  options: RewriteOptions = {},
): string {
  if (options.projectRelative) {
    return diff
  }
  return stripLocationPrefix(diff, location)
}
