/**
 * Version-control operations the patch workflow depends on.
 * Every path is relative to the project root and names a directory.
 * Implementations throw VcsCommandError on failure.
 */
export interface VersionControl {
  /** Confirm the tool is installed */
  checkAvailable(): void
  isInsideWorkTree(): boolean
  /** Stage everything under the path, ignored files included */
  forceAdd(path: string): void
  /** Files under the path whose working copy differs from the index */
  listModified(path: string): string[]
  /** Unified diff of the working copy against the index */
  diff(path: string): string
  /** Reset the working copy to the index */
  restore(path: string): void
  /** Reset the index to HEAD */
  unstage(path: string): void
}
