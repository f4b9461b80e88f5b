/**
 * Domain type for a file found by the scanner that matches the source extension.
 */

export interface RenameCandidate {
  /** Path handed to the filesystem (root joined with relativePath) */
  readonly absolutePath: string
  /** Path relative to the scan root, for display */
  readonly relativePath: string
  /** File name, the last segment of both paths */
  readonly name: string
}

/**
 * Replace the trailing file name of `path` with `name`.
 * Both candidate paths end in the candidate's name, so the directory part is kept as-is.
 */
export const withName = (candidate: RenameCandidate, path: string, name: string): string =>
  `${path.slice(0, path.length - candidate.name.length)}${name}`
