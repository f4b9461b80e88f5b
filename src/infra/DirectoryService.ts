/**
 * DirectoryService - wraps the filesystem calls the renamer needs, for testability.
 *
 * Live implementation uses @effect/platform FileSystem.
 * PlatformErrors are converted to typed errors.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"

// =============================================================================
// Typed errors
// =============================================================================

export class PathNotFound extends Data.TaggedError("PathNotFound")<{
  readonly path: string
}> {}

export class PathPermissionDenied extends Data.TaggedError("PathPermissionDenied")<{
  readonly path: string
}> {}

/** Too many levels of symbolic links (ELOOP) */
export class PathLoop extends Data.TaggedError("PathLoop")<{
  readonly path: string
}> {}

export class FileSystemFailed extends Data.TaggedError("FileSystemFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type DirectoryError = PathNotFound | PathPermissionDenied | PathLoop | FileSystemFailed

// =============================================================================
// Service interface
// =============================================================================

/** Symlinks are resolved, so a link to a directory is a "directory". */
export type EntryKind = "file" | "directory" | "other"

export interface DirectoryService {
  /** Entry names in a directory, in the order the OS returns them */
  readonly list: (path: string) => Effect.Effect<string[], DirectoryError>
  readonly kind: (path: string) => Effect.Effect<EntryKind, DirectoryError>
  readonly realPath: (path: string) => Effect.Effect<string, DirectoryError>
  readonly exists: (path: string) => Effect.Effect<boolean, DirectoryError>
  /** Overwrites `to` if it is an existing file, as rename(2) does */
  readonly rename: (from: string, to: string) => Effect.Effect<void, DirectoryError>
}

export class DirectoryServiceTag extends Context.Tag("DirectoryService")<
  DirectoryServiceTag,
  DirectoryService
>() {}

// =============================================================================
// Error conversion
// =============================================================================

export const toDirectoryError = (path: string, error: PlatformError): DirectoryError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return new PathNotFound({ path })
    if (error.reason === "PermissionDenied") return new PathPermissionDenied({ path })
    if (error.description?.includes("ELOOP") || error.message.includes("ELOOP")) {
      return new PathLoop({ path })
    }
  }
  return new FileSystemFailed({ path, reason: error.message })
}

const toEntryKind = (type: FileSystem.File.Info["type"]): EntryKind =>
  type === "File" ? "file" : type === "Directory" ? "directory" : "other"

// =============================================================================
// Live implementation (uses @effect/platform FileSystem)
// =============================================================================

export const DirectoryServiceLive = Layer.effect(
  DirectoryServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map(
      (fs): DirectoryService => ({
        list: (path) =>
          pipe(
            fs.readDirectory(path),
            Effect.mapError((e) => toDirectoryError(path, e))
          ),
        kind: (path) =>
          pipe(
            fs.stat(path),
            Effect.map((info) => toEntryKind(info.type)),
            Effect.mapError((e) => toDirectoryError(path, e))
          ),
        realPath: (path) =>
          pipe(
            fs.realPath(path),
            Effect.mapError((e) => toDirectoryError(path, e))
          ),
        exists: (path) =>
          pipe(
            fs.exists(path),
            Effect.mapError((e) => toDirectoryError(path, e))
          ),
        rename: (from, to) =>
          pipe(
            fs.rename(from, to),
            Effect.mapError((e) => toDirectoryError(from, e))
          ),
      })
    )
  )
)
