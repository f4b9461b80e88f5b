import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { Path } from "@effect/platform"
import { DirectoryServiceTag, type DirectoryError } from "@infra/DirectoryService"
import type { RenameCandidate } from "@domain/RenameCandidate"
import { hasExtension, type ExtensionRule } from "@lib/extension"

export class ScanRootNotFound extends Data.TaggedError("ScanRootNotFound")<{
  readonly path: string
}> {}

export class ScanRootNotADirectory extends Data.TaggedError("ScanRootNotADirectory")<{
  readonly path: string
}> {}

export class ScanPermissionDenied extends Data.TaggedError("ScanPermissionDenied")<{
  readonly path: string
}> {}

export class ScanFailed extends Data.TaggedError("ScanFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type ScannerError = ScanRootNotFound | ScanRootNotADirectory | ScanPermissionDenied | ScanFailed

const LOOP_REASON = "too many levels of symbolic links"

const fromRootError = Match.typeTags<DirectoryError>()({
  PathNotFound: (e) => new ScanRootNotFound({ path: e.path }),
  PathPermissionDenied: (e) => new ScanPermissionDenied({ path: e.path }),
  PathLoop: (e) => new ScanFailed({ path: e.path, reason: LOOP_REASON }),
  FileSystemFailed: (e) => new ScanFailed({ path: e.path, reason: e.reason }),
})

// Below the root, a path that vanishes mid-scan is a failure of the scan, not a missing root
const fromWalkError = Match.typeTags<DirectoryError>()({
  PathNotFound: (e) => new ScanFailed({ path: e.path, reason: "Path disappeared during scan" }),
  PathPermissionDenied: (e) => new ScanPermissionDenied({ path: e.path }),
  PathLoop: (e) => new ScanFailed({ path: e.path, reason: LOOP_REASON }),
  FileSystemFailed: (e) => new ScanFailed({ path: e.path, reason: e.reason }),
})

export interface ScanOptions {
  readonly rule: ExtensionRule
  /** Substrings of root-relative paths to leave out, directories included */
  readonly exclude?: readonly string[]
}

export interface ScannerService {
  /** Depth-first walk from `root`, entries sorted by name within each directory */
  readonly scan: (
    root: string,
    options: ScanOptions
  ) => Effect.Effect<RenameCandidate[], ScannerError>
}

export class ScannerServiceTag extends Context.Tag("ScannerService")<
  ScannerServiceTag,
  ScannerService
>() {}

export const ScannerServiceLive = Layer.effect(
  ScannerServiceTag,
  Effect.gen(function* () {
    const directories = yield* DirectoryServiceTag
    const path = yield* Path.Path

    const scan: ScannerService["scan"] = (root, options) =>
      Effect.gen(function* () {
        const rootKind = yield* pipe(directories.kind(root), Effect.mapError(fromRootError))
        if (rootKind !== "directory") {
          return yield* Effect.fail(new ScanRootNotADirectory({ path: root }))
        }

        const exclude = options.exclude ?? []
        const isExcluded = (relativePath: string) =>
          exclude.some((pattern) => relativePath.includes(pattern))

        // Real paths of walked directories; stops symlink cycles
        const visited = new Set<string>()

        const walk = (
          directory: string,
          relativeDirectory: string
        ): Effect.Effect<RenameCandidate[], ScannerError> =>
          Effect.gen(function* () {
            const realPath = yield* pipe(directories.realPath(directory), Effect.mapError(fromWalkError))
            if (visited.has(realPath)) {
              yield* Effect.logDebug(`Already visited ${realPath}, not walking ${directory} again`)
              return []
            }
            visited.add(realPath)

            const names = yield* pipe(directories.list(directory), Effect.mapError(fromWalkError))
            const nested = yield* Effect.forEach([...names].sort(), (name) =>
              visit(directory, relativeDirectory, name)
            )
            return nested.flat()
          })

        const visit = (
          directory: string,
          relativeDirectory: string,
          name: string
        ): Effect.Effect<RenameCandidate[], ScannerError> =>
          Effect.gen(function* () {
            const absolutePath = path.join(directory, name)
            const relativePath = relativeDirectory === "" ? name : path.join(relativeDirectory, name)

            if (isExcluded(relativePath)) {
              yield* Effect.logDebug(`Excluded ${relativePath}`)
              return []
            }

            const kind = yield* pipe(
              directories.kind(absolutePath),
              // dangling or looping symlink
              Effect.catchTags({
                PathNotFound: () => Effect.succeed("other" as const),
                PathLoop: () => Effect.succeed("other" as const),
              }),
              Effect.mapError(fromWalkError)
            )

            if (kind === "directory") {
              return yield* walk(absolutePath, relativePath)
            }

            if (kind === "file" && hasExtension(name, options.rule.from)) {
              return [{ absolutePath, relativePath, name }]
            }

            return []
          })

        return yield* walk(root, "")
      })

    return { scan }
  })
)
