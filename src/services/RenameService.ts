/**
 * RenameService - plans and applies extension renames over a directory tree.
 *
 * plan() scans and checks targets, apply() renames one file at a time.
 * A rename that fails is recorded in the report and the run carries on.
 */

import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { DirectoryServiceTag, type DirectoryError } from "@infra/DirectoryService"
import { ScannerServiceTag, ScanFailed, type ScannerError } from "./ScannerService"
import { createRenamePlan, type RenameMove, type RenamePlan } from "@domain/RenamePlan"
import type { ExtensionRule } from "@lib/extension"

// =============================================================================
// Errors
// =============================================================================

export class RenameIncomplete extends Data.TaggedError("RenameIncomplete")<{
  readonly failed: number
  readonly total: number
}> {}

// =============================================================================
// Types
// =============================================================================

export type RenameOutcome = "renamed" | "skipped" | "failed"

export interface RenameResult {
  readonly move: RenameMove
  readonly outcome: RenameOutcome
  readonly error?: string
}

export interface RenameReport {
  readonly results: readonly RenameResult[]
  readonly renamed: number
  readonly skipped: number
  readonly failed: number
}

export interface PlanOptions {
  readonly rule: ExtensionRule
  readonly exclude: readonly string[]
  /** Overwrite existing targets instead of skipping them */
  readonly force: boolean
}

export interface ApplyOptions {
  readonly dryRun: boolean
}

// =============================================================================
// Service interface
// =============================================================================

export interface RenameService {
  readonly plan: (root: string, options: PlanOptions) => Effect.Effect<RenamePlan, ScannerError>
  readonly apply: (plan: RenamePlan, options: ApplyOptions) => Effect.Effect<RenameReport>
}

export class RenameServiceTag extends Context.Tag("RenameService")<
  RenameServiceTag,
  RenameService
>() {}

// =============================================================================
// Helpers
// =============================================================================

const describeFailure = Match.typeTags<DirectoryError>()({
  PathNotFound: () => "source file no longer exists",
  PathPermissionDenied: () => "permission denied",
  PathLoop: () => "too many levels of symbolic links",
  FileSystemFailed: (e) => e.reason,
})

export const toReport = (results: readonly RenameResult[]): RenameReport => ({
  results,
  renamed: results.filter((r) => r.outcome === "renamed").length,
  skipped: results.filter((r) => r.outcome === "skipped").length,
  failed: results.filter((r) => r.outcome === "failed").length,
})

// =============================================================================
// Live implementation
// =============================================================================

export const RenameServiceLive = Layer.effect(
  RenameServiceTag,
  Effect.gen(function* () {
    const scanner = yield* ScannerServiceTag
    const directories = yield* DirectoryServiceTag

    const targetExists = (move: RenameMove): Effect.Effect<boolean, ScannerError> =>
      pipe(
        directories.exists(move.targetPath),
        Effect.mapError((e) => new ScanFailed({ path: move.targetPath, reason: describeFailure(e) }))
      )

    const plan: RenameService["plan"] = (root, options) =>
      Effect.gen(function* () {
        const candidates = yield* scanner.scan(root, { rule: options.rule, exclude: options.exclude })
        const draft = createRenamePlan(candidates, options.rule)
        if (options.force) return draft

        // One check at a time, in plan order
        const checked = yield* Effect.forEach(draft.moves, (move) =>
          pipe(
            targetExists(move),
            Effect.map((taken) => ({ move, taken }))
          )
        )
        return createRenamePlan(
          candidates,
          options.rule,
          new Set(checked.filter((c) => c.taken).map((c) => c.move.targetPath))
        )
      })

    const applyMove = (move: RenameMove, options: ApplyOptions): Effect.Effect<RenameResult> => {
      if (move.status === "skipped") {
        return Effect.succeed({ move, outcome: "skipped", error: move.reason })
      }
      if (options.dryRun) {
        return Effect.succeed({ move, outcome: "renamed" })
      }
      return pipe(
        directories.rename(move.candidate.absolutePath, move.targetPath),
        Effect.tap(() => Effect.logDebug(`Renamed ${move.candidate.absolutePath} -> ${move.targetPath}`)),
        Effect.as<RenameResult>({ move, outcome: "renamed" }),
        Effect.catchAll((e) =>
          Effect.succeed<RenameResult>({ move, outcome: "failed", error: describeFailure(e) })
        )
      )
    }

    const apply: RenameService["apply"] = (renamePlan, options) =>
      pipe(
        Effect.forEach(renamePlan.moves, (move) => applyMove(move, options)),
        Effect.map(toReport)
      )

    return { plan, apply }
  })
)
