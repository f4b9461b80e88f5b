import type { ExtensionRule } from "@lib/extension"
import { swapExtension } from "@lib/extension"
import { withName, type RenameCandidate } from "./RenameCandidate"

export type RenameMoveStatus = "pending" | "skipped"

export interface RenameMove {
  readonly candidate: RenameCandidate
  readonly targetName: string
  readonly targetPath: string
  readonly targetRelativePath: string
  readonly status: RenameMoveStatus
  readonly reason?: string
}

export interface RenameSummary {
  readonly found: number
  readonly pending: number
  readonly skipped: number
}

export interface RenamePlan {
  readonly moves: readonly RenameMove[]
  readonly summary: RenameSummary
}

export const TARGET_EXISTS = "target exists"

export const targetOf = (
  candidate: RenameCandidate,
  rule: ExtensionRule
): Pick<RenameMove, "targetName" | "targetPath" | "targetRelativePath"> => {
  const targetName = swapExtension(candidate.name, rule)
  return {
    targetName,
    targetPath: withName(candidate, candidate.absolutePath, targetName),
    targetRelativePath: withName(candidate, candidate.relativePath, targetName),
  }
}

export const summarize = (moves: readonly RenameMove[]): RenameSummary => ({
  found: moves.length,
  pending: moves.filter((m) => m.status === "pending").length,
  skipped: moves.filter((m) => m.status === "skipped").length,
})

/**
 * Create a plan with one move per candidate, in scan order.
 *
 * @param existingTargets target paths already present on disk; those moves are skipped
 */
export const createRenamePlan = (
  candidates: readonly RenameCandidate[],
  rule: ExtensionRule,
  existingTargets: ReadonlySet<string> = new Set()
): RenamePlan => {
  const moves = candidates.map((candidate): RenameMove => {
    const target = targetOf(candidate, rule)
    return existingTargets.has(target.targetPath)
      ? { candidate, ...target, status: "skipped", reason: TARGET_EXISTS }
      : { candidate, ...target, status: "pending" }
  })

  return { moves, summary: summarize(moves) }
}
