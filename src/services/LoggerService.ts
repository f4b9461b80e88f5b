/**
 * LoggerService - formatted console output for the rename command
 */

import { Context, Effect, Layer, Console } from "effect"
import type { ExtensionRule } from "@lib/extension"
import type { RenameReport, RenameResult } from "./RenameService"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly header: (dryRun: boolean) => Effect.Effect<void>
  readonly scanning: (root: string, rule: ExtensionRule) => Effect.Effect<void>
  readonly found: (count: number, skipped: number) => Effect.Effect<void>
  readonly nothingToRename: (rule: ExtensionRule) => Effect.Effect<void>
  readonly result: (result: RenameResult, dryRun: boolean) => Effect.Effect<void>
  readonly summary: (report: RenameReport, dryRun: boolean) => Effect.Effect<void>
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Line formatting
// =============================================================================

export const formatResult = (result: RenameResult, dryRun: boolean): string => {
  const { move } = result
  switch (result.outcome) {
    case "renamed":
      return `   ${dryRun ? "→" : "✓"} ${move.candidate.relativePath} → ${move.targetRelativePath}`
    case "skipped":
      return `   ⏭️  ${move.candidate.relativePath} (${result.error ?? "skipped"})`
    case "failed":
      return `   ❌ ${move.candidate.relativePath}: ${result.error ?? "unknown error"}`
  }
}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  header: (dryRun) =>
    Console.log(dryRun ? "\n🧪 hpp-rename (DRY RUN)\n" : "\n🔤 hpp-rename\n"),
  scanning: (root, rule) =>
    Console.log(`🔍 Scanning ${root} for *${rule.from} files (→ *${rule.to})...`),
  found: (count, skipped) =>
    Console.log(`   Found ${count} file${count === 1 ? "" : "s"}${skipped ? `, ${skipped} with an existing target` : ""}\n`),
  nothingToRename: (rule) => Console.log(`\n✓ No *${rule.from} files found - nothing to rename\n`),
  result: (result, dryRun) =>
    result.outcome === "failed"
      ? Console.error(formatResult(result, dryRun))
      : Console.log(formatResult(result, dryRun)),
  summary: (report, dryRun) =>
    Effect.gen(function* () {
      yield* Console.log(`\n📊 Summary:`)
      yield* Console.log(`   ${dryRun ? "Would rename" : "Renamed"}: ${report.renamed}`)
      yield* Console.log(`   Skipped: ${report.skipped}`)
      yield* Console.log(`   Failed: ${report.failed}`)
      if (dryRun) {
        yield* Console.log("\n✓ Dry run complete - no files were renamed\n")
      } else if (report.failed > 0) {
        yield* Console.log("\n⚠️  Some renames failed. Fix the errors above and run again.\n")
      } else {
        yield* Console.log("\n✅ Rename complete!\n")
      }
    }),
})
