import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { RenameOptions } from "./options"
import { parseRenameOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

import { RenameServiceTag, RenameIncomplete } from "@services/RenameService"
import { LoggerServiceTag } from "@services/LoggerService"

/**
 * Error handling wrapper for CLI commands.
 * Prints the formatted error, then fails with it so the process exits non-zero.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
) =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}\n`),
        Effect.zipRight(Effect.fail(appError))
      )
    }),
    Effect.asVoid
  )

/**
 * Run the rename command
 */
export const runRename = (options: RenameOptions) =>
  Effect.gen(function* () {
    const renamer = yield* RenameServiceTag
    const logger = yield* LoggerServiceTag

    const parsed = yield* parseRenameOptions(options)

    if (parsed.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    yield* logger.header(parsed.dryRun)
    yield* logger.scanning(parsed.root, parsed.rule)

    const plan = yield* renamer.plan(parsed.root, {
      rule: parsed.rule,
      exclude: parsed.exclude,
      force: parsed.force,
    })

    if (plan.moves.length === 0) {
      yield* logger.nothingToRename(parsed.rule)
      return
    }

    yield* logger.found(plan.summary.found, plan.summary.skipped)

    const report = yield* renamer.apply(plan, { dryRun: parsed.dryRun })

    yield* Effect.forEach(report.results, (result) => logger.result(result, parsed.dryRun), {
      discard: true,
    })
    yield* logger.summary(report, parsed.dryRun)

    if (report.failed > 0) {
      return yield* Effect.fail(
        new RenameIncomplete({ failed: report.failed, total: report.results.length })
      )
    }
  })
