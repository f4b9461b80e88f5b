/**
 * hpp-rename CLI
 *
 * Walks a directory tree and renames every *.h file to *.hpp.
 * #include directives are not rewritten.
 *
 * Example:
 *   $ hpp-rename                       # current directory
 *   $ hpp-rename ./include --dry-run   # preview
 *   $ hpp-rename . --exclude .git,third_party
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option, Logger, LogLevel } from "effect"

import * as Opts from "./cli/options"
import { runRename, withErrorHandling } from "./cli/handler"
import { createAppLayer } from "./core"

const renameCommand = Command.make(
  "hpp-rename",
  {
    root: Opts.root,
    from: Opts.from,
    to: Opts.to,
    exclude: Opts.exclude,
    dryRun: Opts.dryRun,
    force: Opts.force,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(
      runRename({
        root: Option.getOrUndefined(opts.root),
        from: Option.getOrUndefined(opts.from),
        to: Option.getOrUndefined(opts.to),
        exclude: Option.getOrUndefined(opts.exclude),
        dryRun: opts.dryRun,
        force: opts.force,
        debug: opts.debug,
      })
    ).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(createAppLayer())
    )
).pipe(
  Command.withDescription("Recursively rename .h headers to .hpp")
)

const cli = Command.run(renameCommand, {
  name: "hpp-rename",
  version: "0.1.0",
})

NodeRuntime.runMain(cli(process.argv).pipe(Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
})
