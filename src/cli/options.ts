import { Args, Options } from "@effect/cli";

export const root = Args.directory({ name: "root" }).pipe(
  Args.withDescription("Directory to rename headers in (default: current directory)"),
  Args.optional
);

export const from = Options.text("from").pipe(
  Options.withDescription("Extension to rename from (default: .h)"),
  Options.optional
);

export const to = Options.text("to").pipe(
  Options.withDescription("Extension to rename to (default: .hpp)"),
  Options.optional
);

export const exclude = Options.text("exclude").pipe(
  Options.withDescription("Path patterns to skip (e.g., '.git,node_modules')"),
  Options.optional
);

export const dryRun = Options.boolean("dry-run").pipe(
  Options.withDescription("List renames without touching any file"),
  Options.withDefault(false)
);

export const force = Options.boolean("force").pipe(
  Options.withDescription("Overwrite files that already have the target name"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface RenameOptions {
  readonly root: string | undefined;
  readonly from: string | undefined;
  readonly to: string | undefined;
  readonly exclude: string | undefined;
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly debug?: boolean;
}
