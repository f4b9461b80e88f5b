import { Effect } from "effect";
import { parseExtensionRule, type ExtensionRule, type InvalidExtension } from "@lib/extension";
import type { RenameOptions } from "./options";

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export interface ParsedRenameOptions {
  readonly root: string;
  readonly rule: ExtensionRule;
  readonly exclude: string[];
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly debug: boolean;
}

export const parseRenameOptions = (
  options: RenameOptions
): Effect.Effect<ParsedRenameOptions, InvalidExtension> =>
  Effect.gen(function* () {
    const rule = yield* parseExtensionRule(options.from, options.to);

    return {
      root: options.root ?? ".",
      rule,
      exclude: splitCommaSeparated(options.exclude),
      dryRun: options.dryRun,
      force: options.force,
      debug: options.debug ?? false
    };
  });
