import { Effect, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export type { RenameCandidate } from "../domain/RenameCandidate";
export type { RenameMove, RenamePlan, RenameSummary } from "../domain/RenamePlan";
export type { ExtensionRule } from "../lib/extension";
export { DEFAULT_RULE, InvalidExtension, parseExtensionRule } from "../lib/extension";

export type {
  ScanRootNotFound,
  ScanRootNotADirectory,
  ScanPermissionDenied,
  ScanFailed
} from "../services/ScannerService";

export type { RenameReport, RenameResult, RenameOutcome } from "../services/RenameService";

import { DirectoryServiceLive } from "../infra/DirectoryService";
import { ScannerServiceLive, type ScannerError } from "../services/ScannerService";
import {
  RenameServiceLive,
  RenameServiceTag,
  type RenameReport
} from "../services/RenameService";
import { LoggerServiceLive } from "../services/LoggerService";
import { DEFAULT_RULE, type ExtensionRule } from "../lib/extension";

export interface RenameTreeConfig {
  readonly rule?: ExtensionRule;
  readonly exclude?: readonly string[];
  readonly force?: boolean;
  readonly dryRun?: boolean;
}

/**
 * Plan and apply in one step, without console output.
 */
export const renameTree = (
  root: string,
  config: RenameTreeConfig = {}
): Effect.Effect<RenameReport, ScannerError, RenameServiceTag> =>
  Effect.gen(function* () {
    const renamer = yield* RenameServiceTag;
    const plan = yield* renamer.plan(root, {
      rule: config.rule ?? DEFAULT_RULE,
      exclude: config.exclude ?? [],
      force: config.force ?? false
    });
    return yield* renamer.apply(plan, { dryRun: config.dryRun ?? false });
  });

/**
 * Rename services without a platform; provide NodeContext.layer or a test filesystem.
 */
export const RenameLive = pipe(
  RenameServiceLive,
  Layer.provide(ScannerServiceLive),
  Layer.provide(DirectoryServiceLive)
);

export const createAppLayer = () => {
  return pipe(
    Layer.mergeAll(LoggerServiceLive, RenameLive),
    Layer.provide(NodeContext.layer)
  );
};
