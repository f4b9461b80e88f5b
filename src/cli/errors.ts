import { Match } from "effect";

import type {
  ScanRootNotFound,
  ScanRootNotADirectory,
  ScanPermissionDenied,
  ScanFailed
} from "@services/ScannerService";
import type { RenameIncomplete } from "@services/RenameService";
import type { InvalidExtension } from "@lib/extension";

type ScannerError = ScanRootNotFound | ScanRootNotADirectory | ScanPermissionDenied | ScanFailed;

type DomainError = ScannerError | RenameIncomplete | InvalidExtension;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  rootNotFound: (path: string) =>
    new AppError(
      "Directory not found",
      `The path "${path}" does not exist.`,
      `Pass an existing directory, or run the command from inside the tree you want to rename.`
    ),

  rootNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The path "${path}" exists but is not a directory.`,
      `Pass the directory that contains the headers, not a single file.`
    ),

  scanPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied during scan",
      `Cannot read "${path}": permission denied.`,
      `Check directory permissions, or exclude the path with --exclude. No files were renamed.`
    ),

  scanFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not scan "${path}": ${reason}`,
      `Check that the tree is not being modified while the command runs. No files were renamed.`
    ),

  invalidExtension: (extension: string, reason: string) =>
    new AppError(
      "Invalid extension",
      `"${extension}": ${reason}.`,
      `Use --from and --to with extensions like .h and .hpp.`
    ),

  renameIncomplete: (failed: number, total: number) =>
    new AppError(
      "Some renames failed",
      `${failed} of ${total} files could not be renamed.`,
      `Fix the errors listed above and run the command again. Files already renamed are not touched twice.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`)
};

const matchDomainError = Match.typeTags<DomainError>()({
  ScanRootNotFound: (e) => errors.rootNotFound(e.path),
  ScanRootNotADirectory: (e) => errors.rootNotADirectory(e.path),
  ScanPermissionDenied: (e) => errors.scanPermissionDenied(e.path),
  ScanFailed: (e) => errors.scanFailed(e.path, e.reason),

  InvalidExtension: (e) => errors.invalidExtension(e.extension, e.reason),

  RenameIncomplete: (e) => errors.renameIncomplete(e.failed, e.total)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "ScanRootNotFound",
  "ScanRootNotADirectory",
  "ScanPermissionDenied",
  "ScanFailed",
  "InvalidExtension",
  "RenameIncomplete"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  rootNotFound,
  rootNotADirectory,
  scanPermissionDenied,
  scanFailed,
  invalidExtension,
  renameIncomplete,
  unexpected
} = errors;
