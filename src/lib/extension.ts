/**
 * File extension matching and swapping.
 *
 * Only the trailing extension is ever touched:
 *   swapExtension("a.hx.h", { from: ".h", to: ".hpp" }) // "a.hx.hpp"
 */

import { Data, Effect } from "effect"

export interface ExtensionRule {
  readonly from: string
  readonly to: string
}

export const DEFAULT_RULE: ExtensionRule = { from: ".h", to: ".hpp" }

export class InvalidExtension extends Data.TaggedError("InvalidExtension")<{
  readonly extension: string
  readonly reason: string
}> {}

/**
 * True when `name` ends in `ext` and has a stem in front of it.
 * A file named just ".h" is a dotfile, not a header.
 */
export const hasExtension = (name: string, ext: string): boolean =>
  name.length > ext.length && name.endsWith(ext)

export const swapExtension = (name: string, rule: ExtensionRule): string =>
  hasExtension(name, rule.from) ? `${name.slice(0, name.length - rule.from.length)}${rule.to}` : name

const normalizeExtension = (ext: string): string => {
  const trimmed = ext.trim()
  return trimmed === "" || trimmed.startsWith(".") ? trimmed : `.${trimmed}`
}

const validateExtension = (ext: string): Effect.Effect<string, InvalidExtension> => {
  if (ext === "" || ext === ".") {
    return Effect.fail(new InvalidExtension({ extension: ext, reason: "extension must not be empty" }))
  }
  if (ext.includes("/") || ext.includes("\\")) {
    return Effect.fail(
      new InvalidExtension({ extension: ext, reason: "extension must not contain a path separator" })
    )
  }
  return Effect.succeed(ext)
}

/**
 * Build a rule from raw option values. Missing values fall back to .h → .hpp.
 *
 * A target that ends in the source extension is rejected, otherwise every
 * renamed file would match again on the next run.
 */
export const parseExtensionRule = (
  from: string | undefined,
  to: string | undefined
): Effect.Effect<ExtensionRule, InvalidExtension> =>
  Effect.gen(function* () {
    const fromExt = yield* validateExtension(normalizeExtension(from ?? DEFAULT_RULE.from))
    const toExt = yield* validateExtension(normalizeExtension(to ?? DEFAULT_RULE.to))

    if (fromExt === toExt) {
      return yield* Effect.fail(
        new InvalidExtension({ extension: toExt, reason: "source and target extensions are the same" })
      )
    }

    if (toExt.endsWith(fromExt)) {
      return yield* Effect.fail(
        new InvalidExtension({
          extension: toExt,
          reason: `target extension ends with "${fromExt}", so renamed files would match again`,
        })
      )
    }

    return { from: fromExt, to: toExt }
  })
