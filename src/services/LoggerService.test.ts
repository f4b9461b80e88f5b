import { describe, expect, test } from "vitest"
import { formatResult } from "./LoggerService"
import type { RenameMove } from "@domain/RenamePlan"

const move: RenameMove = {
  candidate: { absolutePath: "/p/inc/a.h", relativePath: "inc/a.h", name: "a.h" },
  targetName: "a.hpp",
  targetPath: "/p/inc/a.hpp",
  targetRelativePath: "inc/a.hpp",
  status: "pending",
}

describe("formatResult", () => {
  test("renamed", () => {
    expect(formatResult({ move, outcome: "renamed" }, false)).toBe("   ✓ inc/a.h → inc/a.hpp")
  })

  test("renamed in a dry run", () => {
    expect(formatResult({ move, outcome: "renamed" }, true)).toBe("   → inc/a.h → inc/a.hpp")
  })

  test("skipped", () => {
    expect(formatResult({ move, outcome: "skipped", error: "target exists" }, false)).toBe(
      "   ⏭️  inc/a.h (target exists)"
    )
  })

  test("failed", () => {
    expect(formatResult({ move, outcome: "failed", error: "permission denied" }, false)).toBe(
      "   ❌ inc/a.h: permission denied"
    )
  })
})
