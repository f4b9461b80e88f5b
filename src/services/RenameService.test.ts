import { describe, expect, test } from "vitest"
import { Effect, Layer, pipe } from "effect"
import { RenameServiceTag, RenameServiceLive, type PlanOptions, type RenameService } from "./RenameService"
import { ScannerServiceLive } from "./ScannerService"
import { DEFAULT_RULE } from "@lib/extension"
import { createTestContext, type TestContext } from "../test/TestContext"

const testLayer = (ctx: TestContext) =>
  pipe(RenameServiceLive, Layer.provide(ScannerServiceLive), Layer.provide(ctx.layer))

const defaults: PlanOptions = { rule: DEFAULT_RULE, exclude: [], force: false }

const run = <A, E>(ctx: TestContext, f: (svc: RenameService) => Effect.Effect<A, E>) =>
  pipe(RenameServiceTag, Effect.flatMap(f), Effect.provide(testLayer(ctx)), Effect.runPromise)

describe("RenameService", () => {
  describe("plan", () => {
    test("skips files whose target already exists", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")
      ctx.addFile("/project/b.h")
      ctx.addFile("/project/b.hpp")

      const plan = await run(ctx, (svc) => svc.plan("/project", defaults))

      expect(plan.moves.map((m) => [m.candidate.relativePath, m.status])).toEqual([
        ["a.h", "pending"],
        ["b.h", "skipped"],
      ])
      expect(plan.summary).toEqual({ found: 2, pending: 1, skipped: 1 })
      expect(ctx.calls.exists).toEqual(["/project/a.hpp", "/project/b.hpp"])
    })

    test("force does not check targets", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/b.h")
      ctx.addFile("/project/b.hpp")

      const plan = await run(ctx, (svc) => svc.plan("/project", { ...defaults, force: true }))

      expect(plan.summary).toEqual({ found: 1, pending: 1, skipped: 0 })
      expect(ctx.calls.exists).toEqual([])
    })
  })

  describe("apply", () => {
    test("renames pending moves and reports skipped ones", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")
      ctx.addFile("/project/b.h")
      ctx.addFile("/project/b.hpp")

      const report = await run(ctx, (svc) =>
        pipe(svc.plan("/project", defaults), Effect.flatMap((plan) => svc.apply(plan, { dryRun: false })))
      )

      expect(report.renamed).toBe(1)
      expect(report.skipped).toBe(1)
      expect(report.failed).toBe(0)
      expect(report.results[1]?.error).toBe("target exists")
      expect([...ctx.files].sort()).toEqual(["/project/a.hpp", "/project/b.h", "/project/b.hpp"])
    })

    test("force overwrites an existing target", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/b.h")
      ctx.addFile("/project/b.hpp")

      const report = await run(ctx, (svc) =>
        pipe(
          svc.plan("/project", { ...defaults, force: true }),
          Effect.flatMap((plan) => svc.apply(plan, { dryRun: false }))
        )
      )

      expect(report.renamed).toBe(1)
      expect([...ctx.files]).toEqual(["/project/b.hpp"])
    })

    test("dry run touches nothing", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")
      ctx.addFile("/project/sub/c.h")

      const report = await run(ctx, (svc) =>
        pipe(svc.plan("/project", defaults), Effect.flatMap((plan) => svc.apply(plan, { dryRun: true })))
      )

      expect(report.renamed).toBe(2)
      expect(ctx.calls.rename).toEqual([])
      expect([...ctx.files].sort()).toEqual(["/project/a.h", "/project/sub/c.h"])
    })

    test("a failed rename is reported and the run continues", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")
      ctx.addFile("/project/b.h")
      ctx.addFile("/project/c.h")
      ctx.failRename("/project/b.h", "device busy")

      const report = await run(ctx, (svc) =>
        pipe(svc.plan("/project", defaults), Effect.flatMap((plan) => svc.apply(plan, { dryRun: false })))
      )

      expect(report.results.map((r) => r.outcome)).toEqual(["renamed", "failed", "renamed"])
      expect(report.results[1]?.error).toBe("device busy")
      expect(report.failed).toBe(1)
      expect([...ctx.files].sort()).toEqual(["/project/a.hpp", "/project/b.h", "/project/c.hpp"])
    })

    test("a source that vanished after planning fails with a readable reason", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")

      const report = await run(ctx, (svc) =>
        pipe(
          svc.plan("/project", defaults),
          Effect.tap(() => Effect.sync(() => ctx.files.delete("/project/a.h"))),
          Effect.flatMap((plan) => svc.apply(plan, { dryRun: false }))
        )
      )

      expect(report.failed).toBe(1)
      expect(report.results[0]?.error).toBe("source file no longer exists")
    })

    test("running twice gives the same tree as running once", async () => {
      const ctx = createTestContext()
      ctx.addFile("/project/a.h")
      ctx.addFile("/project/inc/b.h")
      ctx.addFile("/project/inc/c.hpp")

      const renameAll = () =>
        run(ctx, (svc) =>
          pipe(svc.plan("/project", defaults), Effect.flatMap((plan) => svc.apply(plan, { dryRun: false })))
        )

      const first = await renameAll()
      const afterFirst = [...ctx.files].sort()
      const second = await renameAll()

      expect(first.renamed).toBe(2)
      expect(second.results).toEqual([])
      expect([...ctx.files].sort()).toEqual(afterFirst)
      expect(afterFirst).toEqual(["/project/a.hpp", "/project/inc/b.hpp", "/project/inc/c.hpp"])
    })
  })
})
