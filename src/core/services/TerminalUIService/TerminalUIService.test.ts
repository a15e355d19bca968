import { describe, expect, test } from "vitest"
import { Effect, pipe } from "effect"
import { MountStatus } from "@domain/MountStatus"
import { makeTarget, withStatus, type Target } from "@domain/Target"
import {
  ANSI,
  formatStatusLine,
  makeCapturingTerminal,
  makeStatusRenderer,
  resolveLineStyle,
  type LineStyle,
  type StatusRenderer,
} from "./TerminalUIService"

const plain: LineStyle = { color: false, columns: 80 }

const target = (localName: string, row: number, status: MountStatus): Target =>
  withStatus(makeTarget({ localName, remoteSpec: `${localName}@host:/srv` }, row), status)

describe("TerminalUIService", () => {
  describe("formatStatusLine", () => {
    test("formats each status kind", () => {
      expect(formatStatusLine(target("a", 0, MountStatus.Unknown()), plain)).toBe("a: ???")
      expect(formatStatusLine(target("a", 0, MountStatus.Pending()), plain)).toBe("a: ...")
      expect(formatStatusLine(target("a", 0, MountStatus.Okay()), plain)).toBe("a: OK")
      expect(
        formatStatusLine(target("a", 0, MountStatus.Warned({ reason: "wrong source" })), plain)
      ).toBe("a: wrong source")
      expect(
        formatStatusLine(target("a", 0, MountStatus.Failed({ reason: "refused" })), plain)
      ).toBe("a: refused")
    })

    test("colors the name by status", () => {
      const style: LineStyle = { color: true, columns: 80 }

      expect(formatStatusLine(target("a", 0, MountStatus.Okay()), style)).toBe(
        `${ANSI.green}a${ANSI.reset}: OK`
      )
      expect(formatStatusLine(target("a", 0, MountStatus.Warned({ reason: "w" })), style)).toBe(
        `${ANSI.yellow}a${ANSI.reset}: w`
      )
      expect(formatStatusLine(target("a", 0, MountStatus.Failed({ reason: "f" })), style)).toBe(
        `${ANSI.red}a${ANSI.reset}: f`
      )
      expect(formatStatusLine(target("a", 0, MountStatus.Pending()), style)).toBe("a: ...")
    })

    test("fits multi-line diagnostics on one line", () => {
      const failed = MountStatus.Failed({ reason: "connection refused\nread: Connection reset" })

      expect(formatStatusLine(target("abc", 0, failed), { color: false, columns: 10 })).toBe(
        "abc: conn"
      )
      expect(formatStatusLine(target("abc", 0, failed), plain)).toBe("abc: connection refused")
    })

    test("cuts long names so no line wraps", () => {
      const narrow: LineStyle = { color: false, columns: 10 }

      expect(formatStatusLine(target("abcdefghij", 0, MountStatus.Pending()), narrow)).toBe("abcd: ...")
      expect(formatStatusLine(target("abcdefghij", 0, MountStatus.Okay()), narrow)).toBe("abcd: OK")
      expect(
        formatStatusLine(target("abcdefghij", 0, MountStatus.Failed({ reason: "refused" })), narrow)
      ).toBe("abcd: ref")
    })
  })

  describe("makeStatusRenderer", () => {
    const run = <A>(
      body: (renderer: StatusRenderer) => Effect.Effect<A>,
      totalRows = 3
    ) => {
      const terminal = makeCapturingTerminal()
      return pipe(
        makeStatusRenderer(totalRows, plain),
        Effect.flatMap(body),
        Effect.provide(terminal.layer),
        Effect.runPromise
      ).then((value) => ({ value, chunks: terminal.chunks }))
    }

    test("moves up from below the block to repaint a row", async () => {
      const { value, chunks } = await run((r) =>
        Effect.zipRight(r.render(target("a", 0, MountStatus.Okay())), r.row)
      )

      expect(chunks).toEqual([ANSI.up(3), `${ANSI.clearLine}a: OK\n`])
      expect(value).toBe(1)
    })

    test("moves down when the row is below the cursor", async () => {
      const { chunks } = await run((r) =>
        Effect.zipRight(r.goTo(0), r.render(target("c", 2, MountStatus.Failed({ reason: "x" }))))
      )

      expect(chunks).toEqual(["\x1b[3A", "\x1b[2B", `${ANSI.clearLine}c: x\n`])
    })

    test("repainting the row under the cursor emits no movement", async () => {
      const { chunks } = await run((r) =>
        Effect.zipRight(r.goTo(1), r.render(target("b", 1, MountStatus.Okay())))
      )

      expect(chunks).toEqual(["\x1b[2A", `${ANSI.clearLine}b: OK\n`])
    })

    test("goTo to the current row writes nothing", async () => {
      const { chunks } = await run((r) => r.goTo(3))

      expect(chunks).toEqual([])
    })

    test("finalize parks below the last row", async () => {
      const { value, chunks } = await run((r) =>
        pipe(
          r.render(target("a", 0, MountStatus.Okay())),
          Effect.zipRight(r.finalize()),
          Effect.zipRight(r.row)
        )
      )

      expect(chunks).toEqual([ANSI.up(3), `${ANSI.clearLine}a: OK\n`, ANSI.down(2)])
      expect(value).toBe(3)
    })
  })

  describe("resolveLineStyle", () => {
    test("falls back to 80 columns when the terminal reports none", async () => {
      const terminal = makeCapturingTerminal()

      const style = await pipe(
        resolveLineStyle({ color: true }),
        Effect.provide(terminal.layer),
        Effect.runPromise
      )

      expect(style).toEqual({ color: true, columns: 80 })
    })
  })
})
