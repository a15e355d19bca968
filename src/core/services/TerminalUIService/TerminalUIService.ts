import { Context, Effect, Layer, Ref } from "effect"
import { displayWidth, shorten } from "@lib/shorten"
import type { Target } from "@domain/Target"

export const ANSI = {
  up: (n: number) => `\x1b[${n}A`,
  down: (n: number) => `\x1b[${n}B`,
  clearLine: "\x1b[2K",

  reset: "\x1b[0m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
} as const

const DEFAULT_COLUMNS = 80

// =============================================================================
// Terminal sink
// =============================================================================

export interface TerminalService {
  readonly write: (text: string) => Effect.Effect<void>
  /** Terminal width, when the output is a terminal that reports one */
  readonly columns: Effect.Effect<number | undefined>
}

export class TerminalServiceTag extends Context.Tag("TerminalService")<
  TerminalServiceTag,
  TerminalService
>() {}

export const TerminalServiceLive = Layer.succeed(TerminalServiceTag, {
  write: (text) =>
    Effect.sync(() => {
      process.stdout.write(text)
    }),
  columns: Effect.sync(() => (process.stdout.isTTY ? process.stdout.columns : undefined)),
})

/**
 * Records every write instead of touching a real terminal.
 */
export const makeCapturingTerminal = (columns?: number) => {
  const chunks: string[] = []
  const layer = Layer.succeed(TerminalServiceTag, {
    write: (text) =>
      Effect.sync(() => {
        chunks.push(text)
      }),
    columns: Effect.succeed(columns),
  })
  return { chunks, output: () => chunks.join(""), layer }
}

// =============================================================================
// Status lines
// =============================================================================

export interface LineStyle {
  readonly color: boolean
  readonly columns: number
}

const paint = (text: string, color: string, style: LineStyle): string =>
  style.color && color !== "" ? `${color}${text}${ANSI.reset}` : text

export const formatStatusLine = (target: Target, style: LineStyle): string => {
  // Widest suffix is ": ???" plus a spare column; a wrapped line would
  // throw off the renderer's row tracking.
  const name = shorten(target.localName, Math.max(0, style.columns - 6))
  // Room left for the reason after "name: " with a column to spare.
  const width = Math.max(0, style.columns - 3 - displayWidth(name))

  switch (target.status._tag) {
    case "Unknown":
      return `${name}: ???`
    case "Pending":
      return `${name}: ...`
    case "Okay":
      return `${paint(name, ANSI.green, style)}: OK`
    case "Warned":
      return `${paint(name, ANSI.yellow, style)}: ${shorten(target.status.reason, width)}`
    case "Failed":
      return `${paint(name, ANSI.red, style)}: ${shorten(target.status.reason, width)}`
  }
}

// =============================================================================
// In-place renderer
// =============================================================================

/**
 * Repaints single rows of an already printed block of status lines.
 *
 * The renderer tracks which row the real cursor is on and only ever moves
 * it relative to there; where the block sits on screen is unknown.
 */
export interface StatusRenderer {
  readonly row: Effect.Effect<number>
  readonly goTo: (y: number) => Effect.Effect<void>
  readonly render: (target: Target) => Effect.Effect<void>
  readonly finalize: () => Effect.Effect<void>
}

export interface RendererOptions {
  readonly color: boolean
}

export const resolveLineStyle = (options: RendererOptions) =>
  Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag
    const columns = (yield* terminal.columns) ?? DEFAULT_COLUMNS
    return { color: options.color, columns } satisfies LineStyle
  })

/** Print a target's line at the current cursor position, without tracking. */
export const printStatusLine = (target: Target, style: LineStyle) =>
  Effect.flatMap(TerminalServiceTag, (terminal) =>
    terminal.write(`${formatStatusLine(target, style)}\n`)
  )

/**
 * @param totalRows rows already on screen; the cursor starts just below them
 */
export const makeStatusRenderer = (totalRows: number, style: LineStyle) =>
  Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag
    const current = yield* Ref.make(totalRows)

    const goTo = (y: number) =>
      Effect.gen(function* () {
        const cur = yield* Ref.get(current)
        if (y < cur) yield* terminal.write(ANSI.up(cur - y))
        else if (y > cur) yield* terminal.write(ANSI.down(y - cur))
        yield* Ref.set(current, y)
      })

    const render = (target: Target) =>
      Effect.gen(function* () {
        yield* goTo(target.row)
        yield* terminal.write(`${ANSI.clearLine}${formatStatusLine(target, style)}\n`)
        yield* Ref.update(current, (y) => y + 1)
      })

    return {
      row: Ref.get(current),
      goTo,
      render,
      finalize: () => goTo(totalRows),
    } satisfies StatusRenderer
  })
