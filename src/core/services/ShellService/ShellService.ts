/**
 * ShellService - runs external programs for testability.
 *
 * Arguments are handed to the program as-is; nothing goes through `sh -c`,
 * so remote specs and mount points never need quoting.
 */

import { Command, CommandExecutor } from "@effect/platform"
import { Context, Data, Effect, Layer, Stream, pipe } from "effect"

// =============================================================================
// Errors
// =============================================================================

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string
  readonly command: string
}> {}

// =============================================================================
// Types
// =============================================================================

export interface ShellResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

// =============================================================================
// Service interface
// =============================================================================

export interface ShellService {
  readonly exec: (
    command: string,
    args: ReadonlyArray<string>
  ) => Effect.Effect<ShellResult, ShellError>
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

// =============================================================================
// Live implementation (uses @effect/platform Command)
// =============================================================================

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>) =>
  pipe(
    stream,
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  )

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor

    return {
      exec: (command, args) =>
        pipe(
          Effect.gen(function* () {
            const proc = yield* Command.start(Command.make(command, ...args))
            const [stdout, stderr, exitCode] = yield* Effect.all(
              [collectText(proc.stdout), collectText(proc.stderr), proc.exitCode],
              { concurrency: "unbounded" }
            )
            return { stdout, stderr, exitCode }
          }),
          Effect.scoped,
          Effect.provideService(CommandExecutor.CommandExecutor, executor),
          Effect.mapError(
            (e) => new ShellError({ message: e.message, command: [command, ...args].join(" ") })
          )
        ),
    }
  })
)
