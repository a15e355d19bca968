import { Console, Effect, Logger, pipe } from "effect"

import type { MountOptions } from "./options"
import { parseMountOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

import { mountAll, createAppLayer, type MountAllConfig } from "@core"

/**
 * Log lines go to stderr; stdout belongs to the status block.
 */
export const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.stringLogger)
)

/**
 * Error handling wrapper for CLI commands.
 *
 * Prints the friendly form of whatever failed and marks the process as
 * failed. Mount failures of single targets never get here; they are part
 * of the status view.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}`),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1
          })
        )
      )
    }),
    Effect.asVoid
  )

/**
 * Mount everything in the hosts file and log a debug summary.
 */
export const runMount = (config: MountAllConfig) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Base dir: ${config.baseDir}, hosts file: ${config.hostsFile}`)

    const report = yield* mountAll(config)

    yield* Effect.logDebug(
      `Done: ${report.okay} ok, ${report.warned} warned, ${report.failed} failed (${report.launched} mount attempts)`
    )
    return report
  })

/**
 * Resolve CLI options against the environment, then run with the live layer.
 */
export const runMountCommand = (options: MountOptions) =>
  Effect.gen(function* () {
    const parsed = yield* parseMountOptions(options, process.stdout.isTTY === true)
    return yield* pipe(
      runMount(parsed.run),
      Effect.provide(createAppLayer({ mountCommand: parsed.mountCommand }))
    )
  })
