/**
 * LoggerService - messages for the operator, written to stderr so they never
 * land inside the block of status lines on stdout.
 */

import { Console, Context, Effect, Layer } from "effect"
import type { MalformedLine } from "@domain/HostsFile"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly hosts: {
    readonly badLine: (file: string, line: MalformedLine) => Effect.Effect<void>
    readonly noTargets: (file: string) => Effect.Effect<void>
  }
  readonly mounts: {
    readonly listingOutput: (stderr: string) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  hosts: {
    badLine: (file, line) =>
      Console.error(`Warning: bad line ${line.line} in ${file}: ${JSON.stringify(line.text)}`),
    noTargets: (file) => Console.error(`No mount targets declared in ${file}`),
  },
  mounts: {
    listingOutput: (stderr) => {
      const trimmed = stderr.trimEnd()
      return trimmed.length > 0 ? Console.error(trimmed) : Effect.void
    },
  },
})
