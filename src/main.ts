#!/usr/bin/env tsx
/**
 * sshfs-fanout CLI
 *
 * Mounts every target listed in the hosts file at once and keeps one status
 * line per target up to date while the mounts finish.
 *
 * Hosts file ($HOME/remote/.hosts by default):
 *   # name=remote
 *   media=alice@nas.local:/srv/media
 *   build=ci@build01:/var/builds
 *
 * Example:
 *   $ sshfs-fanout                                # mount into ~/remote
 *   $ sshfs-fanout --base-dir /mnt/remote --debug
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Option, Logger, LogLevel } from "effect"

import * as Opts from "@cli/options"
import { runMountCommand, withErrorHandling, StderrLogger } from "@cli/handler"

// =============================================================================
// Root command
// =============================================================================

const rootCommand = Command.make(
  "sshfs-fanout",
  {
    baseDir: Opts.baseDir,
    hostsFile: Opts.hostsFile,
    mountCommand: Opts.mountCommand,
    mountOption: Opts.mountOption,
    noColor: Opts.noColor,
    debug: Opts.debug,
  },
  (opts) => {
    const program = withErrorHandling(
      runMountCommand({
        baseDir: Option.getOrUndefined(opts.baseDir),
        hostsFile: Option.getOrUndefined(opts.hostsFile),
        mountCommand: opts.mountCommand,
        mountOptions: opts.mountOption,
        noColor: opts.noColor,
      })
    ).pipe(Effect.provide(StderrLogger))

    return opts.debug
      ? Effect.provide(program, Logger.minimumLogLevel(LogLevel.Debug))
      : program
  }
).pipe(
  Command.withDescription("Mount every sshfs target in the hosts file in parallel")
)

// =============================================================================
// Run CLI
// =============================================================================

const cli = Command.run(rootCommand, {
  name: "sshfs-fanout",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
