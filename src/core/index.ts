import { Effect, Layer, Queue, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

export interface MountAllConfig {
  readonly baseDir: string;
  readonly hostsFile: string;
  readonly color: boolean;
}

export type { MountStatus, MountStatusTag, TerminalStatus } from "./domain/MountStatus";
export type { Target, HostEntry } from "./domain/Target";
export type { MountSnapshot } from "./domain/MountSnapshot";
export type { HostsFile, MalformedLine } from "./domain/HostsFile";
export type { TargetRegistry } from "./domain/TargetRegistry";
export type { Completion, Decision } from "./services/Orchestrator";

export type { RowOutOfRange, IllegalTransition, UnresolvedTargets } from "./domain/TargetRegistry";
export type {
  HostsFileNotFound,
  HostsFilePermissionDenied,
  HostsFileUnreadable
} from "./services/HostsFileService";
export type { MountListingFailed, MountListingUnavailable } from "./services/MountTableService";

import { HostsFileServiceTag, HostsFileServiceLive } from "./services/HostsFileService";
import {
  MountTableServiceTag,
  makeMountTableService,
  defaultMountListingConfig,
  type MountListingConfig
} from "./services/MountTableService";
import {
  makeMountService,
  defaultMountCommandConfig,
  type MountCommandConfig
} from "./services/MountService";
import { LoggerServiceTag, LoggerServiceLive } from "./services/LoggerService";
import { ShellServiceLive } from "./services/ShellService";
import {
  TerminalServiceLive,
  makeStatusRenderer,
  printStatusLine,
  resolveLineStyle
} from "./services/TerminalUIService";
import { decide, drain, type Completion } from "./services/Orchestrator";

import type { Target } from "./domain/Target";
import { makeTargetRegistry } from "./domain/TargetRegistry";

export interface MountReport {
  readonly targets: ReadonlyArray<Target>;
  readonly launched: number;
  readonly okay: number;
  readonly warned: number;
  readonly failed: number;
}

const countStatus = (targets: ReadonlyArray<Target>, tag: Target["status"]["_tag"]) =>
  targets.filter((t) => t.status._tag === tag).length;

/**
 * Bring every target in the hosts file into a mounted state.
 *
 * Nothing is printed and nothing is mounted until the mount table has been
 * read; if that fails the whole run fails. Individual mount failures only
 * show up in the report.
 */
export const mountAll = (config: MountAllConfig) =>
  Effect.gen(function* () {
    const hostsFiles = yield* HostsFileServiceTag;
    const mountTable = yield* MountTableServiceTag;
    const logger = yield* LoggerServiceTag;

    const hosts = yield* hostsFiles.load(config.hostsFile);
    yield* Effect.forEach(hosts.malformed, (line) => logger.hosts.badLine(config.hostsFile, line), {
      discard: true
    });

    const snapshot = yield* pipe(
      mountTable.snapshot(),
      Effect.tapErrorTag("MountListingFailed", (e) => logger.mounts.listingOutput(e.stderr))
    );

    const registry = yield* makeTargetRegistry(hosts.entries);
    if (registry.size === 0) {
      yield* logger.hosts.noTargets(config.hostsFile);
    }

    const style = yield* resolveLineStyle({ color: config.color });
    const completions = yield* Queue.unbounded<Completion>();

    const launched = yield* Effect.scoped(
      Effect.gen(function* () {
        let launched = 0;

        for (const target of yield* registry.targets) {
          const decision = yield* decide(target, config.baseDir, snapshot, registry, completions);
          yield* printStatusLine(decision.target, style);
          if (decision.launched) launched++;
        }

        const renderer = yield* makeStatusRenderer(registry.size, style);
        yield* drain(completions, launched, registry, renderer);
        return launched;
      })
    );

    const targets = yield* registry.targets;
    return {
      targets,
      launched,
      okay: countStatus(targets, "Okay"),
      warned: countStatus(targets, "Warned"),
      failed: countStatus(targets, "Failed")
    } satisfies MountReport;
  });

export interface AppConfig {
  readonly mountCommand?: MountCommandConfig;
  readonly mountListing?: MountListingConfig;
}

export const createAppLayer = (config: AppConfig = {}) => {
  const shell = pipe(ShellServiceLive, Layer.provide(NodeContext.layer));

  return Layer.mergeAll(
    LoggerServiceLive,
    TerminalServiceLive,
    pipe(HostsFileServiceLive, Layer.provide(NodeContext.layer)),
    pipe(
      makeMountTableService(config.mountListing ?? defaultMountListingConfig),
      Layer.provide(shell)
    ),
    pipe(makeMountService(config.mountCommand ?? defaultMountCommandConfig), Layer.provide(shell))
  );
};
