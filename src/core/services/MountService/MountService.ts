/**
 * MountService - performs one sshfs mount.
 *
 * A mount attempt never fails as an effect: whatever goes wrong ends up as
 * a `Failed` status carrying the diagnostic text, so one target's trouble
 * cannot leak into another's.
 */

import { Context, Effect, Layer, pipe } from "effect";
import { ShellServiceTag } from "../ShellService";
import { MountStatus } from "@domain/MountStatus";

export type MountOutcome = Extract<MountStatus, { _tag: "Okay" | "Failed" }>;

export interface MountService {
  readonly mount: (remoteSpec: string, mountPoint: string) => Effect.Effect<MountOutcome>;
}

export class MountServiceTag extends Context.Tag("MountService")<MountServiceTag, MountService>() {}

export interface MountCommandConfig {
  readonly command: string;
  /** Passed as `-o <option>` pairs before the remote and mount point. */
  readonly options: ReadonlyArray<string>;
}

export const defaultMountCommandConfig: MountCommandConfig = {
  command: "sshfs",
  options: ["ServerAliveCountMax=3", "ServerAliveInterval=10"]
};

export const buildMountArgs = (
  config: MountCommandConfig,
  remoteSpec: string,
  mountPoint: string
): ReadonlyArray<string> => [
  ...config.options.flatMap((option) => ["-o", option]),
  remoteSpec,
  mountPoint
];

export const makeMountService = (config: MountCommandConfig = defaultMountCommandConfig) =>
  Layer.effect(
    MountServiceTag,
    Effect.gen(function* () {
      const shell = yield* ShellServiceTag;

      return {
        mount: (remoteSpec, mountPoint) =>
          pipe(
            shell.exec(config.command, buildMountArgs(config, remoteSpec, mountPoint)),
            Effect.map((result): MountOutcome => {
              if (result.exitCode === 0) return MountStatus.Okay();
              const stderr = result.stderr.trim();
              return MountStatus.Failed({
                reason:
                  stderr.length > 0
                    ? stderr
                    : `${config.command} exited with status ${result.exitCode}`
              });
            }),
            Effect.catchTag("ShellError", (e) =>
              Effect.succeed<MountOutcome>(MountStatus.Failed({ reason: e.message }))
            )
          )
      };
    })
  );
