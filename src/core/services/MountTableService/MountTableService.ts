import { Context, Data, Effect, Layer, pipe } from "effect";
import { ShellServiceTag } from "../ShellService";
import { parseMountTable, type MountSnapshot } from "@domain/MountSnapshot";

export class MountListingFailed extends Data.TaggedError("MountListingFailed")<{
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;
}> {}

export class MountListingUnavailable extends Data.TaggedError("MountListingUnavailable")<{
  readonly command: string;
  readonly reason: string;
}> {}

export type MountTableError = MountListingFailed | MountListingUnavailable;

export interface MountTableService {
  /** Read the current mount table once. */
  readonly snapshot: () => Effect.Effect<MountSnapshot, MountTableError>;
}

export class MountTableServiceTag extends Context.Tag("MountTableService")<
  MountTableServiceTag,
  MountTableService
>() {}

export interface MountListingConfig {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
}

export const defaultMountListingConfig: MountListingConfig = {
  command: "mount",
  args: []
};

export const makeMountTableService = (config: MountListingConfig = defaultMountListingConfig) =>
  Layer.effect(
    MountTableServiceTag,
    Effect.gen(function* () {
      const shell = yield* ShellServiceTag;

      return {
        snapshot: () =>
          pipe(
            shell.exec(config.command, config.args),
            Effect.mapError(
              (e) => new MountListingUnavailable({ command: config.command, reason: e.message })
            ),
            Effect.flatMap((result) =>
              result.exitCode === 0
                ? Effect.succeed(parseMountTable(result.stdout))
                : Effect.fail(
                    new MountListingFailed({
                      command: config.command,
                      exitCode: result.exitCode,
                      stderr: result.stderr
                    })
                  )
            ),
            Effect.tap((snapshot) => Effect.logDebug(`Mount table has ${snapshot.size} entries`))
          )
      };
    })
  );
