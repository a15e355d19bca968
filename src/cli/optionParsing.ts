import { Config, Data, Effect, Option } from "effect";
import type { MountAllConfig } from "@core";
import { joinPath } from "@domain/Target";
import { defaultMountCommandConfig, type MountCommandConfig } from "@services/MountService";
import type { MountOptions } from "./options";

export class HomeNotSet extends Data.TaggedError("HomeNotSet")<{}> {}

export interface ParsedMountOptions {
  readonly run: MountAllConfig;
  readonly mountCommand: MountCommandConfig;
}

const trimTrailingSlash = (path: string): string => path.replace(/(.)\/+$/, "$1");

const resolveBaseDir = (baseDir: string | undefined): Effect.Effect<string, HomeNotSet> =>
  baseDir !== undefined
    ? Effect.succeed(trimTrailingSlash(baseDir))
    : Config.string("HOME").pipe(
        Effect.map((home) => joinPath(home, "remote")),
        Effect.mapError(() => new HomeNotSet())
      );

/**
 * Colors are on unless --no-color was given, NO_COLOR is set, or stdout is
 * not a terminal.
 */
const resolveColor = (noColor: boolean, isTTY: boolean): Effect.Effect<boolean> =>
  Config.option(Config.string("NO_COLOR")).pipe(
    Effect.map((noColorEnv) =>
      !noColor && isTTY && Option.match(noColorEnv, { onNone: () => true, onSome: (v) => v === "" })
    ),
    Effect.orElseSucceed(() => false)
  );

export const parseMountOptions = (
  options: MountOptions,
  isTTY: boolean
): Effect.Effect<ParsedMountOptions, HomeNotSet> =>
  Effect.gen(function* () {
    const baseDir = yield* resolveBaseDir(options.baseDir);
    const color = yield* resolveColor(options.noColor, isTTY);

    return {
      run: {
        baseDir,
        hostsFile: options.hostsFile ?? joinPath(baseDir, ".hosts"),
        color
      },
      mountCommand: {
        command: options.mountCommand,
        options:
          options.mountOptions.length > 0
            ? options.mountOptions
            : defaultMountCommandConfig.options
      }
    };
  });
