import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { parseHostsFile, type HostsFile } from "@domain/HostsFile";

export class HostsFileNotFound extends Data.TaggedError("HostsFileNotFound")<{
  readonly path: string;
}> {}

export class HostsFilePermissionDenied extends Data.TaggedError("HostsFilePermissionDenied")<{
  readonly path: string;
}> {}

export class HostsFileUnreadable extends Data.TaggedError("HostsFileUnreadable")<{
  readonly path: string;
  readonly reason: string;
}> {}

export type HostsFileError = HostsFileNotFound | HostsFilePermissionDenied | HostsFileUnreadable;

export interface HostsFileService {
  readonly load: (path: string) => Effect.Effect<HostsFile, HostsFileError>;
}

export class HostsFileServiceTag extends Context.Tag("HostsFileService")<
  HostsFileServiceTag,
  HostsFileService
>() {}

const toHostsFileError = (path: string, error: PlatformError): HostsFileError => {
  if (error._tag === "SystemError") {
    if (error.reason === "NotFound") return new HostsFileNotFound({ path });
    if (error.reason === "PermissionDenied") return new HostsFilePermissionDenied({ path });
  }
  return new HostsFileUnreadable({ path, reason: error.message });
};

export const HostsFileServiceLive = Layer.effect(
  HostsFileServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    return {
      load: (path) =>
        pipe(
          fs.readFileString(path),
          Effect.mapError((e) => toHostsFileError(path, e)),
          Effect.map(parseHostsFile),
          Effect.tap((hosts) =>
            Effect.logDebug(
              `Read ${hosts.entries.length} targets and ${hosts.malformed.length} bad lines from ${path}`
            )
          )
        )
    };
  })
);
