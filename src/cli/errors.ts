import { Match } from "effect";

import type {
  HostsFileNotFound,
  HostsFilePermissionDenied,
  HostsFileUnreadable,
  MountListingFailed,
  MountListingUnavailable,
  RowOutOfRange,
  IllegalTransition,
  UnresolvedTargets
} from "@core";
import type { HomeNotSet } from "./optionParsing";

type ConfigError = HomeNotSet | HostsFileNotFound | HostsFilePermissionDenied | HostsFileUnreadable;

type MountTableError = MountListingFailed | MountListingUnavailable;

type InvariantError = RowOutOfRange | IllegalTransition | UnresolvedTargets;

type DomainError = ConfigError | MountTableError | InvariantError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  homeNotSet: () =>
    new AppError(
      "HOME is not set",
      `Cannot work out where the mount points live without $HOME.`,
      `Set HOME, or pass --base-dir explicitly.`
    ),

  hostsFileNotFound: (path: string) =>
    new AppError(
      "Hosts file not found",
      `The hosts file "${path}" does not exist.`,
      `Create it with one name=user@host:/path line per mount, or point --hosts-file at it.`
    ),

  hostsFilePermissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot read the hosts file "${path}": permission denied.`,
      `Check that your user has read permission on the hosts file.`
    ),

  hostsFileUnreadable: (path: string, reason: string) =>
    new AppError(
      "Cannot read hosts file",
      `Failed to read "${path}": ${reason}`,
      `Check that the path is a readable text file.`
    ),

  mountListingFailed: (command: string, exitCode: number) =>
    new AppError(
      "Cannot list mounts",
      `${command} exited with status ${exitCode}; nothing was mounted.`,
      `The current mount table is needed to avoid mounting twice. Run '${command}' yourself to see what is wrong.`
    ),

  mountListingUnavailable: (command: string, reason: string) =>
    new AppError(
      "Cannot list mounts",
      `Could not run ${command}: ${reason}`,
      `Make sure '${command}' is installed and on your PATH.`
    ),

  internal: (detail: string) =>
    new AppError(
      "Internal error",
      detail,
      `This is a bug in the mount orchestration, not in your configuration. Please report it.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  HomeNotSet: () => errors.homeNotSet(),
  HostsFileNotFound: (e) => errors.hostsFileNotFound(e.path),
  HostsFilePermissionDenied: (e) => errors.hostsFilePermissionDenied(e.path),
  HostsFileUnreadable: (e) => errors.hostsFileUnreadable(e.path, e.reason),

  MountListingFailed: (e) => errors.mountListingFailed(e.command, e.exitCode),
  MountListingUnavailable: (e) => errors.mountListingUnavailable(e.command, e.reason),

  RowOutOfRange: (e) =>
    errors.internal(`A mount result arrived for row ${e.row}, but there are only ${e.size} targets.`),
  IllegalTransition: (e) =>
    errors.internal(`Target "${e.localName}" cannot go from ${e.from} to ${e.to}.`),
  UnresolvedTargets: (e) =>
    errors.internal(`Targets left without a final status: ${e.localNames.join(", ")}.`)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "HomeNotSet",
  "HostsFileNotFound",
  "HostsFilePermissionDenied",
  "HostsFileUnreadable",
  "MountListingFailed",
  "MountListingUnavailable",
  "RowOutOfRange",
  "IllegalTransition",
  "UnresolvedTargets"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  homeNotSet,
  hostsFileNotFound,
  hostsFilePermissionDenied,
  hostsFileUnreadable,
  mountListingFailed,
  mountListingUnavailable,
  internal,
  unexpected,
  permissionDenied
} = errors;
