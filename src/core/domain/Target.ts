import { MountStatus } from "./MountStatus";

export interface Target {
  readonly localName: string;
  readonly remoteSpec: string;
  readonly row: number;
  readonly status: MountStatus;
}

export interface HostEntry {
  readonly localName: string;
  readonly remoteSpec: string;
}

export const makeTarget = (entry: HostEntry, row: number): Target => ({
  localName: entry.localName,
  remoteSpec: entry.remoteSpec,
  row,
  status: MountStatus.Unknown()
});

export const withStatus = (target: Target, status: MountStatus): Target => ({
  ...target,
  status
});

/** `dir/name` with no doubled slash, also when `dir` is `/`. */
export const joinPath = (dir: string, name: string): string =>
  `${dir.replace(/\/+$/, "")}/${name}`;

export const mountPointFor = (baseDir: string, target: Target): string =>
  joinPath(baseDir, target.localName);
