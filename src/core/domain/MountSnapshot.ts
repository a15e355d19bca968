/**
 * Point-in-time view of what is mounted where, keyed by mount point.
 * Built once before any mount is attempted and never modified.
 */
export type MountSnapshot = ReadonlyMap<string, string>;

const MOUNT_LINE = /^([^ ]+) on ([^ ]+) /;

/**
 * Parse `mount` output (`<source> on <mountPoint> <rest>`).
 *
 * When the same mount point shows up more than once, the later line wins:
 * mounts stack and the last one is the one in effect.
 */
export const parseMountTable = (text: string): MountSnapshot => {
  const snapshot = new Map<string, string>();

  for (const line of text.split("\n")) {
    const match = MOUNT_LINE.exec(line);
    const source = match?.[1];
    const mountPoint = match?.[2];
    if (source === undefined || mountPoint === undefined) continue;
    snapshot.set(mountPoint, source);
  }

  return snapshot;
};

export const lookup = (snapshot: MountSnapshot, mountPoint: string): string | undefined =>
  snapshot.get(mountPoint);
