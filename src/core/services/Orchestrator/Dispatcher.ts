import { Cause, Effect, Queue, pipe } from "effect";
import { MountServiceTag, type MountOutcome } from "../MountService";
import { MountStatus } from "@domain/MountStatus";
import { lookup, type MountSnapshot } from "@domain/MountSnapshot";
import { mountPointFor, type Target } from "@domain/Target";
import type { TargetRegistry } from "@domain/TargetRegistry";

/** One-shot report from a mount attempt, keyed by the target's row. */
export interface Completion {
  readonly row: number;
  readonly status: MountOutcome;
}

export interface Decision {
  readonly target: Target;
  /** Whether a mount attempt was forked for this target */
  readonly launched: boolean;
}

const describeCause = (cause: Cause.Cause<unknown>): string => {
  const error = Cause.squash(cause);
  return error instanceof Error ? error.message : String(error);
};

/**
 * Decide a target from the mount snapshot.
 *
 * Already mounted targets are resolved on the spot. Anything else becomes
 * Pending and gets a mount attempt forked into the caller's scope; that
 * fiber offers exactly one Completion, even when the attempt dies, and the
 * dispatcher never waits on it.
 */
export const decide = (
  target: Target,
  baseDir: string,
  snapshot: MountSnapshot,
  registry: TargetRegistry,
  completions: Queue.Enqueue<Completion>
) =>
  Effect.gen(function* () {
    const mountPoint = mountPointFor(baseDir, target);
    const source = lookup(snapshot, mountPoint);

    if (source !== undefined) {
      const status =
        source === target.remoteSpec
          ? MountStatus.Okay()
          : MountStatus.Warned({ reason: `already mounted, but wrong source? ${source}` });
      yield* Effect.logDebug(`${target.localName}: ${mountPoint} already has ${source}`);
      const updated = yield* registry.transition(target.row, status);
      return { target: updated, launched: false } satisfies Decision;
    }

    const mountService = yield* MountServiceTag;
    const updated = yield* registry.transition(target.row, MountStatus.Pending());

    yield* pipe(
      mountService.mount(target.remoteSpec, mountPoint),
      Effect.catchAllCause((cause) =>
        Effect.succeed<MountOutcome>(MountStatus.Failed({ reason: describeCause(cause) }))
      ),
      Effect.flatMap((status) => Queue.offer(completions, { row: target.row, status })),
      Effect.forkScoped
    );
    yield* Effect.logDebug(`${target.localName}: mounting ${target.remoteSpec} on ${mountPoint}`);

    return { target: updated, launched: true } satisfies Decision;
  });
