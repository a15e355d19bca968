import { Data, Effect, Ref } from "effect";
import { canTransition, isTerminal, type MountStatus } from "./MountStatus";
import { makeTarget, withStatus, type HostEntry, type Target } from "./Target";

// =============================================================================
// Invariant violations
// =============================================================================

export class RowOutOfRange extends Data.TaggedError("RowOutOfRange")<{
  readonly row: number;
  readonly size: number;
}> {}

export class IllegalTransition extends Data.TaggedError("IllegalTransition")<{
  readonly localName: string;
  readonly from: MountStatus["_tag"];
  readonly to: MountStatus["_tag"];
}> {}

export class UnresolvedTargets extends Data.TaggedError("UnresolvedTargets")<{
  readonly localNames: ReadonlyArray<string>;
}> {}

export type RegistryError = RowOutOfRange | IllegalTransition;

// =============================================================================
// Registry
// =============================================================================

export interface TargetRegistry {
  readonly size: number;
  readonly targets: Effect.Effect<ReadonlyArray<Target>>;
  readonly get: (row: number) => Effect.Effect<Target, RowOutOfRange>;
  /** The only way a target's status changes. */
  readonly transition: (row: number, status: MountStatus) => Effect.Effect<Target, RegistryError>;
  readonly unresolved: Effect.Effect<ReadonlyArray<Target>>;
}

export const makeTargetRegistry = (
  entries: ReadonlyArray<HostEntry>
): Effect.Effect<TargetRegistry> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<ReadonlyArray<Target>>(entries.map(makeTarget));
    const size = entries.length;

    const get = (row: number): Effect.Effect<Target, RowOutOfRange> =>
      Effect.flatMap(Ref.get(ref), (targets) => {
        const target = Number.isInteger(row) ? targets[row] : undefined;
        return target ? Effect.succeed(target) : Effect.fail(new RowOutOfRange({ row, size }));
      });

    const transition = (row: number, status: MountStatus): Effect.Effect<Target, RegistryError> =>
      Effect.gen(function* () {
        const current = yield* get(row);
        if (!canTransition(current.status, status)) {
          return yield* Effect.fail(
            new IllegalTransition({
              localName: current.localName,
              from: current.status._tag,
              to: status._tag
            })
          );
        }
        const updated = withStatus(current, status);
        yield* Ref.update(ref, (targets) => targets.map((t) => (t.row === row ? updated : t)));
        return updated;
      });

    return {
      size,
      targets: Ref.get(ref),
      get,
      transition,
      unresolved: Effect.map(Ref.get(ref), (targets) => targets.filter((t) => !isTerminal(t.status)))
    };
  });
