import { Effect, Queue, pipe } from "effect";
import { describeStatus } from "@domain/MountStatus";
import { UnresolvedTargets, type TargetRegistry } from "@domain/TargetRegistry";
import type { StatusRenderer } from "../TerminalUIService";
import type { Completion } from "./Dispatcher";

/**
 * Apply mount results as they arrive, in whatever order, then park the cursor
 * below the status block.
 *
 * @param expected how many mount attempts were launched; exactly that many
 *   completions are taken from the queue
 */
export const drain = (
  completions: Queue.Dequeue<Completion>,
  expected: number,
  registry: TargetRegistry,
  renderer: StatusRenderer
) =>
  Effect.gen(function* () {
    const applyNext = pipe(
      Queue.take(completions),
      Effect.flatMap((completion) => registry.transition(completion.row, completion.status)),
      Effect.tap((target) =>
        Effect.logDebug(`${target.localName}: ${describeStatus(target.status)}`)
      ),
      Effect.flatMap(renderer.render)
    );

    yield* Effect.replicateEffect(applyNext, expected, { discard: true });

    const unresolved = yield* registry.unresolved;
    if (unresolved.length > 0) {
      return yield* Effect.fail(
        new UnresolvedTargets({ localNames: unresolved.map((t) => t.localName) })
      );
    }

    yield* renderer.finalize();
  });
