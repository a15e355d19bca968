import { Data } from "effect";

/**
 * Where a single mount target stands.
 *
 * Lifecycle:
 *   Unknown → Okay | Warned | Pending   (decided from the mount snapshot)
 *   Pending → Okay | Failed             (reported by the mount attempt)
 *
 * Nothing ever moves back to Unknown or Pending.
 */
export type MountStatus = Data.TaggedEnum<{
  Unknown: {};
  Pending: {};
  Warned: { readonly reason: string };
  Failed: { readonly reason: string };
  Okay: {};
}>;

export const MountStatus = Data.taggedEnum<MountStatus>();

export type MountStatusTag = MountStatus["_tag"];

export type TerminalStatus = Extract<MountStatus, { _tag: "Okay" | "Warned" | "Failed" }>;

const ALLOWED: Record<MountStatusTag, ReadonlyArray<MountStatusTag>> = {
  Unknown: ["Okay", "Warned", "Pending"],
  Pending: ["Okay", "Failed"],
  Warned: [],
  Failed: [],
  Okay: []
};

export const canTransition = (from: MountStatus, to: MountStatus): boolean =>
  ALLOWED[from._tag].includes(to._tag);

export const isTerminal = (status: MountStatus): status is TerminalStatus =>
  status._tag === "Okay" || status._tag === "Warned" || status._tag === "Failed";

export const describeStatus = MountStatus.$match({
  Unknown: () => "unknown",
  Pending: () => "pending",
  Warned: ({ reason }) => `warned (${reason})`,
  Failed: ({ reason }) => `failed (${reason})`,
  Okay: () => "ok"
});
