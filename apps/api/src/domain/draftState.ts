import {
  enforceDraftTransition,
  getAllowedTransitionsFrom,
  type DraftState
} from "@pickroom/shared";
import type { DraftSessionPatch } from "../data/repositories/draftRepository/types.js";

export type DraftLifecycleRecord = {
  status: DraftState;
  started_at: Date | null;
  completed_at: Date | null;
};

type Clock = () => Date;

const defaultClock: Clock = () => new Date();

/**
 * Validates the move and returns the lifecycle columns to write. Throws
 * `DraftStateError` for a transition the machine does not allow.
 */
export function transitionDraftState(
  draft: DraftLifecycleRecord,
  to: DraftState,
  now: Clock = defaultClock
): DraftSessionPatch & { status: DraftState } {
  const next = enforceDraftTransition(draft.status, to);
  return {
    status: next,
    started_at: next === "IN_PROGRESS" ? (draft.started_at ?? now()) : draft.started_at,
    completed_at: next === "COMPLETED" ? now() : draft.completed_at
  };
}

export function allowedTransitions(status: DraftState): DraftState[] {
  return getAllowedTransitionsFrom(status);
}
