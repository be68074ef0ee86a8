export const draftStates = [
  "PENDING",
  "SCHEDULED",
  "IN_PROGRESS",
  "PAUSED",
  "COMPLETED"
] as const;
export type DraftState = (typeof draftStates)[number];

/** Edges of the session lifecycle. COMPLETED has none. */
const transitionGraph: Record<DraftState, readonly DraftState[]> = {
  PENDING: ["SCHEDULED", "IN_PROGRESS"],
  SCHEDULED: ["PENDING", "IN_PROGRESS"],
  IN_PROGRESS: ["PAUSED", "COMPLETED"],
  PAUSED: ["IN_PROGRESS"],
  COMPLETED: []
};

export type DraftStateErrorCode = "UNKNOWN_STATE" | "SAME_STATE" | "TRANSITION_NOT_ALLOWED";

export class DraftStateError extends Error {
  constructor(
    message: string,
    public code: DraftStateErrorCode,
    public details: { from?: string; to?: string } = {}
  ) {
    super(message);
    this.name = "DraftStateError";
  }
}

export function isValidDraftState(state: string): state is DraftState {
  return draftStates.some((s) => s === state);
}

export function isTerminalDraftState(state: DraftState): boolean {
  return transitionGraph[state].length === 0;
}

export function canTransition(from: DraftState, to: DraftState): boolean {
  return transitionGraph[from].includes(to);
}

export function validateDraftTransition(from: string, to: string) {
  if (!isValidDraftState(from) || !isValidDraftState(to)) {
    throw new DraftStateError(`Unknown draft state in ${from} -> ${to}`, "UNKNOWN_STATE", {
      from,
      to
    });
  }
  if (from === to) {
    throw new DraftStateError(`Draft is already ${to}`, "SAME_STATE", { from, to });
  }
  if (!canTransition(from, to)) {
    throw new DraftStateError(`Cannot move from ${from} to ${to}`, "TRANSITION_NOT_ALLOWED", {
      from,
      to
    });
  }
}

export function enforceDraftTransition(from: string, to: DraftState): DraftState {
  validateDraftTransition(from, to);
  return to;
}

export function getAllowedTransitionsFrom(from: string): DraftState[] {
  if (!isValidDraftState(from)) {
    throw new DraftStateError(`Unknown draft state ${from}`, "UNKNOWN_STATE", { from });
  }
  return [...transitionGraph[from]];
}
