import type { DraftState } from "@pickroom/shared";

export type TimerPhase = "IDLE" | "RUNNING" | "EXPIRED";

export type TimedSession = {
  status: DraftState;
  turn_started_at: Date | null;
  turn_remaining_ms: number | null;
};

/** Milliseconds left on the active turn; null when untimed or no turn is live. */
export function remainingMs(
  session: TimedSession,
  budgetSeconds: number,
  now: Date
): number | null {
  if (!Number.isFinite(budgetSeconds) || budgetSeconds <= 0) return null;
  const budgetMs = budgetSeconds * 1000;
  if (session.status === "PAUSED") {
    return session.turn_remaining_ms === null
      ? null
      : Math.min(budgetMs, Math.max(0, session.turn_remaining_ms));
  }
  if (session.status !== "IN_PROGRESS" || !session.turn_started_at) return null;
  const elapsed = now.getTime() - session.turn_started_at.getTime();
  return Math.max(0, budgetMs - elapsed);
}

export function remainingSeconds(
  session: TimedSession,
  budgetSeconds: number,
  now: Date
): number | null {
  const ms = remainingMs(session, budgetSeconds, now);
  return ms === null ? null : Math.ceil(ms / 1000);
}

export function timerPhase(
  session: TimedSession,
  budgetSeconds: number,
  now: Date
): TimerPhase {
  if (session.status !== "IN_PROGRESS") return "IDLE";
  const ms = remainingMs(session, budgetSeconds, now);
  if (ms === null) return "IDLE";
  return ms === 0 ? "EXPIRED" : "RUNNING";
}

export function turnDeadline(
  turnStartedAt: Date | null,
  budgetSeconds: number
): Date | null {
  if (!turnStartedAt || budgetSeconds <= 0) return null;
  return new Date(turnStartedAt.getTime() + budgetSeconds * 1000);
}

/** The start instant that leaves `remaining` ms on the clock at `now`. */
export function resumedTurnStart(
  now: Date,
  budgetSeconds: number,
  remaining: number | null
): Date | null {
  if (budgetSeconds <= 0) return null;
  const budgetMs = budgetSeconds * 1000;
  const left = remaining === null ? budgetMs : Math.min(budgetMs, Math.max(0, remaining));
  return new Date(now.getTime() - (budgetMs - left));
}
