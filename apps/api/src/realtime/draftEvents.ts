import type { Namespace } from "socket.io";
import { errorFields, log } from "../logger.js";
import { emitToDraft } from "./draftNamespace.js";

export const draftEventTypes = [
  "draft.created",
  "draft.scheduled",
  "draft.started",
  "draft.paused",
  "draft.resumed",
  "draft.pick.committed",
  "draft.completed"
] as const;
export type DraftEventType = (typeof draftEventTypes)[number];

export type PickCommittedPayload = {
  overall_pick_number: number;
  picker_id: string;
  item_id: string;
  was_auto_selected: boolean;
};

export type DraftEventMessage = {
  draft_id: number;
  version: number;
  event_type: DraftEventType;
  payload: unknown;
  created_at: string;
};

type DraftEventListener = (event: DraftEventMessage) => void;

/**
 * In-process fan-out for session events. The engine publishes after each
 * successful write; transports subscribe. A failing listener is logged and
 * does not affect the write that produced the event.
 */
export class DraftEventHub {
  private readonly listeners = new Set<DraftEventListener>();

  subscribe(listener: DraftEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: {
    draft_id: number;
    version: number;
    event_type: DraftEventType;
    payload: unknown;
    created_at: Date;
  }) {
    const message: DraftEventMessage = {
      draft_id: event.draft_id,
      version: event.version,
      event_type: event.event_type,
      payload: event.payload,
      created_at: event.created_at.toISOString()
    };
    for (const listener of this.listeners) {
      try {
        listener(message);
      } catch (err) {
        log({
          level: "error",
          msg: "draft_event_listener_failed",
          draft_id: event.draft_id,
          event_type: event.event_type,
          ...errorFields(err)
        });
      }
    }
  }
}

/** Relays every hub event to the session's socket.io room. */
export function registerDraftEventEmitter(hub: DraftEventHub, nsp: Namespace) {
  return hub.subscribe((event) => {
    emitToDraft(nsp, event.draft_id, "draft:event", event);
  });
}
