import type { Namespace, Server, Socket } from "socket.io";
import { extractToken } from "../auth/middleware.js";
import { verifyToken } from "../auth/token.js";
import { AppError, forbidden, unauthorized } from "../errors.js";
import type { DraftEngine } from "../services/drafting/draftEngine.js";

export const DRAFT_NAMESPACE = "/drafts";

export type DraftSocketData = {
  draftId: number;
  participantId: string;
};

const draftRoom = (draftId: number) => `draft:${draftId}`;

function handshakeAuthField(socket: Socket, key: string): unknown {
  const auth: unknown = socket.handshake.auth;
  if (typeof auth !== "object" || auth === null || !(key in auth)) return undefined;
  return Object.getOwnPropertyDescriptor(auth, key)?.value;
}

function parseDraftId(socket: Socket): number {
  const fromQuery = socket.handshake.query?.draftId;
  const raw = fromQuery ?? handshakeAuthField(socket, "draftId");
  const value = Array.isArray(raw) ? raw[0] : raw;
  const num = Number(value);
  if (!value || !Number.isInteger(num) || num <= 0) {
    throw new AppError("INVALID_DRAFT_ID", 400, "Invalid draft id");
  }
  return num;
}

function parseToken(socket: Socket): string | null {
  const fromHeaders = extractToken({
    authorization: socket.handshake.headers?.authorization,
    cookie: socket.handshake.headers?.cookie
  });
  if (fromHeaders) return fromHeaders;
  const token = handshakeAuthField(socket, "token");
  if (typeof token === "string" && token.startsWith("Bearer "))
    return token.slice("Bearer ".length);
  if (typeof token === "string" && token) return token;
  return null;
}

/**
 * Participants and the commissioner of a draft join its room; the room then
 * receives every `draft:event` the engine publishes for that draft.
 */
export function registerDraftNamespace(
  io: Server,
  opts: { engine: DraftEngine; authSecret: string }
): Namespace {
  const nsp = io.of(DRAFT_NAMESPACE);

  nsp.use(async (socket, next) => {
    try {
      const draftId = parseDraftId(socket);
      const token = parseToken(socket);
      if (!token) throw unauthorized();
      const claims = verifyToken(token, opts.authSecret);

      const draft = await opts.engine.getSession(draftId);
      const isMember =
        draft.config.order.includes(claims.sub) ||
        draft.config.commissioner_id === claims.sub;
      if (!isMember) throw forbidden("Not a draft participant");

      const data: DraftSocketData = { draftId, participantId: claims.sub };
      socket.data = data;
      next();
    } catch (err) {
      next(err instanceof Error ? err : new Error(String(err)));
    }
  });

  nsp.on("connection", (socket) => {
    const data: DraftSocketData = socket.data;
    void socket.join(draftRoom(data.draftId));
    socket.emit("joined", { draftId: data.draftId });
  });

  return nsp;
}

export function emitToDraft(
  nsp: Namespace,
  draftId: number,
  event: string,
  payload: unknown
) {
  nsp.to(draftRoom(draftId)).emit(event, payload);
}
