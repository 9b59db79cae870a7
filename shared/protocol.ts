/**
 * Wire protocol spoken over the `/ws` channel.
 *
 * Every frame is a JSON object carrying a protocol version `v` and a `kind`
 * discriminator. Receivers ignore frames whose version or kind they do not
 * understand, so new kinds can be added without breaking older clients.
 */

export const PROTOCOL_VERSION = 1;
export const CHANNEL_PATH = "/ws";

/**
 * Authoritative playback position pushed by the server whenever it changes.
 * `seq` increases monotonically for the lifetime of a server process.
 */
export interface SnapshotMessage {
  v: typeof PROTOCOL_VERSION;
  kind: "snapshot";
  seq: number;
  track_id: string | null;
  position: number; // seconds
  is_playing: boolean;
}

export interface PingMessage {
  v: typeof PROTOCOL_VERSION;
  kind: "ping";
}

export interface PongMessage {
  v: typeof PROTOCOL_VERSION;
  kind: "pong";
}

export interface CloseMessage {
  v: typeof PROTOCOL_VERSION;
  kind: "close";
  reason: string;
}

export interface ErrorMessage {
  v: typeof PROTOCOL_VERSION;
  kind: "error";
  message: string;
}

export type ServerMessage = SnapshotMessage | PingMessage | PongMessage | CloseMessage | ErrorMessage;
export type ClientMessage = PingMessage | PongMessage;

export function encodeMessage(message: ServerMessage | ClientMessage): string {
  return JSON.stringify(message);
}

export const ping = (): PingMessage => ({ v: PROTOCOL_VERSION, kind: "ping" });
export const pong = (): PongMessage => ({ v: PROTOCOL_VERSION, kind: "pong" });

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFrame(raw: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed.v !== PROTOCOL_VERSION || typeof parsed.kind !== "string") {
    return null;
  }
  return parsed;
}

/**
 * Decode a frame received by a client. Returns null for malformed frames and
 * for versions or kinds this build does not know.
 */
export function decodeServerMessage(raw: string): ServerMessage | null {
  const frame = parseFrame(raw);
  if (!frame) {
    return null;
  }

  switch (frame.kind) {
    case "snapshot": {
      const { seq, track_id, position, is_playing } = frame;
      if (typeof seq !== "number" || !Number.isFinite(seq)) {
        return null;
      }
      if (typeof position !== "number" || !Number.isFinite(position) || position < 0) {
        return null;
      }
      if (typeof is_playing !== "boolean") {
        return null;
      }
      if (track_id !== null && typeof track_id !== "string") {
        return null;
      }
      return {
        v: PROTOCOL_VERSION,
        kind: "snapshot",
        seq,
        track_id: typeof track_id === "string" ? track_id : null,
        position,
        is_playing,
      };
    }
    case "ping":
      return ping();
    case "pong":
      return pong();
    case "close":
      return {
        v: PROTOCOL_VERSION,
        kind: "close",
        reason: typeof frame.reason === "string" ? frame.reason : "unspecified",
      };
    case "error":
      return {
        v: PROTOCOL_VERSION,
        kind: "error",
        message: typeof frame.message === "string" ? frame.message : "",
      };
    default:
      return null;
  }
}

/** Decode a frame received by the server. Clients only send liveness tokens. */
export function decodeClientMessage(raw: string): ClientMessage | null {
  const frame = parseFrame(raw);
  if (!frame) {
    return null;
  }
  if (frame.kind === "ping") {
    return ping();
  }
  if (frame.kind === "pong") {
    return pong();
  }
  return null;
}
