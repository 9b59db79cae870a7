import { WebSocketServer, WebSocket, RawData } from "ws";
import { Server as HttpServer } from "http";
import { randomUUID } from "crypto";
import { performance } from "perf_hooks";
import {
  CHANNEL_PATH,
  PROTOCOL_VERSION,
  ServerMessage,
  SnapshotMessage,
  decodeClientMessage,
  encodeMessage,
  ping,
  pong,
} from "../../shared/protocol";
import { PlaybackReading, PositionSource, TrackInfo, isNotPlaying } from "./types";
import { errorMessage } from "./errors";

/**
 * The subset of a ws WebSocket a session needs
 */
export interface ChannelSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SessionState = "connecting" | "open" | "closing" | "closed";

export type CloseReason =
  | "client-closed"
  | "heartbeat-timeout"
  | "send-failed"
  | "socket-error"
  | "server-shutdown";

/**
 * One connected client. Owned by the broadcaster and never shared.
 */
export interface ConnectionSession {
  readonly id: string;
  readonly socket: ChannelSocket;
  state: SessionState;
  lastHeartbeatAck: number;
  closeReason: CloseReason | null;
  probeTimer: NodeJS.Timeout | null;
  timeoutTimer: NodeJS.Timeout | null;
}

export interface BroadcasterOptions {
  source: PositionSource;
  sampleIntervalMs?: number;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  driftThresholdSeconds?: number;
  now?: () => number;
  /** Called when the sampled track changes, null when playback stops */
  onTrackChange?: (track: TrackInfo | null) => void;
}

/** Last state pushed to clients, used for change detection. */
interface BroadcastState {
  trackId: string | null;
  positionSeconds: number;
  isPlaying: boolean;
  sampledAt: number;
}

const GOING_AWAY = 1001;

/**
 * Samples the external player on a fixed cadence and pushes position updates
 * to every open session over the `/ws` channel. Each session has its own
 * heartbeat: a probe every heartbeatIntervalMs and a timeout that any inbound
 * frame resets.
 */
export class SyncBroadcaster {
  private readonly source: PositionSource;
  private readonly sampleIntervalMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;
  private readonly driftThresholdSeconds: number;
  private readonly now: () => number;
  private readonly onTrackChange?: (track: TrackInfo | null) => void;

  private sessions: Map<string, ConnectionSession> = new Map();
  private wss: WebSocketServer | null = null;
  private sampleInterval: NodeJS.Timeout | null = null;
  private sampling = false;
  private sourceError: string | null = null;
  private shuttingDown = false;
  private seq = 0;
  private lastBroadcast: BroadcastState | null = null;
  private lastMessage: SnapshotMessage | null = null;

  constructor(options: BroadcasterOptions) {
    this.source = options.source;
    this.sampleIntervalMs = options.sampleIntervalMs ?? 1000;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? 35000;
    this.driftThresholdSeconds = options.driftThresholdSeconds ?? 1;
    this.now = options.now ?? (() => performance.now());
    this.onTrackChange = options.onTrackChange;
  }

  /**
   * Accept channel upgrades on the HTTP server at the fixed channel path
   */
  public attach(server: HttpServer): void {
    this.wss = new WebSocketServer({ server, path: CHANNEL_PATH });
    this.wss.on("connection", (ws: WebSocket) => {
      this.accept(ws);
    });
    this.wss.on("error", (error) => {
      console.error("[Broadcaster] WebSocket server error:", error);
    });
  }

  /**
   * Start the sampling loop
   */
  public start(): void {
    if (this.sampleInterval) {
      return;
    }
    this.sampleInterval = setInterval(() => {
      void this.sampleOnce();
    }, this.sampleIntervalMs);
  }

  /**
   * Register a connected socket as a new session and open it
   */
  public accept(socket: ChannelSocket): ConnectionSession {
    const session: ConnectionSession = {
      id: randomUUID(),
      socket,
      state: "connecting",
      lastHeartbeatAck: this.now(),
      closeReason: null,
      probeTimer: null,
      timeoutTimer: null,
    };

    if (this.shuttingDown) {
      console.warn("[Broadcaster] Rejecting connection during shutdown");
      session.state = "closed";
      session.closeReason = "server-shutdown";
      socket.close(GOING_AWAY, "server-shutdown");
      return session;
    }

    this.sessions.set(session.id, session);

    socket.on("message", (data: RawData) => {
      this.handleInbound(session, data.toString());
    });

    socket.on("close", () => {
      this.closeSession(session, "client-closed");
    });

    socket.on("error", (error: Error) => {
      console.error(`[Broadcaster] Session ${session.id} socket error:`, error.message);
      this.closeSession(session, "socket-error");
    });

    this.open(session);
    return session;
  }

  private open(session: ConnectionSession): void {
    session.state = "open";
    console.log(`[Broadcaster] Session ${session.id} open (${this.sessions.size} active)`);

    session.probeTimer = setInterval(() => {
      this.send(session, ping());
    }, this.heartbeatIntervalMs);
    this.resetHeartbeatTimeout(session);

    // Late joiners and reconnecting clients get server truth immediately.
    const current = this.currentSnapshot();
    if (current) {
      this.send(session, current);
    }
  }

  /**
   * The last broadcast with its position carried forward to now. Steady
   * playback is never rebroadcast, so the stored position can be far behind.
   */
  private currentSnapshot(): SnapshotMessage | null {
    const message = this.lastMessage;
    const last = this.lastBroadcast;
    if (!message || !last || !last.isPlaying) {
      return message;
    }
    const elapsedSeconds = Math.max(0, (this.now() - last.sampledAt) / 1000);
    return { ...message, position: last.positionSeconds + elapsedSeconds };
  }

  private resetHeartbeatTimeout(session: ConnectionSession): void {
    if (session.timeoutTimer) {
      clearTimeout(session.timeoutTimer);
    }
    session.timeoutTimer = setTimeout(() => {
      console.warn(`[Broadcaster] Session ${session.id} heartbeat timeout, closing connection`);
      this.closeSession(session, "heartbeat-timeout");
    }, this.heartbeatTimeoutMs);
  }

  private handleInbound(session: ConnectionSession, raw: string): void {
    if (session.state !== "open") {
      return;
    }

    // Any inbound traffic counts as liveness, even frames we cannot decode.
    session.lastHeartbeatAck = this.now();
    this.resetHeartbeatTimeout(session);

    const message = decodeClientMessage(raw);
    if (!message) {
      console.warn(`[Broadcaster] Session ${session.id} sent an unknown frame`);
      this.send(session, { v: PROTOCOL_VERSION, kind: "error", message: "Unknown message" });
      return;
    }

    if (message.kind === "ping") {
      this.send(session, pong());
    }
  }

  /**
   * Move a session to closed. Safe to call any number of times; only the first
   * call has an effect.
   */
  public closeSession(session: ConnectionSession, reason: CloseReason): void {
    if (session.state === "closed") {
      return;
    }

    const wasOpen = session.state === "open" || session.state === "closing";
    session.state = "closed";
    session.closeReason = reason;
    this.clearTimers(session);
    this.sessions.delete(session.id);

    if (reason === "heartbeat-timeout" || reason === "send-failed" || reason === "socket-error") {
      session.socket.terminate();
    } else if (reason !== "client-closed") {
      session.socket.close(GOING_AWAY, reason);
    }

    if (wasOpen) {
      console.log(`[Broadcaster] Session ${session.id} closed (${reason}, ${this.sessions.size} remaining)`);
    }
  }

  private clearTimers(session: ConnectionSession): void {
    if (session.probeTimer) {
      clearInterval(session.probeTimer);
      session.probeTimer = null;
    }
    if (session.timeoutTimer) {
      clearTimeout(session.timeoutTimer);
      session.timeoutTimer = null;
    }
  }

  private send(session: ConnectionSession, message: ServerMessage): void {
    if (session.state !== "open" && !(session.state === "closing" && message.kind === "close")) {
      return;
    }
    if (session.socket.readyState !== WebSocket.OPEN) {
      this.closeSession(session, "send-failed");
      return;
    }

    try {
      session.socket.send(encodeMessage(message), (error?: Error) => {
        if (error) {
          console.error(`[Broadcaster] Send to session ${session.id} failed:`, error.message);
          this.closeSession(session, "send-failed");
        }
      });
    } catch (error) {
      console.error(`[Broadcaster] Send to session ${session.id} failed:`, errorMessage(error));
      this.closeSession(session, "send-failed");
    }
  }

  /**
   * Take one sample from the position source and broadcast it if it differs
   * from what clients last received. A sample already in flight makes this a
   * no-op, as does a source error.
   */
  public async sampleOnce(): Promise<void> {
    if (this.sampling || this.shuttingDown) {
      return;
    }
    this.sampling = true;

    let reading: PlaybackReading;
    try {
      reading = await this.source.sample();
    } catch (error) {
      const message = errorMessage(error);
      // Logged once per outage; an unauthenticated source fails every cycle.
      if (message !== this.sourceError) {
        console.warn("[Broadcaster] Position source unavailable, skipping cycles:", message);
        this.sourceError = message;
      }
      return;
    } finally {
      this.sampling = false;
    }

    if (this.sourceError !== null) {
      console.log("[Broadcaster] Position source available again");
      this.sourceError = null;
    }

    if (this.shuttingDown || !this.hasChanged(reading)) {
      return;
    }

    const previousTrackId = this.lastBroadcast?.trackId ?? null;
    const state: BroadcastState = isNotPlaying(reading)
      ? { trackId: null, positionSeconds: 0, isPlaying: false, sampledAt: this.now() }
      : {
          trackId: reading.trackId,
          positionSeconds: reading.positionSeconds,
          isPlaying: reading.isPlaying,
          sampledAt: reading.sampledAt,
        };

    this.broadcast(state);

    if (this.onTrackChange && state.trackId !== previousTrackId) {
      this.onTrackChange(isNotPlaying(reading) ? null : reading.track);
    }
  }

  /**
   * External change notification (e.g. a player webhook): sample right away
   */
  public notifyChange(): Promise<void> {
    return this.sampleOnce();
  }

  private hasChanged(reading: PlaybackReading): boolean {
    const last = this.lastBroadcast;

    if (isNotPlaying(reading)) {
      return last === null || last.trackId !== null || last.isPlaying;
    }
    if (!last || reading.trackId !== last.trackId || reading.isPlaying !== last.isPlaying) {
      return true;
    }

    const elapsedSeconds = (reading.sampledAt - last.sampledAt) / 1000;
    const expected = last.isPlaying ? last.positionSeconds + elapsedSeconds : last.positionSeconds;
    return Math.abs(reading.positionSeconds - expected) > this.driftThresholdSeconds;
  }

  private broadcast(state: BroadcastState): void {
    this.seq++;
    const message: SnapshotMessage = {
      v: PROTOCOL_VERSION,
      kind: "snapshot",
      seq: this.seq,
      track_id: state.trackId,
      position: state.positionSeconds,
      is_playing: state.isPlaying,
    };

    this.lastBroadcast = state;
    this.lastMessage = message;

    // Copy first: a failed send removes its session from the map.
    const targets = Array.from(this.sessions.values());
    for (const session of targets) {
      this.send(session, message);
    }

    console.log(
      `[Broadcaster] Snapshot #${message.seq} (${state.trackId ?? "idle"} @ ${state.positionSeconds.toFixed(1)}s, ` +
        `${state.isPlaying ? "playing" : "paused"}) sent to ${targets.length} session(s)`
    );
  }

  /**
   * Stop sampling, tell every session the server is going away, and wait up to
   * graceMs for the sockets to close before terminating the rest.
   */
  public async close(graceMs = 2000): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;

    if (this.sampleInterval) {
      clearInterval(this.sampleInterval);
      this.sampleInterval = null;
    }

    const draining = Array.from(this.sessions.values());
    const closed = draining.map(
      (session) =>
        new Promise<void>((resolve) => {
          session.socket.on("close", () => resolve());
        })
    );

    for (const session of draining) {
      this.clearTimers(session);
      session.state = "closing";
      this.send(session, { v: PROTOCOL_VERSION, kind: "close", reason: "server-shutdown" });
      session.socket.close(GOING_AWAY, "server-shutdown");
    }

    if (draining.length > 0) {
      let graceTimer: NodeJS.Timeout | undefined;
      const grace = new Promise<void>((resolve) => {
        graceTimer = setTimeout(resolve, graceMs);
      });
      await Promise.race([Promise.all(closed), grace]);
      clearTimeout(graceTimer);
    }

    for (const session of draining) {
      if (session.state !== "closed") {
        console.warn(`[Broadcaster] Session ${session.id} did not close within ${graceMs}ms, terminating`);
        this.closeSession(session, "server-shutdown");
        session.socket.terminate();
      }
    }

    if (this.wss) {
      const wss = this.wss;
      this.wss = null;
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    console.log("[Broadcaster] Shut down");
  }

  public getSessionCount(): number {
    return this.sessions.size;
  }

  public getLastSnapshot(): SnapshotMessage | null {
    return this.lastMessage;
  }
}
