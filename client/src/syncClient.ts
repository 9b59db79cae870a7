import { SnapshotMessage, decodeServerMessage, encodeMessage, ping, pong } from "../../shared/protocol";
import { ClientSocket, ConnectionState, SocketFactory } from "./types";

export interface SyncClientOptions {
  url: string;
  socketFactory: SocketFactory;
  onSnapshot: (snapshot: SnapshotMessage) => void;
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  heartbeatIntervalMs?: number;
  /** Silence from the server longer than this drops the connection */
  serverTimeoutMs?: number;
  initialReconnectDelayMs?: number;
  maxReconnectAttempts?: number;
}

/**
 * Client end of the `/ws` channel: keeps one connection open, answers and
 * sends liveness probes, and reconnects with exponential backoff when the
 * channel drops.
 */
export class SyncClient {
  private readonly url: string;
  private readonly socketFactory: SocketFactory;
  private readonly onSnapshot: (snapshot: SnapshotMessage) => void;
  private readonly onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  private readonly heartbeatIntervalMs: number;
  private readonly serverTimeoutMs: number;
  private readonly initialReconnectDelayMs: number;
  private readonly maxReconnectAttempts: number;

  private state: ConnectionState = "idle";
  private socket: ClientSocket | null = null;
  private reconnectAttempts = 0;
  private reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private heartbeatIntervalId: ReturnType<typeof setInterval> | null = null;
  private serverTimeoutId: ReturnType<typeof setTimeout> | null = null;

  constructor(options: SyncClientOptions) {
    this.url = options.url;
    this.socketFactory = options.socketFactory;
    this.onSnapshot = options.onSnapshot;
    this.onStateChange = options.onStateChange;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
    this.serverTimeoutMs = options.serverTimeoutMs ?? 70000;
    this.initialReconnectDelayMs = options.initialReconnectDelayMs ?? 1000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 10;
  }

  public getState(): ConnectionState {
    return this.state;
  }

  public connect(): void {
    if (this.state === "connecting" || this.state === "open") {
      return;
    }
    this.cancelReconnect();
    this.reconnectAttempts = 0;
    this.openSocket();
  }

  /**
   * Close the channel for good: no reconnect, no more callbacks
   */
  public close(): void {
    if (this.state === "closed") {
      return;
    }
    this.cancelReconnect();
    this.stopHeartbeat();
    this.setState("closed");

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.close(1000, "client-closed");
    }
  }

  private openSocket(): void {
    this.setState("connecting");
    console.log("[SyncClient] Connecting to", this.url);

    const socket: ClientSocket = this.socketFactory(this.url, {
      onOpen: () => {
        if (this.socket === socket) {
          this.handleOpen();
        }
      },
      onMessage: (data) => {
        if (this.socket === socket) {
          this.handleMessage(data);
        }
      },
      onClose: (code, reason) => {
        if (this.socket === socket) {
          this.handleClose(code, reason);
        }
      },
      onError: (error) => {
        if (this.socket === socket) {
          console.error("[SyncClient] Channel error:", error);
        }
      },
    });
    this.socket = socket;
  }

  private handleOpen(): void {
    console.log("[SyncClient] Connected");
    this.reconnectAttempts = 0;
    this.setState("open");

    this.stopHeartbeat();
    this.heartbeatIntervalId = setInterval(() => {
      this.send(encodeMessage(ping()));
    }, this.heartbeatIntervalMs);
    this.resetServerTimeout();
  }

  private handleMessage(data: string): void {
    this.resetServerTimeout();

    const message = decodeServerMessage(data);
    if (!message) {
      console.warn("[SyncClient] Ignoring unknown frame");
      return;
    }

    switch (message.kind) {
      case "snapshot":
        this.onSnapshot(message);
        break;
      case "ping":
        this.send(encodeMessage(pong()));
        break;
      case "pong":
        break;
      case "close":
        console.log("[SyncClient] Server is closing the channel:", message.reason);
        break;
      case "error":
        console.error("[SyncClient] Server error:", message.message);
        break;
    }
  }

  private handleClose(code: number, reason: string): void {
    console.log(`[SyncClient] Channel closed (${code}${reason ? `: ${reason}` : ""})`);
    this.socket = null;
    this.stopHeartbeat();

    if (this.state === "closed") {
      return;
    }

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error("[SyncClient] Max reconnection attempts reached");
      this.setState("closed");
      return;
    }

    const delay = this.initialReconnectDelayMs * Math.pow(2, this.reconnectAttempts);
    this.reconnectAttempts++;
    console.log(`[SyncClient] Connection lost, reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);
    this.setState("reconnecting");
    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = null;
      this.openSocket();
    }, delay);
  }

  private resetServerTimeout(): void {
    if (this.serverTimeoutId) {
      clearTimeout(this.serverTimeoutId);
    }
    this.serverTimeoutId = setTimeout(() => {
      this.serverTimeoutId = null;
      const socket = this.socket;
      if (!socket) {
        return;
      }
      console.warn("[SyncClient] No traffic from server, dropping connection");
      // Treat as a drop right away; the socket's own close event is ignored.
      this.socket = null;
      socket.close(4000, "server-timeout");
      this.handleClose(4000, "server-timeout");
    }, this.serverTimeoutMs);
  }

  private send(data: string): void {
    if (this.state !== "open" || !this.socket) {
      return;
    }
    try {
      this.socket.send(data);
    } catch (error) {
      console.error("[SyncClient] Send failed:", error);
    }
  }

  private stopHeartbeat(): void {
    if (this.heartbeatIntervalId) {
      clearInterval(this.heartbeatIntervalId);
      this.heartbeatIntervalId = null;
    }
    if (this.serverTimeoutId) {
      clearTimeout(this.serverTimeoutId);
      this.serverTimeoutId = null;
    }
  }

  private cancelReconnect(): void {
    if (this.reconnectTimeoutId !== null) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }
  }

  private setState(next: ConnectionState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.onStateChange?.(next, previous);
  }
}
