/**
 * Monotonic time source in milliseconds (performance.now() in browsers)
 */
export interface Clock {
  now(): number;
}

/**
 * Display-refresh scheduling (requestAnimationFrame/cancelAnimationFrame in
 * browsers)
 */
export interface FrameScheduler {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

/**
 * Extrapolation anchor. Replaced as a whole on every applied snapshot.
 */
export type ClientSyncState = Readonly<{
  lastServerPosition: number; // seconds
  isPlaying: boolean;
  lastClientSyncInstant: number; // Clock.now() when the snapshot was applied
}>;

export interface PositionUpdate {
  seq?: number;
  position: number;
  isPlaying: boolean;
}

export interface TimedLine {
  timeSeconds: number;
}

export interface LyricLine extends TimedLine {
  timestamp: string;
  originalText: string;
  phonetics?: string;
  translations: Record<string, string>;
}

export interface SongInfo {
  trackId: string;
  title: string;
  artist: string;
}

export type LyricsPayload =
  | { status: "ok"; song: SongInfo; lines: LyricLine[]; translatedTitles: Record<string, string> }
  | { status: "not_found"; song: SongInfo }
  | { status: "no_song" };

export type ConnectionState = "idle" | "connecting" | "open" | "reconnecting" | "closed";

/**
 * Callbacks a socket adapter forwards channel events to
 */
export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: unknown): void;
}

export interface ClientSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => ClientSocket;
