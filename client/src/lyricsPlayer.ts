import { SnapshotMessage, isRecord } from "../../shared/protocol";
import { PredictiveRenderer } from "./renderer";
import { SyncClient } from "./syncClient";
import { Clock, ConnectionState, FrameScheduler, LyricLine, LyricsPayload, SocketFactory } from "./types";

export type LyricsFetcher = (trackId: string) => Promise<LyricsPayload>;

export interface LyricsPlayerOptions {
  url: string;
  socketFactory: SocketFactory;
  scheduler: FrameScheduler;
  clock: Clock;
  fetchLyrics: LyricsFetcher;
  onLines?: (lines: readonly LyricLine[], payload: LyricsPayload | null) => void;
  onActiveLineChange?: (index: number, line: LyricLine | null) => void;
  onConnectionChange?: (state: ConnectionState) => void;
  onFrame?: (positionSeconds: number) => void;
}

/**
 * Glue between the sync channel, the renderer and the lyrics API: applies
 * every snapshot, loads lyrics when the track changes and reports which line
 * is active.
 */
export class LyricsPlayer {
  private readonly client: SyncClient;
  private readonly renderer: PredictiveRenderer;
  private readonly fetchLyrics: LyricsFetcher;
  private readonly onLines?: (lines: readonly LyricLine[], payload: LyricsPayload | null) => void;

  private lines: LyricLine[] = [];
  private currentTrackId: string | null = null;
  private trackSeen = false;
  private loadToken = 0;

  constructor(options: LyricsPlayerOptions) {
    this.fetchLyrics = options.fetchLyrics;
    this.onLines = options.onLines;

    this.renderer = new PredictiveRenderer({
      scheduler: options.scheduler,
      clock: options.clock,
      onFrame: options.onFrame,
      onActiveLineChange: (index) => {
        options.onActiveLineChange?.(index, index >= 0 ? this.lines[index] : null);
      },
    });

    this.client = new SyncClient({
      url: options.url,
      socketFactory: options.socketFactory,
      onSnapshot: (snapshot) => this.handleSnapshot(snapshot),
      onStateChange: (state) => {
        if (state === "open") {
          // The server may have restarted and begun counting again.
          this.renderer.resetSequence();
        }
        options.onConnectionChange?.(state);
      },
    });
  }

  public start(): void {
    this.renderer.start();
    this.client.connect();
  }

  public destroy(): void {
    this.renderer.stop();
    this.client.close();
    this.loadToken++;
  }

  public getRenderer(): PredictiveRenderer {
    return this.renderer;
  }

  public getCurrentTrackId(): string | null {
    return this.currentTrackId;
  }

  public getLines(): readonly LyricLine[] {
    return this.lines;
  }

  private handleSnapshot(snapshot: SnapshotMessage): void {
    const applied = this.renderer.applySnapshot({
      seq: snapshot.seq,
      position: snapshot.position,
      isPlaying: snapshot.is_playing,
    });
    if (!applied) {
      return;
    }

    if (!this.trackSeen || snapshot.track_id !== this.currentTrackId) {
      this.trackSeen = true;
      this.currentTrackId = snapshot.track_id;
      void this.loadLines(snapshot.track_id);
    }
  }

  private async loadLines(trackId: string | null): Promise<void> {
    const token = ++this.loadToken;

    if (trackId === null) {
      this.showLines([], null);
      return;
    }

    // Drop the previous song's lines while the new ones load.
    this.showLines([], null);

    let payload: LyricsPayload;
    try {
      payload = await this.fetchLyrics(trackId);
    } catch (error) {
      if (token === this.loadToken) {
        console.error("[LyricsPlayer] Failed to load lyrics:", error);
      }
      return;
    }

    if (token !== this.loadToken) {
      return;
    }
    this.showLines(payload.status === "ok" ? payload.lines : [], payload);
  }

  private showLines(lines: LyricLine[], payload: LyricsPayload | null): void {
    this.lines = lines;
    this.renderer.setLines(lines);
    this.onLines?.(lines, payload);
  }
}

function isLyricLine(value: unknown): value is LyricLine {
  return (
    isRecord(value) &&
    typeof value.timeSeconds === "number" &&
    typeof value.timestamp === "string" &&
    typeof value.originalText === "string" &&
    isRecord(value.translations) &&
    (value.phonetics === undefined || typeof value.phonetics === "string")
  );
}

function isSongInfo(value: unknown): value is { trackId: string; title: string; artist: string } {
  return (
    isRecord(value) &&
    typeof value.trackId === "string" &&
    typeof value.title === "string" &&
    typeof value.artist === "string"
  );
}

function toStringRecord(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === "string") {
        result[key] = entry;
      }
    }
  }
  return result;
}

/**
 * Validate a `/api/lyrics` response body
 */
export function parseLyricsPayload(body: unknown): LyricsPayload | null {
  if (!isRecord(body)) {
    return null;
  }
  if (body.status === "no_song") {
    return { status: "no_song" };
  }
  if (!isSongInfo(body.song)) {
    return null;
  }
  if (body.status === "not_found") {
    return { status: "not_found", song: body.song };
  }
  if (body.status === "ok" && Array.isArray(body.lines)) {
    const lines = body.lines.filter(isLyricLine);
    if (lines.length !== body.lines.length) {
      return null;
    }
    return {
      status: "ok",
      song: body.song,
      lines: lines.map((line) => ({ ...line, translations: toStringRecord(line.translations) })),
      translatedTitles: toStringRecord(body.translatedTitles),
    };
  }
  return null;
}

/**
 * Fetcher for the relay's HTTP API. The server only answers for the track
 * that is playing now, so an answer for any other track is rejected.
 */
export function createHttpLyricsFetcher(baseUrl: string, languages: string[] = []): LyricsFetcher {
  return async (trackId) => {
    const url = new URL("/api/lyrics", baseUrl);
    url.searchParams.set("trackId", trackId);
    if (languages.length > 0) {
      url.searchParams.set("languages", languages.join(","));
    }

    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`Lyrics request failed: ${response.status} ${response.statusText}`);
    }

    const payload = parseLyricsPayload(await response.json());
    if (!payload) {
      throw new Error("Malformed lyrics response");
    }
    if (payload.status !== "no_song" && payload.song.trackId !== trackId) {
      throw new Error(`Lyrics response is for ${payload.song.trackId}, expected ${trackId}`);
    }
    return payload;
  };
}
