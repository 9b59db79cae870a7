import { EventEmitter } from "events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ChannelSocket, SyncBroadcaster } from "./websocket";
import { NOT_PLAYING, PlaybackReading, TrackInfo, createSnapshot } from "./types";
import { SourceUnavailableError } from "./errors";

// --- Test helpers ---

class FakeSocket extends EventEmitter implements ChannelSocket {
  public readyState = 1;
  public send = vi.fn<(data: string, cb?: (err?: Error) => void) => void>();
  public close = vi.fn<(code?: number, reason?: string) => void>();
  public terminate = vi.fn<() => void>();

  sent(): unknown[] {
    return this.send.mock.calls.map(([data]) => JSON.parse(data));
  }

  receive(frame: string): void {
    this.emit("message", Buffer.from(frame));
  }
}

const SONG_A: TrackInfo = { trackId: "track-a", title: "First Song", artist: "Some Band" };
const SONG_B: TrackInfo = { trackId: "track-b", title: "Second Song", artist: "Other Band" };

function playing(track: TrackInfo, position: number, sampledAt: number, isPlaying = true): PlaybackReading {
  return createSnapshot(track, position, isPlaying, sampledAt);
}

function makeSource() {
  return { sample: vi.fn<() => Promise<PlaybackReading>>() };
}

function snapshotFrames(socket: FakeSocket): unknown[] {
  return socket.sent().filter((frame) => typeof frame === "object" && frame !== null && "seq" in frame);
}

// --- Tests ---

describe("SyncBroadcaster", () => {
  let source: ReturnType<typeof makeSource>;
  let broadcaster: SyncBroadcaster;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    source = makeSource();
    broadcaster = new SyncBroadcaster({
      source,
      heartbeatIntervalMs: 30000,
      heartbeatTimeoutMs: 35000,
      driftThresholdSeconds: 1,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("heartbeat", () => {
    it("probes every interval and closes a silent session exactly once", () => {
      const socket = new FakeSocket();
      const session = broadcaster.accept(socket);

      vi.advanceTimersByTime(30000);
      expect(socket.sent()).toEqual([{ v: 1, kind: "ping" }]);

      vi.advanceTimersByTime(5000);
      expect(socket.terminate).toHaveBeenCalledTimes(1);
      expect(session.state).toBe("closed");
      expect(session.closeReason).toBe("heartbeat-timeout");
      expect(broadcaster.getSessionCount()).toBe(0);

      vi.advanceTimersByTime(120000);
      expect(socket.terminate).toHaveBeenCalledTimes(1);
      expect(socket.send).toHaveBeenCalledTimes(1);
    });

    it("treats any inbound frame as liveness", () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      vi.advanceTimersByTime(34000);
      socket.receive('{"v":1,"kind":"pong"}');
      vi.advanceTimersByTime(34000);
      expect(socket.terminate).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1000);
      expect(socket.terminate).toHaveBeenCalledTimes(1);
    });

    it("answers a client ping with a pong", () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      socket.receive('{"v":1,"kind":"ping"}');

      expect(socket.sent()).toEqual([{ v: 1, kind: "pong" }]);
    });

    it("replies with an error frame to unknown messages", () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      socket.receive("hello");

      expect(socket.sent()).toEqual([{ v: 1, kind: "error", message: "Unknown message" }]);
      expect(broadcaster.getSessionCount()).toBe(1);
    });

    it("removes the session when the client closes", () => {
      const socket = new FakeSocket();
      const session = broadcaster.accept(socket);

      socket.emit("close");
      socket.emit("close");

      expect(session.closeReason).toBe("client-closed");
      expect(socket.close).not.toHaveBeenCalled();
      expect(broadcaster.getSessionCount()).toBe(0);
    });
  });

  describe("sampling", () => {
    it("broadcasts the first reading and skips readings that match extrapolation", async () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      source.sample.mockResolvedValueOnce(playing(SONG_A, 10, 0)).mockResolvedValueOnce(playing(SONG_A, 11.2, 1000));
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();

      expect(snapshotFrames(socket)).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 10, is_playing: true },
      ]);
    });

    it("broadcasts when the position drifts past the threshold", async () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      source.sample.mockResolvedValueOnce(playing(SONG_A, 10, 0)).mockResolvedValueOnce(playing(SONG_A, 30, 2000));
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();

      expect(snapshotFrames(socket)).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 10, is_playing: true },
        { v: 1, kind: "snapshot", seq: 2, track_id: "track-a", position: 30, is_playing: true },
      ]);
    });

    it("broadcasts pause and track changes and reports the new track", async () => {
      const onTrackChange = vi.fn();
      broadcaster = new SyncBroadcaster({ source, onTrackChange });
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      source.sample
        .mockResolvedValueOnce(playing(SONG_A, 10, 0))
        .mockResolvedValueOnce(playing(SONG_A, 10.5, 500, false))
        .mockResolvedValueOnce(playing(SONG_B, 0, 1000));
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();

      expect(snapshotFrames(socket)).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 10, is_playing: true },
        { v: 1, kind: "snapshot", seq: 2, track_id: "track-a", position: 10.5, is_playing: false },
        { v: 1, kind: "snapshot", seq: 3, track_id: "track-b", position: 0, is_playing: true },
      ]);
      expect(onTrackChange.mock.calls).toEqual([[SONG_A], [SONG_B]]);
    });

    it("broadcasts an idle snapshot once when playback stops", async () => {
      const onTrackChange = vi.fn();
      broadcaster = new SyncBroadcaster({ source, onTrackChange });
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      source.sample
        .mockResolvedValueOnce(playing(SONG_A, 10, 0))
        .mockResolvedValueOnce(NOT_PLAYING)
        .mockResolvedValueOnce(NOT_PLAYING);
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();

      expect(snapshotFrames(socket)).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 10, is_playing: true },
        { v: 1, kind: "snapshot", seq: 2, track_id: null, position: 0, is_playing: false },
      ]);
      expect(onTrackChange).toHaveBeenLastCalledWith(null);
    });

    it("skips a cycle when the source is unavailable", async () => {
      const socket = new FakeSocket();
      broadcaster.accept(socket);

      source.sample
        .mockRejectedValueOnce(new SourceUnavailableError("player offline"))
        .mockResolvedValueOnce(playing(SONG_A, 3, 0));
      await broadcaster.sampleOnce();
      expect(snapshotFrames(socket)).toEqual([]);

      await broadcaster.sampleOnce();
      expect(snapshotFrames(socket)).toHaveLength(1);
      expect(broadcaster.getLastSnapshot()?.seq).toBe(1);
    });

    it("sends the last snapshot to a session that joins later", async () => {
      broadcaster = new SyncBroadcaster({ source, now: () => 0 });
      source.sample.mockResolvedValueOnce(playing(SONG_A, 42, 0));
      await broadcaster.sampleOnce();

      const late = new FakeSocket();
      broadcaster.accept(late);

      expect(late.sent()).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 42, is_playing: true },
      ]);
    });

    it("carries the position forward for a session that joins during steady playback", async () => {
      let clock = 0;
      broadcaster = new SyncBroadcaster({ source, now: () => clock });
      const early = new FakeSocket();
      broadcaster.accept(early);

      source.sample.mockResolvedValueOnce(playing(SONG_A, 42, 0));
      await broadcaster.sampleOnce();
      for (let t = 1; t <= 30; t++) {
        source.sample.mockResolvedValueOnce(playing(SONG_A, 42 + t, t * 1000));
        await broadcaster.sampleOnce();
      }
      expect(snapshotFrames(early)).toHaveLength(1);

      clock = 30000;
      const late = new FakeSocket();
      broadcaster.accept(late);
      source.sample.mockResolvedValueOnce(playing(SONG_A, 73, 31000));
      await broadcaster.sampleOnce();

      expect(snapshotFrames(late)).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 72, is_playing: true },
      ]);
    });

    it("sends a paused position unchanged to a session that joins later", async () => {
      let clock = 0;
      broadcaster = new SyncBroadcaster({ source, now: () => clock });
      source.sample.mockResolvedValueOnce(playing(SONG_A, 10.5, 500, false));
      await broadcaster.sampleOnce();

      clock = 20000;
      const late = new FakeSocket();
      broadcaster.accept(late);

      expect(late.sent()).toEqual([
        { v: 1, kind: "snapshot", seq: 1, track_id: "track-a", position: 10.5, is_playing: false },
      ]);
    });

    it("warns once while the source keeps failing the same way", async () => {
      source.sample
        .mockRejectedValueOnce(new SourceUnavailableError("Not authenticated with Spotify"))
        .mockRejectedValueOnce(new SourceUnavailableError("Not authenticated with Spotify"))
        .mockRejectedValueOnce(new SourceUnavailableError("Not authenticated with Spotify"))
        .mockResolvedValueOnce(playing(SONG_A, 3, 0))
        .mockRejectedValueOnce(new SourceUnavailableError("Not authenticated with Spotify"));

      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();
      await broadcaster.sampleOnce();
      expect(console.warn).toHaveBeenCalledTimes(1);

      await broadcaster.sampleOnce();
      expect(console.log).toHaveBeenCalledWith("[Broadcaster] Position source available again");

      await broadcaster.sampleOnce();
      expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it("closes only the session whose send fails", async () => {
      const broken = new FakeSocket();
      broken.send.mockImplementation((_data, cb) => cb?.(new Error("broken pipe")));
      const healthy = new FakeSocket();
      const brokenSession = broadcaster.accept(broken);
      broadcaster.accept(healthy);

      source.sample.mockResolvedValueOnce(playing(SONG_A, 5, 0));
      await broadcaster.sampleOnce();

      expect(brokenSession.closeReason).toBe("send-failed");
      expect(broken.terminate).toHaveBeenCalledTimes(1);
      expect(snapshotFrames(healthy)).toHaveLength(1);
      expect(broadcaster.getSessionCount()).toBe(1);
    });

    it("closes a session whose socket is no longer open instead of sending", async () => {
      const stale = new FakeSocket();
      const session = broadcaster.accept(stale);
      stale.readyState = 3;

      source.sample.mockResolvedValueOnce(playing(SONG_A, 5, 0));
      await broadcaster.sampleOnce();

      expect(stale.send).not.toHaveBeenCalled();
      expect(session.closeReason).toBe("send-failed");
    });
  });

  describe("close", () => {
    it("tells every session the server is going away and terminates stragglers", async () => {
      const polite = new FakeSocket();
      polite.close.mockImplementation(() => {
        polite.emit("close");
      });
      const stubborn = new FakeSocket();
      broadcaster.accept(polite);
      broadcaster.accept(stubborn);

      const closing = broadcaster.close(100);
      await vi.advanceTimersByTimeAsync(100);
      await closing;

      const closeFrame = { v: 1, kind: "close", reason: "server-shutdown" };
      expect(polite.sent()).toEqual([closeFrame]);
      expect(stubborn.sent()).toEqual([closeFrame]);
      expect(polite.close).toHaveBeenCalledWith(1001, "server-shutdown");
      expect(polite.terminate).not.toHaveBeenCalled();
      expect(stubborn.terminate).toHaveBeenCalledTimes(1);
      expect(broadcaster.getSessionCount()).toBe(0);
    });

    it("refuses new connections and stops sampling once shut down", async () => {
      await broadcaster.close();

      const socket = new FakeSocket();
      const session = broadcaster.accept(socket);
      await broadcaster.sampleOnce();

      expect(session.state).toBe("closed");
      expect(socket.close).toHaveBeenCalledWith(1001, "server-shutdown");
      expect(source.sample).not.toHaveBeenCalled();
    });
  });
});
