import { describe, it, expect, vi, beforeEach } from "vitest";
import express from "express";
import request from "supertest";
import { createRoutes, PlayerAccount } from "./routes";
import { LyricsService } from "./lyricsService";
import { PreferenceStore } from "./preferences";
import { SnapshotMessage } from "../../shared/protocol";
import { EngineOptions, TimedText, TokenInfo, TrackInfo, TranslationEngine } from "./types";

// --- Test helpers ---

const TRACK: TrackInfo = { trackId: "track-1", title: "abc", artist: "Some Band" };

function makeSpotify() {
  return {
    getAuthUrl: vi.fn((state: string) => `https://accounts.spotify.com/authorize?state=${state}`),
    handleCallback: vi.fn(
      async (_code: string, _state: string): Promise<TokenInfo> => ({
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiresAt: 0,
      })
    ),
    getCurrentTrack: vi.fn(async (): Promise<TrackInfo | null> => TRACK),
    hasTokens: vi.fn(() => true),
  } satisfies PlayerAccount;
}

function makeEngine(): TranslationEngine {
  return {
    translateLines: async (lines: string[], language: string, _options: EngineOptions) =>
      lines.map((line) => `${language}:${line}`),
    translateText: async (text: string, language: string) => `${language}:${text}`,
    phonetics: async (lines: string[]) => lines.map((line) => `/${line}/`),
    detectLanguage: async () => ["English"],
  };
}

function makeApp() {
  const spotify = makeSpotify();
  const fetchLyrics = vi.fn(
    async (): Promise<TimedText[] | null> => [{ timestamp: "[00:01.00]", timeSeconds: 1, text: "hello" }]
  );
  const lyrics = new LyricsService({ lookup: { fetchLyrics }, engine: makeEngine() });
  const preferences = new PreferenceStore();
  const lastSnapshot: SnapshotMessage = {
    v: 1,
    kind: "snapshot",
    seq: 4,
    track_id: "track-1",
    position: 12,
    is_playing: true,
  };
  const broadcaster = { getSessionCount: () => 2, getLastSnapshot: () => lastSnapshot };

  const app = express();
  app.use(express.json());
  app.use("/", createRoutes({ spotify, lyrics, preferences, broadcaster }));
  return { app, spotify, fetchLyrics, preferences };
}

// --- Tests ---

describe("routes", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  describe("auth", () => {
    it("redirects to the authorization page with a fresh state", async () => {
      const { app, spotify } = makeApp();

      const res = await request(app).get("/auth/spotify/login");

      expect(res.status).toBe(302);
      const state = spotify.getAuthUrl.mock.calls[0][0];
      expect(res.headers.location).toBe(`https://accounts.spotify.com/authorize?state=${state}`);
    });

    it("escapes the provider error on the callback page", async () => {
      const { app } = makeApp();

      const res = await request(app).get("/auth/spotify/callback").query({ error: "<script>" });

      expect(res.status).toBe(400);
      expect(res.text).toContain("<p>Error: &#60;script&#62;</p>");
    });

    it("rejects a callback without code or state", async () => {
      const { app } = makeApp();

      const res = await request(app).get("/auth/spotify/callback").query({ code: "auth-code" });

      expect(res.status).toBe(400);
      expect(res.text).toContain("Missing code or state parameter.");
    });

    it("exchanges the code", async () => {
      const { app, spotify } = makeApp();

      const res = await request(app).get("/auth/spotify/callback").query({ code: "auth-code", state: "state-1" });

      expect(res.status).toBe(200);
      expect(spotify.handleCallback).toHaveBeenCalledWith("auth-code", "state-1");
    });
  });

  describe("GET /api/lyrics", () => {
    it("requires authentication", async () => {
      const { app, spotify } = makeApp();
      spotify.hasTokens.mockReturnValue(false);

      const res = await request(app).get("/api/lyrics");

      expect(res.status).toBe(401);
      expect(res.body.error).toBe("Not authenticated");
    });

    it("reports when nothing is playing", async () => {
      const { app, spotify } = makeApp();
      spotify.getCurrentTrack.mockResolvedValue(null);

      const res = await request(app).get("/api/lyrics");

      expect(res.status).toBe(200);
      expect(res.body.status).toBe("no_song");
    });

    it("returns translated lines for the current track", async () => {
      const { app } = makeApp();

      const res = await request(app).get("/api/lyrics").query({ languages: "fr,xx", phonetics: "1" });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: "ok",
        song: TRACK,
        translatedTitles: { fr: "French:abc" },
        lines: [
          {
            timestamp: "[00:01.00]",
            timeSeconds: 1,
            originalText: "hello",
            phonetics: "/hello/",
            translations: { fr: "French:hello" },
          },
        ],
      });
    });

    it("refuses lyrics for a track that is no longer playing", async () => {
      const { app, fetchLyrics } = makeApp();

      const res = await request(app).get("/api/lyrics").query({ trackId: "track-0" });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        error: "Track changed",
        message: "Track track-0 is no longer playing",
        song: TRACK,
      });
      expect(fetchLyrics).not.toHaveBeenCalled();
    });

    it("serves lyrics when the requested track is playing", async () => {
      const { app } = makeApp();

      const res = await request(app).get("/api/lyrics").query({ trackId: "track-1" });

      expect(res.status).toBe(200);
      expect(res.body.status).toBe("ok");
    });

    it("reports songs without synced lyrics", async () => {
      const { app, fetchLyrics } = makeApp();
      fetchLyrics.mockResolvedValue(null);

      const res = await request(app).get("/api/lyrics");

      expect(res.status).toBe(200);
      expect(res.body.status).toBe("not_found");
      expect(res.body.song).toEqual(TRACK);
    });

    it("maps provider failures to 502", async () => {
      const { app, fetchLyrics } = makeApp();
      fetchLyrics.mockRejectedValue(new Error("provider down"));

      const res = await request(app).get("/api/lyrics");

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ error: "Failed to fetch lyrics", message: "provider down" });
    });
  });

  describe("POST /api/translate", () => {
    it("needs languages from the body or saved preferences", async () => {
      const { app } = makeApp();

      const res = await request(app).post("/api/translate").send({});

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("No languages selected");
    });

    it("falls back to saved languages", async () => {
      const { app, preferences } = makeApp();
      preferences.setLanguages(["es"]);

      const res = await request(app).post("/api/translate").send({});

      expect(res.status).toBe(200);
      expect(res.body.lines[0].translations).toEqual({ es: "Spanish:hello" });
    });

    it("returns 404 when the song has no lyrics", async () => {
      const { app, fetchLyrics } = makeApp();
      fetchLyrics.mockResolvedValue(null);

      const res = await request(app).post("/api/translate").send({ languages: ["fr"] });

      expect(res.status).toBe(404);
    });
  });

  describe("preferences", () => {
    it("saves known languages", async () => {
      const { app } = makeApp();

      const saved = await request(app).post("/api/preferences").send({ languages: ["fr", "xx"] });
      const read = await request(app).get("/api/preferences");

      expect(saved.body.preferences.languages).toEqual(["fr"]);
      expect(saved.body.languages[0].code).toBe("fr");
      expect(read.body).toEqual({ languages: ["fr"], translationProfile: "gemini-2.5-flash_no_thinking" });
    });

    it("validates the profile body", async () => {
      const { app, preferences } = makeApp();

      expect((await request(app).post("/api/preferences/profile").send({ profile: 3 })).status).toBe(400);
      expect((await request(app).post("/api/preferences/profile").send({ profile: "gemini-2.5-pro_default" })).status).toBe(
        204
      );
      expect(preferences.get().translationProfile).toBe("gemini-2.5-pro_default");
    });
  });

  describe("POST /api/cache/invalidate", () => {
    it("drops every artifact of a song", async () => {
      const { app, fetchLyrics } = makeApp();
      await request(app).get("/api/lyrics").query({ languages: "fr" });

      const res = await request(app).post("/api/cache/invalidate").send({ title: "abc", artist: "Some Band" });
      await request(app).get("/api/lyrics").query({ languages: "fr" });

      expect(res.body).toEqual({ removed: 3 });
      expect(fetchLyrics).toHaveBeenCalledTimes(2);
    });

    it("drops a single key", async () => {
      const { app } = makeApp();
      await request(app).get("/api/lyrics");

      const res = await request(app).post("/api/cache/invalidate").send({ key: "abc|some band::lyrics" });

      expect(res.body).toEqual({ removed: 1 });
    });

    it("rejects an empty body", async () => {
      const { app } = makeApp();

      const res = await request(app).post("/api/cache/invalidate").send({});

      expect(res.status).toBe(400);
    });
  });

  it("reports health", async () => {
    const { app } = makeApp();

    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "ok",
      sessions: 2,
      lastSnapshot: { seq: 4, track_id: "track-1", position: 12 },
      cache: { lyrics: { size: 0 } },
    });
  });
});
