import { Router, Request, Response } from "express";
import { randomUUID } from "crypto";
import { SpotifyClient } from "./spotify";
import { LyricsService } from "./lyricsService";
import { SyncBroadcaster } from "./websocket";
import { PreferenceStore, TRANSLATION_PROFILES, parseLanguageCodes } from "./preferences";
import { errorMessage, httpStatusFor } from "./errors";
import { TrackInfo } from "./types";

export type PlayerAccount = Pick<SpotifyClient, "getAuthUrl" | "handleCallback" | "getCurrentTrack" | "hasTokens">;

export interface RouteDeps {
  spotify: PlayerAccount;
  lyrics: LyricsService;
  preferences: PreferenceStore;
  broadcaster: Pick<SyncBroadcaster, "getSessionCount" | "getLastSnapshot">;
}

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => `&#${char.charCodeAt(0)};`);
}

function page(title: string, body: string): string {
  return `
        <html>
          <body>
            <h1>${escapeHtml(title)}</h1>
            <p>${escapeHtml(body)}</p>
            <p>You can close this tab.</p>
          </body>
        </html>
      `;
}

function sendError(res: Response, context: string, error: unknown): void {
  const status = httpStatusFor(error);
  console.error(`[Routes] ${context}:`, errorMessage(error));
  res.status(status).json({ error: context, message: errorMessage(error) });
}

function isTruthyFlag(value: unknown): boolean {
  return value === "1" || value === "true";
}

export function createRoutes({ spotify, lyrics, preferences, broadcaster }: RouteDeps): Router {
  const router = Router();

  /**
   * Resolve the track lyrics are requested for: the player's current track
   */
  async function currentTrack(res: Response): Promise<TrackInfo | null> {
    if (!spotify.hasTokens()) {
      res.status(401).json({
        error: "Not authenticated",
        message: "Please authenticate with Spotify first via /auth/spotify/login",
      });
      return null;
    }
    const track = await spotify.getCurrentTrack();
    if (!track) {
      res.json({ status: "no_song", message: "No song is currently playing on Spotify." });
      return null;
    }
    return track;
  }

  /**
   * GET /auth/spotify/login
   * Redirects to Spotify OAuth authorization page
   */
  router.get("/auth/spotify/login", (req: Request, res: Response) => {
    res.redirect(spotify.getAuthUrl(randomUUID()));
  });

  /**
   * GET /auth/spotify/callback
   * Handles OAuth callback from Spotify
   */
  router.get("/auth/spotify/callback", async (req: Request, res: Response) => {
    const { code, state, error } = req.query;

    if (typeof error === "string") {
      console.error("[OAuth Callback] Spotify returned an error:", error);
      res.status(400).send(page("Authorization Failed", `Error: ${error}`));
      return;
    }

    if (typeof code !== "string" || typeof state !== "string") {
      console.error("[OAuth Callback] Missing required parameters - code:", !!code, "state:", !!state);
      res.status(400).send(page("Invalid Request", "Missing code or state parameter."));
      return;
    }

    try {
      await spotify.handleCallback(code, state);
      console.log("[OAuth Callback] Successfully authenticated");
      res.send(page("Success!", "Spotify authentication successful."));
    } catch (callbackError) {
      console.error("[OAuth Callback] Error processing callback:", errorMessage(callbackError));
      res.status(500).send(page("Authentication Error", errorMessage(callbackError)));
    }
  });

  /**
   * GET /api/current-song
   * Track metadata without lyrics
   */
  router.get("/api/current-song", async (req: Request, res: Response) => {
    try {
      const track = await currentTrack(res);
      if (track) {
        res.json({ status: "ok", song: track });
      }
    } catch (error) {
      sendError(res, "Failed to read current song", error);
    }
  });

  /**
   * GET /api/lyrics?trackId=...&languages=es,fr&phonetics=1
   * Lyrics for the current track, translated into the requested languages.
   * A trackId that is no longer playing gets 409.
   */
  router.get("/api/lyrics", async (req: Request, res: Response) => {
    try {
      const track = await currentTrack(res);
      if (!track) {
        return;
      }

      const requested = req.query.trackId;
      if (typeof requested === "string" && requested !== "" && requested !== track.trackId) {
        res.status(409).json({
          error: "Track changed",
          message: `Track ${requested} is no longer playing`,
          song: track,
        });
        return;
      }

      const { key, profile } = preferences.getProfile();
      const result = await lyrics.getLyrics({
        track,
        languages: parseLanguageCodes(req.query.languages),
        phonetics: isTruthyFlag(req.query.phonetics),
        profileKey: key,
        profile,
      });

      if (result.status === "not_found") {
        res.json({
          status: "not_found",
          song: track,
          message: "No lyrics found for this song. Some songs may not have synchronized lyrics available.",
        });
        return;
      }
      res.json({ ...result, song: track });
    } catch (error) {
      sendError(res, "Failed to fetch lyrics", error);
    }
  });

  /**
   * POST /api/translate
   * Translate the current track, falling back to the saved languages
   */
  router.post("/api/translate", async (req: Request, res: Response) => {
    try {
      let languages = parseLanguageCodes(req.body?.languages);
      if (languages.length === 0) {
        languages = preferences.get().languages;
      }
      if (languages.length === 0) {
        res.status(400).json({
          error: "No languages selected",
          message: "Please select at least one language or save your preferences.",
        });
        return;
      }

      const track = await currentTrack(res);
      if (!track) {
        return;
      }

      const { key, profile } = preferences.getProfile();
      const result = await lyrics.getLyrics({ track, languages, profileKey: key, profile });
      if (result.status === "not_found") {
        res.status(404).json({ error: "No lyrics found", message: "Please get lyrics first." });
        return;
      }
      res.json({ ...result, song: track });
    } catch (error) {
      sendError(res, "Translation failed", error);
    }
  });

  router.get("/api/preferences", (req: Request, res: Response) => {
    res.json(preferences.get());
  });

  /**
   * POST /api/preferences
   * Save the languages to translate into by default
   */
  router.post("/api/preferences", (req: Request, res: Response) => {
    const saved = preferences.setLanguages(parseLanguageCodes(req.body?.languages));
    res.json({ preferences: saved, languages: preferences.sortedLanguages() });
  });

  router.post("/api/preferences/profile", (req: Request, res: Response) => {
    const profile = req.body?.profile;
    if (typeof profile !== "string") {
      res.status(400).json({ error: "profile must be a string" });
      return;
    }
    preferences.setProfile(profile);
    res.status(204).end();
  });

  router.get("/api/languages", (req: Request, res: Response) => {
    res.json({ languages: preferences.sortedLanguages(), selected: preferences.get().languages });
  });

  router.get("/api/profiles", (req: Request, res: Response) => {
    res.json({ profiles: TRANSLATION_PROFILES, selected: preferences.get().translationProfile });
  });

  /**
   * POST /api/cache/invalidate
   * Drop one cache key, or every artifact of one song, to force a refetch
   */
  router.post("/api/cache/invalidate", (req: Request, res: Response) => {
    const { key, title, artist } = req.body ?? {};

    if (typeof key === "string" && key) {
      res.json({ removed: lyrics.invalidate(key) ? 1 : 0 });
      return;
    }
    if (typeof title === "string" && typeof artist === "string" && title && artist) {
      res.json({ removed: lyrics.invalidateSong({ title, artist }) });
      return;
    }
    res.status(400).json({ error: "Provide either key, or title and artist" });
  });

  /**
   * GET /health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "ok",
      sessions: broadcaster.getSessionCount(),
      lastSnapshot: broadcaster.getLastSnapshot(),
      cache: lyrics.stats(),
    });
  });

  return router;
}
