import express from "express";
import { createServer } from "http";
import dotenv from "dotenv";
import { SyncBroadcaster } from "./websocket";
import { SpotifyClient } from "./spotify";
import { createRoutes } from "./routes";
import { loadConfig, Config } from "./config";
import { LyricsService } from "./lyricsService";
import { LrcLibClient } from "./lrclib";
import { GeminiTranslationEngine } from "./translation";
import { PreferenceStore } from "./preferences";
import { CHANNEL_PATH } from "../../shared/protocol";
import { errorMessage } from "./errors";

// Load environment variables
dotenv.config();

let config: Config;
try {
  config = loadConfig(process.env);
} catch (error) {
  console.error(errorMessage(error));
  process.exit(1);
}

// Initialize Express app
const app = express();
app.use(express.json());

// Create HTTP server
const server = createServer(app);

// Initialize Spotify client
const spotifyClient = new SpotifyClient(
  config.spotify.clientId,
  config.spotify.clientSecret,
  config.spotify.redirectUri
);

const lyricsService = new LyricsService({
  lookup: new LrcLibClient(),
  engine: new GeminiTranslationEngine(config.googleApiKey),
  cache: {
    maxEntries: config.cacheMaxEntries,
    failureTtlMs: config.cacheFailureTtlMs,
  },
  computeTimeoutMs: config.computeTimeoutMs,
});

const preferences = new PreferenceStore();

// Initialize position broadcaster
const broadcaster = new SyncBroadcaster({
  source: spotifyClient,
  sampleIntervalMs: config.sampleIntervalMs,
  heartbeatIntervalMs: config.heartbeatIntervalMs,
  heartbeatTimeoutMs: config.heartbeatTimeoutMs,
  driftThresholdSeconds: config.driftThresholdSeconds,
  onTrackChange: (track) => {
    console.log(track ? `[Server] Now playing "${track.title}" by ${track.artist}` : "[Server] Playback stopped");
  },
});
broadcaster.attach(server);

// Register routes
app.use("/", createRoutes({ spotify: spotifyClient, lyrics: lyricsService, preferences, broadcaster }));

// Start server
server.listen(config.port, () => {
  broadcaster.start();
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`WebSocket server ready on ws://localhost:${config.port}${CHANNEL_PATH}`);
  console.log(`Spotify OAuth redirect URI: ${config.spotify.redirectUri}`);
});

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`${signal} received, shutting down gracefully`);

  await broadcaster.close();
  server.close(() => {
    console.log("Server closed");
    process.exit(0);
  });
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
