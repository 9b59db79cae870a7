import dotenv from "dotenv";
import { CHANNEL_PATH } from "../../shared/protocol";
import { LyricsPlayer, createHttpLyricsFetcher } from "./lyricsPlayer";
import { createTimerScheduler, performanceClock, wsSocketFactory } from "./nodeHost";
import { LyricLine } from "./types";

// Terminal viewer: prints each lyric line as it becomes active.

dotenv.config();

const baseUrl = process.env.RELAY_URL ?? `http://localhost:${process.env.PORT ?? "3000"}`;
const languages = (process.env.VIEWER_LANGUAGES ?? "")
  .split(",")
  .map((code) => code.trim())
  .filter(Boolean);

const wsUrl = new URL(CHANNEL_PATH, baseUrl);
wsUrl.protocol = wsUrl.protocol === "https:" ? "wss:" : "ws:";

function formatLine(line: LyricLine): string {
  const parts = [`${line.timestamp} ${line.originalText}`];
  if (line.phonetics) {
    parts.push(`    ${line.phonetics}`);
  }
  for (const code of languages) {
    const translated = line.translations[code];
    if (translated) {
      parts.push(`    [${code}] ${translated}`);
    }
  }
  return parts.join("\n");
}

const player = new LyricsPlayer({
  url: wsUrl.toString(),
  socketFactory: wsSocketFactory,
  scheduler: createTimerScheduler(),
  clock: performanceClock,
  fetchLyrics: createHttpLyricsFetcher(baseUrl, languages),
  onLines: (lines, payload) => {
    if (!payload) {
      return;
    }
    if (payload.status === "ok") {
      console.log(`\n♪ ${payload.song.title} - ${payload.song.artist} (${lines.length} lines)\n`);
    } else if (payload.status === "not_found") {
      console.log(`\n♪ ${payload.song.title} - ${payload.song.artist}: no synced lyrics\n`);
    }
  },
  onActiveLineChange: (_index, line) => {
    if (line) {
      console.log(formatLine(line));
    }
  },
  onConnectionChange: (state) => {
    console.log(`[Viewer] ${state}`);
    if (state === "closed") {
      player.destroy();
    }
  },
});

player.start();

const stop = (): void => {
  player.destroy();
  process.exit(0);
};
process.on("SIGINT", stop);
process.on("SIGTERM", stop);
