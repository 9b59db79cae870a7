import axios, { AxiosInstance, isAxiosError } from "axios";
import { parseLrc } from "./lrc";
import { LyricLookup, TimedText } from "./types";
import { errorMessage } from "./errors";

interface LrcLibRecord {
  id: number;
  trackName: string;
  artistName: string;
  instrumental: boolean;
  syncedLyrics: string | null;
}

/**
 * Synced-lyrics lookup against the public LRCLIB API
 */
export class LrcLibClient implements LyricLookup {
  private apiClient: AxiosInstance;

  constructor(apiClient?: AxiosInstance) {
    this.apiClient =
      apiClient ??
      axios.create({
        baseURL: "https://lrclib.net/api",
        timeout: 10000,
        headers: {
          "User-Agent": "synced-lyrics-relay/0.1.0",
        },
      });
  }

  public async fetchLyrics(
    trackId: string,
    title: string,
    artist: string,
    signal?: AbortSignal
  ): Promise<TimedText[] | null> {
    const exact = await this.getExact(title, artist, signal);
    const lrc = exact ?? (await this.search(title, artist, signal));

    if (!lrc) {
      console.log(`[LrcLib] No synced lyrics for "${title}" by ${artist} (${trackId})`);
      return null;
    }

    const lines = parseLrc(lrc);
    return lines.length > 0 ? lines : null;
  }

  private async getExact(title: string, artist: string, signal?: AbortSignal): Promise<string | null> {
    try {
      const response = await this.apiClient.get<LrcLibRecord>("/get", {
        params: { track_name: title, artist_name: artist },
        signal,
      });
      return response.data.syncedLyrics;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return null;
      }
      console.error("[LrcLib] Lookup failed:", errorMessage(error));
      throw error;
    }
  }

  private async search(title: string, artist: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.apiClient.get<LrcLibRecord[]>("/search", {
      params: { track_name: title, artist_name: artist },
      signal,
    });
    const match = response.data.find((record) => !record.instrumental && record.syncedLyrics);
    return match?.syncedLyrics ?? null;
  }
}
