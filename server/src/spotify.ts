import axios, { AxiosInstance, AxiosResponse, isAxiosError } from "axios";
import { performance } from "perf_hooks";
import { SourceUnavailableError, errorMessage } from "./errors";
import { NOT_PLAYING, PlaybackReading, PositionSource, TokenInfo, TrackInfo, createSnapshot, isNotPlaying } from "./types";

/** Subset of the `GET /me/player` response we read */
interface SpotifyPlaybackResponse {
  is_playing: boolean;
  progress_ms: number | null;
  currently_playing_type?: string;
  item: {
    id: string;
    name: string;
    artists: Array<{ name: string }>;
  } | null;
}

interface SpotifyTokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in: number;
}

function describeAxiosError(error: unknown): unknown {
  return isAxiosError(error) ? error.response?.data ?? error.message : errorMessage(error);
}

/**
 * Spotify API client and OAuth handler for the single listener this server
 * serves. Doubles as the PositionSource the broadcaster samples.
 */
export class SpotifyClient implements PositionSource {
  private clientId: string;
  private clientSecret: string;
  private redirectUri: string;
  private tokenInfo: TokenInfo | null = null;
  private pendingState: string | null = null;
  private apiClient: AxiosInstance;
  private lastTrack: TrackInfo | null = null;

  constructor(clientId: string, clientSecret: string, redirectUri: string, apiClient?: AxiosInstance) {
    this.clientId = clientId;
    this.clientSecret = clientSecret;
    this.redirectUri = redirectUri;

    this.apiClient =
      apiClient ??
      axios.create({
        baseURL: "https://api.spotify.com/v1",
        timeout: 5000,
        headers: {
          "Content-Type": "application/json",
        },
      });
  }

  /**
   * Generate Spotify authorization URL for OAuth flow
   */
  public getAuthUrl(state: string): string {
    this.pendingState = state;
    const params = new URLSearchParams({
      client_id: this.clientId,
      response_type: "code",
      redirect_uri: this.redirectUri,
      scope: "user-read-currently-playing user-read-playback-state",
      state,
    });

    return `https://accounts.spotify.com/authorize?${params.toString()}`;
  }

  /**
   * Exchange authorization code for access and refresh tokens
   */
  public async handleCallback(code: string, state: string): Promise<TokenInfo> {
    if (this.pendingState === null || state !== this.pendingState) {
      throw new Error("OAuth state mismatch. Start the login again.");
    }
    this.pendingState = null;

    try {
      const response = await axios.post<SpotifyTokenResponse>(
        "https://accounts.spotify.com/api/token",
        new URLSearchParams({
          grant_type: "authorization_code",
          code: code,
          redirect_uri: this.redirectUri,
        }),
        { headers: this.tokenHeaders() }
      );

      const refreshToken = response.data.refresh_token;
      if (!refreshToken) {
        throw new Error("Spotify did not return a refresh token");
      }

      this.tokenInfo = {
        accessToken: response.data.access_token,
        refreshToken,
        expiresAt: Date.now() + response.data.expires_in * 1000,
      };
      console.log("[Spotify] Tokens stored");

      return this.tokenInfo;
    } catch (error) {
      console.error("[Spotify] Error exchanging code for tokens:", describeAxiosError(error));
      throw new Error("Failed to exchange authorization code for tokens", { cause: error });
    }
  }

  /**
   * Get the access token, refreshing it 5 minutes before expiry
   */
  public async getAccessToken(): Promise<string> {
    if (!this.tokenInfo) {
      throw new SourceUnavailableError("Not authenticated with Spotify");
    }

    if (Date.now() >= this.tokenInfo.expiresAt - 5 * 60 * 1000) {
      return this.refreshToken(this.tokenInfo);
    }

    return this.tokenInfo.accessToken;
  }

  private async refreshToken(current: TokenInfo): Promise<string> {
    try {
      const response = await axios.post<SpotifyTokenResponse>(
        "https://accounts.spotify.com/api/token",
        new URLSearchParams({
          grant_type: "refresh_token",
          refresh_token: current.refreshToken,
        }),
        { headers: this.tokenHeaders() }
      );

      this.tokenInfo = {
        accessToken: response.data.access_token,
        refreshToken: response.data.refresh_token || current.refreshToken, // Spotify may not return refresh token
        expiresAt: Date.now() + response.data.expires_in * 1000,
      };
      console.log("[Spotify] Tokens refreshed");
      return this.tokenInfo.accessToken;
    } catch (error) {
      console.error("[Spotify] Error refreshing token:", describeAxiosError(error));
      // Remove invalid tokens
      this.tokenInfo = null;
      throw new SourceUnavailableError("Failed to refresh token. Please re-authenticate.", { cause: error });
    }
  }

  private tokenHeaders(): Record<string, string> {
    return {
      "Content-Type": "application/x-www-form-urlencoded",
      Authorization: `Basic ${Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64")}`,
    };
  }

  /**
   * Read the player state. Resolves NOT_PLAYING when no track is loaded and
   * throws SourceUnavailableError when Spotify cannot be reached.
   */
  public async sample(): Promise<PlaybackReading> {
    const accessToken = await this.getAccessToken();

    let response: AxiosResponse<SpotifyPlaybackResponse | "">;
    try {
      response = await this.apiClient.get<SpotifyPlaybackResponse | "">("/me/player", {
        headers: {
          Authorization: `Bearer ${accessToken}`,
        },
      });
    } catch (error) {
      throw new SourceUnavailableError(`Failed to read Spotify playback state: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    const sampledAt = performance.now();

    // 204 No Content: no active device
    const playback = response.status === 204 || response.data === "" ? null : response.data;
    if (!playback || !playback.item || playback.currently_playing_type === "ad") {
      this.lastTrack = null;
      return NOT_PLAYING;
    }

    const track: TrackInfo = {
      trackId: playback.item.id,
      title: playback.item.name,
      artist: playback.item.artists[0]?.name ?? "Unknown Artist",
    };
    this.lastTrack = track;

    return createSnapshot(track, (playback.progress_ms ?? 0) / 1000, playback.is_playing, sampledAt);
  }

  /**
   * Current track, sampling the player if nothing has been sampled yet
   */
  public async getCurrentTrack(): Promise<TrackInfo | null> {
    if (this.lastTrack) {
      return this.lastTrack;
    }
    const reading = await this.sample();
    return isNotPlaying(reading) ? null : reading.track;
  }

  /**
   * Check if the listener has authenticated
   */
  public hasTokens(): boolean {
    return this.tokenInfo !== null;
  }
}
