import { findActiveLineIndex } from "./highlight";
import { ClientSyncState, Clock, FrameScheduler, PositionUpdate, TimedLine } from "./types";

export interface RendererOptions {
  scheduler: FrameScheduler;
  clock: Clock;
  /** Called when the highlighted line changes; -1 means no line is active */
  onActiveLineChange?: (index: number, previous: number) => void;
  /** Called every frame with the extrapolated position */
  onFrame?: (positionSeconds: number) => void;
}

/**
 * Extrapolates playback position between server snapshots and keeps exactly
 * one lyric line marked active. Runs on the host's frame callback.
 */
export class PredictiveRenderer {
  private readonly scheduler: FrameScheduler;
  private readonly clock: Clock;
  private readonly onActiveLineChange?: (index: number, previous: number) => void;
  private readonly onFrame?: (positionSeconds: number) => void;

  private state: ClientSyncState | null = null;
  private lines: readonly TimedLine[] = [];
  private activeIndex = -1;
  private lastSeq: number | null = null;
  private frameHandle: number | null = null;
  private running = false;

  constructor(options: RendererOptions) {
    this.scheduler = options.scheduler;
    this.clock = options.clock;
    this.onActiveLineChange = options.onActiveLineChange;
    this.onFrame = options.onFrame;
  }

  /**
   * Replace the extrapolation anchor with a new server snapshot. Returns false
   * when the snapshot is older than one already applied on this connection.
   */
  public applySnapshot(update: PositionUpdate): boolean {
    if (update.seq !== undefined) {
      if (this.lastSeq !== null && update.seq <= this.lastSeq) {
        console.warn(`[Renderer] Dropping out-of-order snapshot #${update.seq} (last #${this.lastSeq})`);
        return false;
      }
      this.lastSeq = update.seq;
    }

    // One assignment: a frame never sees a position paired with a stale anchor.
    this.state = Object.freeze({
      lastServerPosition: update.position,
      isPlaying: update.isPlaying,
      lastClientSyncInstant: this.clock.now(),
    });
    return true;
  }

  /**
   * Start a new sequence epoch, e.g. after reconnecting to a server whose
   * counter may have restarted. The sync state itself is kept.
   */
  public resetSequence(): void {
    this.lastSeq = null;
  }

  /**
   * Position to display right now, or null before the first snapshot
   */
  public displayedPosition(): number | null {
    const state = this.state;
    if (!state) {
      return null;
    }
    if (!state.isPlaying) {
      return state.lastServerPosition;
    }
    const elapsedSeconds = (this.clock.now() - state.lastClientSyncInstant) / 1000;
    return state.lastServerPosition + elapsedSeconds;
  }

  public setLines(lines: readonly TimedLine[]): void {
    this.lines = lines;
    this.updateHighlight(-1);
    this.render();
  }

  public getState(): ClientSyncState | null {
    return this.state;
  }

  public getActiveIndex(): number {
    return this.activeIndex;
  }

  public isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.scheduleFrame();
  }

  /**
   * Cancel the pending frame. Safe to call repeatedly.
   */
  public stop(): void {
    this.running = false;
    if (this.frameHandle !== null) {
      this.scheduler.cancel(this.frameHandle);
      this.frameHandle = null;
    }
  }

  private scheduleFrame(): void {
    this.frameHandle = this.scheduler.request(() => {
      this.frameHandle = null;
      if (!this.running) {
        return;
      }
      this.render();
      this.scheduleFrame();
    });
  }

  private render(): void {
    const position = this.displayedPosition();
    if (position === null) {
      this.updateHighlight(-1);
      return;
    }
    this.onFrame?.(position);
    this.updateHighlight(findActiveLineIndex(this.lines, position));
  }

  private updateHighlight(index: number): void {
    if (index === this.activeIndex) {
      return;
    }
    const previous = this.activeIndex;
    this.activeIndex = index;
    this.onActiveLineChange?.(index, previous);
  }
}
