import { RECOVERY_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";

export interface FrameCarouselOptions {
  intervalMs?: number;
}

/**
 * Cycles the formatted export frames at a fixed interval so a scanner can catch
 * whichever one is on screen. Purely a timer over a fixed list.
 */
export class FrameCarousel {
  private position = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;

  constructor(private readonly frames: readonly string[], opts?: FrameCarouselOptions) {
    if (frames.length === 0) throw new ValidationError("FrameCarousel needs at least one frame");
    this.intervalMs = opts?.intervalMs ?? RECOVERY_CONSTANTS.QR.FRAME_INTERVAL_MS;
    if (!Number.isFinite(this.intervalMs) || this.intervalMs <= 0) {
      throw new ValidationError("intervalMs must be a positive number");
    }
  }

  current(): string {
    return this.frames[this.position] ?? "";
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Emits the current frame immediately, then the next one on every tick. */
  start(onFrame: (text: string, index: number) => void): void {
    this.stop();
    onFrame(this.current(), this.position);
    if (this.frames.length < 2) return;
    this.timer = setInterval(() => {
      this.position = (this.position + 1) % this.frames.length;
      onFrame(this.current(), this.position);
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
