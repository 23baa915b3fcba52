import { LatestFrameBuffer } from '../capture/frameBuffer';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import type { SkeletonFrame } from '../types';
import type { PoseProvider } from './types';

/**
 * Provider fed from outside (a pose engine adapter, a playback timer). Frames land in a
 * last-value buffer; a frame older than the last accepted one is discarded so that
 * timestamps stay non-decreasing.
 */
export class PushPoseProvider implements PoseProvider {
  protected readonly buffer = new LatestFrameBuffer<SkeletonFrame>();
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private active = false;

  constructor(protected readonly diagnostics: Diagnostics = silentDiagnostics) {}

  get isActive(): boolean {
    return this.active;
  }

  /** Frames superseded before the capture loop picked them up. */
  get droppedFrames(): number {
    return this.buffer.dropped;
  }

  start(): void | Promise<void> {
    this.active = true;
  }

  stop(): void | Promise<void> {
    this.active = false;
    this.buffer.clear();
  }

  /** Returns false when the frame was rejected. */
  publish(frame: SkeletonFrame): boolean {
    if (!this.active) return false;
    if (frame.timestamp < this.lastTimestamp) {
      this.diagnostics.debug(`Discarding out-of-order frame ${frame.timestamp} < ${this.lastTimestamp}`);
      return false;
    }
    this.lastTimestamp = frame.timestamp;
    this.buffer.offer(frame);
    return true;
  }

  getLatest(): SkeletonFrame | null {
    return this.buffer.take();
  }

  protected resetClock(): void {
    this.lastTimestamp = Number.NEGATIVE_INFINITY;
  }
}
