import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { ConfigurationError, describeError, ResourceError } from '../errors';
import { decodeWireFrame, wireFrameSchema } from '../frame';
import type { SkeletonFrame } from '../types';
import { PushPoseProvider } from './pushProvider';

const DEFAULT_WRAP_GAP_MS = 33;

export const poseRecordingSchema = z.object({
  name: z.string().default('recording'),
  durationMs: z.number().nonnegative().optional(),
  frames: z.array(wireFrameSchema).min(1),
  meta: z.record(z.unknown()).optional(),
});

export interface PoseRecording {
  name: string;
  durationMs?: number;
  frames: SkeletonFrame[];
}

export interface PlaybackOptions {
  loop?: boolean;
  /** 2 plays twice as fast. */
  playbackSpeed?: number;
}

export function parsePoseRecording(value: unknown): PoseRecording {
  const parsed = poseRecordingSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid pose recording: ${detail}`);
  }
  const frames = parsed.data.frames.map(decodeWireFrame).sort((a, b) => a.timestamp - b.timestamp);
  return { name: parsed.data.name, durationMs: parsed.data.durationMs, frames };
}

/**
 * Replays a recorded session on its original frame spacing. When looping, each pass
 * shifts timestamps forward so consumers still see a non-decreasing clock.
 */
export class RecordingPoseProvider extends PushPoseProvider {
  private recording: PoseRecording | null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private cursor = 0;
  private cycleOffset = 0;
  private readonly loop: boolean;
  private readonly speed: number;

  constructor(
    private readonly source: string | PoseRecording,
    options: PlaybackOptions = {},
    diagnostics: Diagnostics = silentDiagnostics
  ) {
    super(diagnostics);
    this.recording = typeof source === 'string' ? null : source;
    this.loop = options.loop ?? false;
    this.speed = options.playbackSpeed ?? 1;
    if (!(this.speed > 0)) throw new ConfigurationError(`Playback speed must be positive, got ${this.speed}`);
  }

  get isPlaying(): boolean {
    return this.timer !== null;
  }

  async start(): Promise<void> {
    if (this.isActive) return;
    const recording = this.recording ?? (await this.load());
    this.recording = recording;
    this.cursor = 0;
    this.cycleOffset = 0;
    this.resetClock();
    await super.start();
    this.diagnostics.info(`Playing recording '${recording.name}' (${recording.frames.length} frames)`);
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    await super.stop();
  }

  private async load(): Promise<PoseRecording> {
    const path = typeof this.source === 'string' ? this.source : '';
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      throw new ResourceError(`Could not open recording ${path}: ${describeError(err)}`, { cause: err });
    }
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      throw new ConfigurationError(`Recording ${path} is not valid JSON`, { cause: err });
    }
    return parsePoseRecording(payload);
  }

  private cycleSpan(frames: SkeletonFrame[]): number {
    const first = frames[0]?.timestamp ?? 0;
    const last = frames[frames.length - 1]?.timestamp ?? first;
    const second = frames[1]?.timestamp;
    const wrapGap = second !== undefined && second > first ? second - first : DEFAULT_WRAP_GAP_MS;
    return last - first + wrapGap;
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => this.emitCurrent(), delayMs);
  }

  private emitCurrent(): void {
    this.timer = null;
    const frames = this.recording?.frames ?? [];
    const frame = frames[this.cursor];
    if (!this.isActive || !frame) return;
    this.publish({ ...frame, timestamp: frame.timestamp + this.cycleOffset });

    const next = frames[this.cursor + 1];
    if (next) {
      this.cursor += 1;
      this.scheduleNext((next.timestamp - frame.timestamp) / this.speed);
      return;
    }
    if (!this.loop) {
      this.diagnostics.info('Recording playback finished');
      return;
    }
    const span = this.cycleSpan(frames);
    const first = frames[0]?.timestamp ?? 0;
    this.cycleOffset += span;
    this.cursor = 0;
    this.scheduleNext((first + span - frame.timestamp) / this.speed);
  }
}
