import { setTimeout as delay } from 'node:timers/promises';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { describeError, ResourceError, SeatstreamError, TransientIOError } from '../errors';
import { loadCalibration } from '../metadataFiles';
import type { PoseProvider } from '../providers/types';
import type { SeatingLayout } from '../seating/layout';
import type { SkeletonTransport } from '../transport/types';
import type { FrameMetadata, SkeletonFrame } from '../types';

export type CaptureState = 'idle' | 'started' | 'running' | 'stopped';

export type CaptureCommand =
  | { type: 'stop' }
  | { type: 'updateSeating'; layout: SeatingLayout | null };

interface PendingCommand {
  command: CaptureCommand;
  resolve: () => void;
  reject: (err: unknown) => void;
}

export interface CaptureLoopOptions {
  provider: PoseProvider;
  transport: SkeletonTransport;
  /** Sleep between ticks, in milliseconds. */
  frameIntervalMs: number;
  calibrationFile?: string | null;
  metadata?: FrameMetadata;
  seatingLayout?: SeatingLayout | null;
  diagnostics?: Diagnostics;
  loadCalibration?: (path: string, diagnostics: Diagnostics) => Promise<FrameMetadata>;
  sleep?: (ms: number) => Promise<void>;
}

export interface CaptureStats {
  ticks: number;
  framesSent: number;
  framesDropped: number;
}

/**
 * Fixed-rate capture → enrich → transmit loop.
 *
 * Each tick pulls the newest frame (if any), enriches it and awaits the send, then
 * sleeps the full interval. Slow I/O stretches the period; frames are never resent,
 * reordered or queued.
 */
export class CaptureLoop {
  private state: CaptureState = 'idle';
  private layout: SeatingLayout | null;
  private calibration: FrameMetadata = {};
  private readonly metadata: FrameMetadata;
  private readonly diagnostics: Diagnostics;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly commands: PendingCommand[] = [];
  private stopping: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private readonly counters: CaptureStats = { ticks: 0, framesSent: 0, framesDropped: 0 };

  constructor(private readonly options: CaptureLoopOptions) {
    if (!(options.frameIntervalMs >= 0)) {
      throw new SeatstreamError(`Frame interval must be non-negative, got ${options.frameIntervalMs}`);
    }
    this.layout = options.seatingLayout ?? null;
    this.metadata = { ...(options.metadata ?? {}) };
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  get status(): CaptureState {
    return this.state;
  }

  get stats(): CaptureStats {
    return { ...this.counters };
  }

  get seatingLayout(): SeatingLayout | null {
    return this.layout;
  }

  /** Activate the provider, connect the transport, then load calibration. */
  start(): Promise<void> {
    if (this.state === 'stopped') {
      return Promise.reject(new SeatstreamError('CaptureLoop has been stopped'));
    }
    if (this.state !== 'idle') return this.starting ?? Promise.resolve();
    if (!this.starting) this.starting = this.open();
    return this.starting;
  }

  private async open(): Promise<void> {
    const { provider, transport, calibrationFile } = this.options;
    this.diagnostics.info('Starting capture loop');
    let providerStarted = false;
    try {
      try {
        await provider.start();
        providerStarted = true;
      } catch (err) {
        throw err instanceof SeatstreamError ? err : new ResourceError('Pose provider failed to start', { cause: err });
      }
      try {
        await transport.connect();
      } catch (err) {
        throw err instanceof SeatstreamError ? err : new ResourceError('Transport failed to connect', { cause: err });
      }
      if (calibrationFile) {
        const load = this.options.loadCalibration ?? loadCalibration;
        this.calibration = await load(calibrationFile, this.diagnostics);
      }
    } catch (err) {
      this.diagnostics.error(`Capture loop failed to start: ${describeError(err)}`);
      this.state = 'stopped';
      await this.release(providerStarted);
      throw err;
    }
    if (this.state === 'idle') this.state = 'started';
  }

  /** Runs until stopped. Starts the loop first when still idle. */
  async run(): Promise<void> {
    if (this.state === 'idle') await this.start();
    else if (this.starting) await this.starting;
    if (this.state !== 'started') return;
    this.state = 'running';
    this.diagnostics.info(`Capture loop running every ${this.options.frameIntervalMs} ms`);
    while (this.isRunning()) {
      await this.drainCommands();
      if (!this.isRunning()) break;
      await this.tick();
      await this.sleep(this.options.frameIntervalMs);
    }
    await this.drainCommands();
    this.diagnostics.info('Capture loop exited', { ...this.counters });
  }

  private isRunning(): boolean {
    return this.state === 'running';
  }

  /** One pull → enrich → send pass. Returns whether a frame was sent. */
  async tick(): Promise<boolean> {
    this.counters.ticks += 1;
    let frame: SkeletonFrame | null;
    try {
      frame = this.options.provider.getLatest();
    } catch (err) {
      this.drop(new TransientIOError('Frame read failed', { cause: err }));
      return false;
    }
    if (!frame) return false;
    try {
      const enriched = this.enrich(frame);
      await this.options.transport.send(enriched);
    } catch (err) {
      this.drop(new TransientIOError('Frame dropped', { cause: err }));
      return false;
    }
    this.counters.framesSent += 1;
    return true;
  }

  private drop(err: TransientIOError): void {
    this.counters.framesDropped += 1;
    this.diagnostics.warn(`${err.message}: ${describeError(err.cause)}`);
  }

  /**
   * Layers frame metadata, calibration, static metadata and the seating report, each
   * overwriting equal keys of the previous. Without an active layout or a usable root
   * point the `seating` key is left out.
   */
  enrich(frame: SkeletonFrame): SkeletonFrame {
    const merged: FrameMetadata = { ...frame.metadata, ...this.calibration, ...this.metadata };
    delete merged.seating;
    const layout = this.layout;
    if (layout) {
      const report = layout.evaluate({ ...frame, metadata: merged });
      if (report) merged.seating = report;
    }
    return { ...frame, metadata: merged };
  }

  /** Swap the layout used by the next enrichment. Null disables seating metadata. */
  updateSeatingLayout(layout: SeatingLayout | null): void {
    this.layout = layout;
    this.diagnostics.info(
      layout ? `Seating layout updated (${layout.seats.length} seat(s))` : 'Seating layout cleared'
    );
  }

  /**
   * Queue a command for the loop. While running it is applied at the top of the next
   * tick; otherwise it is applied straight away. Resolves once applied.
   */
  submit(command: CaptureCommand): Promise<void> {
    if (!this.isRunning()) return this.apply(command);
    return new Promise<void>((resolve, reject) => {
      this.commands.push({ command, resolve, reject });
    });
  }

  private async drainCommands(): Promise<void> {
    while (this.commands.length > 0) {
      const pending = this.commands.shift();
      if (!pending) break;
      try {
        await this.apply(pending.command);
        pending.resolve();
      } catch (err) {
        pending.reject(err);
      }
    }
  }

  private async apply(command: CaptureCommand): Promise<void> {
    if (command.type === 'stop') {
      await this.stop();
    } else {
      this.updateSeatingLayout(command.layout);
    }
  }

  /**
   * Idempotent. Flips the running flag, closes the transport, then stops the provider.
   * An in-flight sleep or send finishes on its own before the loop observes the flag.
   */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const starting = this.starting;
    this.state = 'stopped';
    this.diagnostics.info('Stopping capture loop');
    if (starting) {
      try {
        await starting;
      } catch (err) {
        // open() already released what it had acquired.
        this.diagnostics.debug(`Stop after failed start: ${describeError(err)}`);
        return;
      }
    }
    await this.release(starting !== null);
  }

  private async release(providerStarted: boolean): Promise<void> {
    try {
      await this.options.transport.close();
    } catch (err) {
      this.diagnostics.error(`Transport close failed: ${describeError(err)}`);
    }
    if (!providerStarted) return;
    try {
      await this.options.provider.stop();
    } catch (err) {
      this.diagnostics.error(`Pose provider stop failed: ${describeError(err)}`);
    }
  }
}
