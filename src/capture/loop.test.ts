import { describe, expect, it, vi } from 'vitest';
import { ResourceError } from '../errors';
import type { PoseProvider } from '../providers/types';
import { SeatingLayout } from '../seating/layout';
import { fakeDiagnostics, makeFrame, rootAt } from '../testing';
import type { SkeletonTransport } from '../transport/types';
import type { SkeletonFrame } from '../types';
import { CaptureController } from './controller';
import { CaptureLoop, type CaptureLoopOptions } from './loop';

class QueueProvider implements PoseProvider {
  readonly calls: string[] = [];
  constructor(private readonly queue: (SkeletonFrame | null | Error)[] = []) {}
  start() {
    this.calls.push('provider.start');
  }
  stop() {
    this.calls.push('provider.stop');
  }
  getLatest(): SkeletonFrame | null {
    const next = this.queue.shift() ?? null;
    if (next instanceof Error) throw next;
    return next;
  }
}

class RecordingTransport implements SkeletonTransport {
  readonly kind = 'udp' as const;
  readonly sent: SkeletonFrame[] = [];
  connectError: Error | null = null;
  constructor(private readonly calls: string[]) {}
  async connect() {
    this.calls.push('transport.connect');
    if (this.connectError) throw this.connectError;
  }
  async send(frame: SkeletonFrame) {
    this.sent.push(frame);
  }
  async close() {
    this.calls.push('transport.close');
  }
}

const layout = new SeatingLayout([
  { seatId: 'left', xMin: 0, yMin: 0, xMax: 0.5, yMax: 1 },
  { seatId: 'right', xMin: 0.5, yMin: 0, xMax: 1, yMax: 1 },
]);

function setup(queue: (SkeletonFrame | null | Error)[] = [], overrides: Partial<CaptureLoopOptions> = {}) {
  const provider = new QueueProvider(queue);
  const transport = new RecordingTransport(provider.calls);
  const diagnostics = fakeDiagnostics();
  const loop = new CaptureLoop({
    provider,
    transport,
    frameIntervalMs: 20,
    diagnostics,
    sleep: async () => {},
    ...overrides,
  });
  return { provider, transport, diagnostics, loop };
}

describe('CaptureLoop.enrich', () => {
  it('layers frame metadata, calibration, static metadata and the seating report', async () => {
    const { loop } = setup([], {
      calibrationFile: 'calibration.json',
      loadCalibration: async () => ({ a: 'calibration', b: 'calibration' }),
      metadata: { b: 'static', c: 'static' },
      seatingLayout: layout,
    });
    await loop.start();

    const frame = makeFrame(5, { ...rootAt(0.75, 0.5), a: 'frame', seating: 'stale' });
    const enriched = loop.enrich(frame);

    expect(enriched.metadata).toMatchObject({ a: 'calibration', b: 'static', c: 'static' });
    expect(enriched.metadata.seating).toEqual(layout.evaluate(frame));
    expect(frame.metadata.seating).toBe('stale');
    expect(enriched.joints).toBe(frame.joints);
  });

  it('omits the seating key once the layout is cleared', () => {
    const { loop } = setup([], { seatingLayout: layout });
    loop.updateSeatingLayout(null);
    const enriched = loop.enrich(makeFrame(1, { ...rootAt(0.2, 0.2), seating: 'stale' }));
    expect('seating' in enriched.metadata).toBe(false);
  });

  it('uses a swapped layout for the next frame', () => {
    const { loop } = setup([], { seatingLayout: layout });
    loop.updateSeatingLayout(new SeatingLayout([{ seatId: 'solo', xMin: 0, yMin: 0, xMax: 1, yMax: 1 }]));
    const enriched = loop.enrich(makeFrame(1, rootAt(0.2, 0.2)));
    expect(enriched.metadata.seating).toMatchObject({ activeSeatId: 'solo' });
  });
});

describe('CaptureLoop lifecycle', () => {
  it('starts the provider, then the transport, and tolerates a missing calibration file', async () => {
    const { loop, provider, diagnostics } = setup([], { calibrationFile: '/nonexistent/calibration.json' });
    await loop.start();
    expect(provider.calls).toEqual(['provider.start', 'transport.connect']);
    expect(loop.status).toBe('started');
    expect(diagnostics.warn).toHaveBeenCalledWith('Calibration file /nonexistent/calibration.json does not exist');
  });

  it('aborts start when the transport cannot connect', async () => {
    const { loop, provider, transport } = setup();
    transport.connectError = new Error('EADDRINUSE');

    await expect(loop.start()).rejects.toBeInstanceOf(ResourceError);
    expect(loop.status).toBe('stopped');
    expect(provider.calls).toEqual(['provider.start', 'transport.connect', 'transport.close', 'provider.stop']);
  });

  it('stops idempotently, closing the transport before the provider', async () => {
    const { loop, provider } = setup();
    await loop.start();
    await Promise.all([loop.stop(), loop.stop()]);
    await loop.stop();
    expect(provider.calls).toEqual(['provider.start', 'transport.connect', 'transport.close', 'provider.stop']);
    expect(loop.status).toBe('stopped');
  });
});

describe('CaptureLoop.run', () => {
  it('sends each new frame once and sleeps the full interval every tick', async () => {
    const f1 = makeFrame(1);
    const f2 = makeFrame(2);
    const sleeps: number[] = [];
    const { loop, transport } = setup([f1, null, f2], {
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 3) await loop.stop();
      },
    });

    await loop.run();

    expect(transport.sent.map((f) => f.timestamp)).toEqual([1, 2]);
    expect(sleeps).toEqual([20, 20, 20]);
    expect(loop.stats).toEqual({ ticks: 3, framesSent: 2, framesDropped: 0 });
  });

  it('drops a frame whose read fails and keeps going', async () => {
    const sleeps: number[] = [];
    const { loop, transport, diagnostics } = setup([new Error('camera hiccup'), makeFrame(3)], {
      sleep: async (ms) => {
        sleeps.push(ms);
        if (sleeps.length === 2) await loop.stop();
      },
    });

    await loop.run();

    expect(transport.sent).toHaveLength(1);
    expect(loop.stats.framesDropped).toBe(1);
    expect(diagnostics.warn).toHaveBeenCalledWith('Frame read failed: Error: camera hiccup');
  });
});

describe('CaptureController', () => {
  it('applies commands immediately while the loop is not running', async () => {
    const { loop } = setup();
    const controller = new CaptureController(loop);
    await expect(controller.requestSeatingUpdate(layout)).resolves.toEqual({ status: 'applied' });
    expect(loop.seatingLayout).toBe(layout);
  });

  it('marshals commands onto the loop and reports a timeout without throwing', async () => {
    const gate = { open: () => {} };
    const sleeps: number[] = [];
    const { loop } = setup([], {
      sleep: (ms) =>
        new Promise<void>((resolve) => {
          sleeps.push(ms);
          gate.open = resolve;
        }),
    });
    const controller = new CaptureController(loop, fakeDiagnostics());
    const running = loop.run();
    await vi.waitFor(() => expect(sleeps).toHaveLength(1));

    await expect(controller.requestSeatingUpdate(layout, 10)).resolves.toEqual({ status: 'timeout', afterMs: 10 });
    expect(loop.seatingLayout).toBeNull();

    gate.open();
    await vi.waitFor(() => expect(sleeps).toHaveLength(2));
    expect(loop.seatingLayout).toBe(layout);

    const stopping = controller.requestStop(1000);
    gate.open();
    await expect(stopping).resolves.toEqual({ status: 'applied' });
    await running;
    expect(loop.status).toBe('stopped');
  });
});
