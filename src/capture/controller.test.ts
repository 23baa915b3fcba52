import { describe, expect, it, vi } from 'vitest';
import { PushPoseProvider } from '../providers/pushProvider';
import { fakeDiagnostics } from '../testing';
import type { SkeletonTransport } from '../transport/types';
import { CaptureController } from './controller';
import { CaptureLoop } from './loop';

const transport: SkeletonTransport = {
  kind: 'ws',
  connect: async () => {},
  send: async () => {},
  close: async () => {},
};

function idleLoop() {
  return new CaptureLoop({ provider: new PushPoseProvider(), transport, frameIntervalMs: 10 });
}

describe('CaptureController', () => {
  it('reports a rejected command as failed', async () => {
    const loop = idleLoop();
    const failure = new Error('queue closed');
    vi.spyOn(loop, 'submit').mockRejectedValue(failure);
    const diagnostics = fakeDiagnostics();

    const outcome = await new CaptureController(loop, diagnostics).requestSeatingUpdate(null);

    expect(outcome).toEqual({ status: 'failed', error: failure });
    expect(diagnostics.error).toHaveBeenCalledWith("Command 'updateSeating' failed: Error: queue closed");
  });

  it('logs a timeout and leaves the command pending', async () => {
    vi.useFakeTimers();
    try {
      const loop = idleLoop();
      vi.spyOn(loop, 'submit').mockReturnValue(new Promise<void>(() => {}));
      const diagnostics = fakeDiagnostics();

      const pending = new CaptureController(loop, diagnostics).requestStop(250);
      await vi.advanceTimersByTimeAsync(250);

      await expect(pending).resolves.toEqual({ status: 'timeout', afterMs: 250 });
      expect(diagnostics.warn).toHaveBeenCalledWith("Command 'stop' not acknowledged within 250 ms");
    } finally {
      vi.useRealTimers();
    }
  });

  it('stops an idle loop straight away', async () => {
    const loop = idleLoop();
    await loop.start();
    await expect(new CaptureController(loop).requestStop()).resolves.toEqual({ status: 'applied' });
    expect(loop.status).toBe('stopped');
  });
});
