import { vi } from 'vitest';
import type { Diagnostics } from './diagnostics';
import { createSkeletonFrame } from './frame';
import type { FrameMetadata, SkeletonFrame } from './types';

export function fakeDiagnostics(): Diagnostics & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  const sink = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: (): Diagnostics => sink,
  };
  return sink;
}

export function makeFrame(timestamp = 0, metadata: FrameMetadata = {}): SkeletonFrame {
  return createSkeletonFrame(
    [
      { name: 'hips', position: { x: 0, y: 1, z: 0 }, confidence: 0.9 },
      { name: 'head', position: { x: 0, y: 1.7, z: 0.1 }, rotation: { x: 0, y: 0, z: 0, w: 1 }, confidence: 0.8 },
    ],
    timestamp,
    metadata
  );
}

export function rootAt(x: number, y: number): FrameMetadata {
  return { root_center_normalized: { x, y } };
}
