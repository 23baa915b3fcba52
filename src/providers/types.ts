import type { SkeletonFrame } from '../types';

/**
 * Source of already-computed skeleton samples. `getLatest` never blocks: it returns
 * the newest frame not yet handed out, or null when nothing new is ready.
 */
export interface PoseProvider {
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  getLatest(): SkeletonFrame | null;
}
