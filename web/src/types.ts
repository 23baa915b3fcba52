import type { SeatOccupancyReport } from '../../src/types';

export type FileStatus = 'idle' | 'loading' | 'loaded' | 'saved' | 'error';

export type StreamStatus = 'disabled' | 'connecting' | 'open' | 'closed';

/** Snapshot the seats are drawn over. */
export interface BackgroundImage {
  name: string;
  source: CanvasImageSource;
  width: number;
  height: number;
}

/** What the editor needs from the newest streamed frame. */
export interface LivePose {
  timestamp: number;
  root: { x: number; y: number } | null;
  seating: SeatOccupancyReport | null;
}
