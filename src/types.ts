export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Quaternion {
  x: number;
  y: number;
  z: number;
  w: number;
}

export interface Joint {
  name: string;
  position: Vector3;
  /** Absent means identity. */
  rotation?: Quaternion;
  /** In [0, 1]. */
  confidence: number;
}

export type FrameMetadata = Record<string, unknown>;

/** One timestamped set of named joints plus auxiliary metadata. */
export interface SkeletonFrame {
  joints: ReadonlyMap<string, Joint>;
  /** Integer milliseconds, non-decreasing per provider. */
  timestamp: number;
  metadata: FrameMetadata;
}

export interface SeatBounds {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

export interface SeatStatus {
  id: string;
  occupied: boolean;
  bounds: SeatBounds;
}

export interface SeatOccupancyReport {
  activeSeatId: string | null;
  confidence: number;
  seats: SeatStatus[];
}

export interface WireJoint {
  name: string;
  position: Vector3;
  rotation: Quaternion | null;
  confidence: number;
}

/** Per-frame JSON payload sent to consumers. */
export interface WireFrame {
  timestamp: number;
  joints: WireJoint[];
  meta?: FrameMetadata;
}

export interface SeatingConfigSeat {
  id: string;
  bounds: SeatBounds;
}

/** On-disk seating configuration. */
export interface SeatingConfig {
  seats: SeatingConfigSeat[];
}

export interface FrameDimensions {
  width: number;
  height: number;
}
