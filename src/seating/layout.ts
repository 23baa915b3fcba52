import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../errors';
import type {
  FrameMetadata,
  SeatBounds,
  SeatingConfig,
  SeatOccupancyReport,
  SkeletonFrame,
} from '../types';

/** Named axis-aligned rectangle in normalized camera-plane coordinates. */
export interface SeatRegion {
  readonly seatId: string;
  readonly xMin: number;
  readonly yMin: number;
  readonly xMax: number;
  readonly yMax: number;
}

export function seatWidth(seat: SeatRegion): number {
  return Math.max(0, seat.xMax - seat.xMin);
}

export function seatHeight(seat: SeatRegion): number {
  return Math.max(0, seat.yMax - seat.yMin);
}

/** Inclusive of every edge. */
export function seatContains(seat: SeatRegion, x: number, y: number): boolean {
  return seat.xMin <= x && x <= seat.xMax && seat.yMin <= y && y <= seat.yMax;
}

export function seatBounds(seat: SeatRegion): SeatBounds {
  return { xMin: seat.xMin, xMax: seat.xMax, yMin: seat.yMin, yMax: seat.yMax };
}

/**
 * Throws `ValidationError` unless the seat is a finite, non-empty rectangle inside [0, 1]².
 */
export function assertValidRegion(seat: SeatRegion): void {
  const { seatId, xMin, xMax, yMin, yMax } = seat;
  if (![xMin, xMax, yMin, yMax].every(Number.isFinite)) {
    throw new ValidationError(`Seat '${seatId}' has non-finite bounds`);
  }
  if (xMin >= xMax || yMin >= yMax) {
    throw new ValidationError(`Seat '${seatId}' has non-positive bounds`);
  }
  if (xMin < 0 || yMin < 0 || xMax > 1 || yMax > 1) {
    throw new ValidationError(`Seat '${seatId}' lies outside the normalized frame`);
  }
}

const clamp = (value: number, lower: number, upper: number) => Math.max(lower, Math.min(upper, value));

/**
 * Distance of (x, y) from the nearest edge, relative to the half extent on that axis.
 * 1 at the center, 0 on any edge or outside, 0 for zero-area seats.
 */
export function confidenceAt(seat: SeatRegion, x: number, y: number): number {
  const halfWidth = seatWidth(seat) * 0.5;
  const halfHeight = seatHeight(seat) * 0.5;
  if (halfWidth <= 0 || halfHeight <= 0) return 0;
  const marginX = Math.min(x - seat.xMin, seat.xMax - x);
  const marginY = Math.min(y - seat.yMin, seat.yMax - y);
  if (marginX < 0 || marginY < 0) return 0;
  return clamp(Math.min(marginX / halfWidth, marginY / halfHeight), 0, 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown): number | null {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

/**
 * Normalized root point from frame metadata: `root_center_normalized` wins, otherwise
 * `root_center_pixel` divided by `frame_dimensions`.
 */
export function extractNormalizedRoot(metadata: FrameMetadata): { x: number; y: number } | null {
  const root = metadata.root_center_normalized;
  if (isRecord(root)) {
    const x = finiteNumber(root.x);
    const y = finiteNumber(root.y);
    if (x !== null && y !== null) return { x, y };
  }
  const pixel = metadata.root_center_pixel;
  const dims = metadata.frame_dimensions;
  if (!isRecord(pixel) || !isRecord(dims)) return null;
  const px = finiteNumber(pixel.x);
  const py = finiteNumber(pixel.y);
  const width = finiteNumber(dims.width);
  const height = finiteNumber(dims.height);
  if (px === null || py === null || !width || !height) return null;
  return { x: px / width, y: py / height };
}

/**
 * Ordered, id-unique, non-empty collection of seats. Immutable: edits build a new instance.
 *
 * Overlapping seats are allowed; `resolve` returns the earliest registered match.
 */
export class SeatingLayout {
  readonly seats: readonly SeatRegion[];

  constructor(seats: Iterable<SeatRegion>) {
    const ordered: SeatRegion[] = [];
    const seen = new Set<string>();
    for (const seat of seats) {
      if (!seat.seatId) throw new ValidationError('Seat id must be a non-empty string');
      if (seen.has(seat.seatId)) throw new ValidationError(`Duplicate seat id detected: ${seat.seatId}`);
      seen.add(seat.seatId);
      ordered.push(Object.freeze({ ...seat }));
    }
    if (ordered.length === 0) throw new ValidationError('SeatingLayout requires at least one seat');
    this.seats = Object.freeze(ordered);
  }

  get seatIds(): string[] {
    return this.seats.map((s) => s.seatId);
  }

  resolve(x: number, y: number): SeatRegion | null {
    return this.seats.find((seat) => seatContains(seat, x, y)) ?? null;
  }

  /** Returns null when the frame carries no usable root point. */
  evaluate(frame: SkeletonFrame): SeatOccupancyReport | null {
    const root = extractNormalizedRoot(frame.metadata);
    if (!root) return null;
    const active = this.resolve(root.x, root.y);
    return {
      activeSeatId: active ? active.seatId : null,
      confidence: active ? confidenceAt(active, root.x, root.y) : 0,
      seats: this.seats.map((seat) => ({
        id: seat.seatId,
        occupied: seat === active,
        bounds: seatBounds(seat),
      })),
    };
  }

  toConfig(): SeatingConfig {
    return { seats: this.seats.map((seat) => ({ id: seat.seatId, bounds: seatBounds(seat) })) };
  }

  static fromConfig(value: unknown): SeatingLayout {
    const parsed = seatingConfigSchema.safeParse(value);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid seating configuration: ${detail}`);
    }
    const seats = parsed.data.seats.map((raw) => {
      const seatId = raw.id ?? raw.seatId ?? '';
      const seat: SeatRegion = { seatId, ...raw.bounds };
      try {
        assertValidRegion(seat);
      } catch (err) {
        if (err instanceof ValidationError) {
          throw new ConfigurationError(err.message, { cause: err });
        }
        throw err;
      }
      return seat;
    });
    try {
      return new SeatingLayout(seats);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ConfigurationError(`Invalid seating configuration: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}

/** Numbers, or strings that hold one. Nothing else coerces. */
const coordinate = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite()
);

const boundsSchema = z.object({
  xMin: coordinate,
  xMax: coordinate,
  yMin: coordinate,
  yMax: coordinate,
});

const seatSchema = z
  .object({
    id: z.string().min(1).optional(),
    seatId: z.string().min(1).optional(),
    bounds: boundsSchema,
  })
  .refine((seat) => seat.id !== undefined || seat.seatId !== undefined, { message: "Seat entry missing 'id'" });

export const seatingConfigSchema = z.object({ seats: z.array(seatSchema) });

export function parseSeatingConfig(text: string): SeatingLayout {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError('Seating configuration is not valid JSON', { cause: err });
  }
  return SeatingLayout.fromConfig(payload);
}

export function serializeSeatingConfig(layout: SeatingLayout): string {
  return `${JSON.stringify(layout.toConfig(), null, 2)}\n`;
}
