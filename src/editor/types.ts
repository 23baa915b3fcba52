import type { SeatingLayout } from '../seating/layout';

export type Corner = 'lt' | 'rt' | 'lb' | 'rb';

export interface PixelPoint {
  x: number;
  y: number;
}

export interface NormalizedRect {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

/** Mutable working copy of a seat while the editor owns it. */
export interface SeatDraft extends NormalizedRect {
  seatId: string;
}

/**
 * Editor mode. Exactly one applies at a time, so e.g. dragging while disabled
 * cannot be represented.
 */
export type EditorMode =
  | { kind: 'disabled' }
  | { kind: 'idle' }
  | { kind: 'moving'; seatIndex: number; startPx: PixelPoint; startRect: NormalizedRect; before: EditorSnapshot }
  | { kind: 'resizing'; seatIndex: number; corner: Corner; startRect: NormalizedRect; before: EditorSnapshot }
  | { kind: 'pendingCreate' }
  | { kind: 'creating'; anchor: PixelPoint; current: PixelPoint };

export interface EditorSnapshot {
  seats: SeatDraft[];
  selectedIndex: number | null;
}

export interface PointerInput {
  type: 'down' | 'move' | 'up';
  /** Pixels in the frame the editor last rendered onto. */
  x: number;
  y: number;
}

export type EditorAction = 'toggle' | 'create' | 'delete' | 'clear' | 'next';

export type KeyMap = Readonly<Record<string, EditorAction>>;

export type LayoutListener = (layout: SeatingLayout | null) => void;

/**
 * The subset of `CanvasRenderingContext2D` the overlay draws with. A browser canvas
 * context satisfies it as is.
 */
export interface OverlayContext {
  strokeStyle: string | object;
  fillStyle: string | object;
  lineWidth: number;
  font: string;
  strokeRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  beginPath(): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  stroke(): void;
  setLineDash(segments: number[]): void;
}

export interface OverlaySurface {
  width: number;
  height: number;
  context: OverlayContext;
}
