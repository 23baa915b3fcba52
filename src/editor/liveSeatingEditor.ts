import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { describeError, ValidationError } from '../errors';
import { assertValidRegion, SeatingLayout } from '../seating/layout';
import type {
  Corner,
  EditorAction,
  EditorMode,
  EditorSnapshot,
  KeyMap,
  LayoutListener,
  NormalizedRect,
  OverlayContext,
  OverlaySurface,
  PixelPoint,
  PointerInput,
  SeatDraft,
} from './types';

export const HANDLE_RADIUS_PX = 12;
export const MIN_CREATE_EXTENT_PX = 8;
export const MIN_SEAT_EXTENT = 0.02;

export const DEFAULT_KEY_MAP: KeyMap = {
  e: 'toggle',
  E: 'toggle',
  n: 'create',
  N: 'create',
  Delete: 'delete',
  Backspace: 'delete',
  c: 'clear',
  C: 'clear',
  Tab: 'next',
};

const SEAT_COLOR = '#22c55e';
const SELECTED_COLOR = '#f59e0b';
const HANDLE_COLOR = '#38bdf8';
const PREVIEW_COLOR = '#cbd5e1';
const TEXT_COLOR = '#ffffff';
const LABEL_FONT = '14px sans-serif';

const HELP_LINES = [
  'Edit mode: drag a seat to move it, drag a corner to resize',
  'Tab: next seat / Delete: remove / N: add / C: clear all / E: exit',
];

export interface LiveSeatingEditorOptions {
  onLayoutChanged?: LayoutListener | null;
  keyMap?: KeyMap;
  diagnostics?: Diagnostics;
  handleRadiusPx?: number;
  minCreateExtentPx?: number;
  minSeatExtent?: number;
}

const clamp = (value: number, lower: number, upper: number) => Math.max(lower, Math.min(upper, value));

const copyRect = (r: NormalizedRect): NormalizedRect => ({ xMin: r.xMin, yMin: r.yMin, xMax: r.xMax, yMax: r.yMax });

function sameRegion(a: SeatDraft, b: SeatDraft): boolean {
  return a.seatId === b.seatId && a.xMin === b.xMin && a.xMax === b.xMax && a.yMin === b.yMin && a.yMax === b.yMax;
}

/**
 * Pointer and key driven seat editing over a live preview.
 *
 * Seats are held in normalized coordinates and projected onto whatever frame size was
 * last rendered, so edits survive resolution changes. Every committed mutation emits a
 * freshly built `SeatingLayout`, or null once no seats remain. A mutation that fails
 * validation, or that the listener rejects by throwing, is rolled back.
 */
export class LiveSeatingEditor {
  private seats: SeatDraft[] = [];
  private selectedIndex: number | null = null;
  private currentMode: EditorMode = { kind: 'disabled' };
  private frameWidth = 1;
  private frameHeight = 1;
  private lastPointer: PixelPoint = { x: 0, y: 0 };
  private status = "Press 'E' to edit seats";
  private listener: LayoutListener | null;
  private readonly keyMap: KeyMap;
  private readonly diagnostics: Diagnostics;
  private readonly handleRadius: number;
  private readonly minCreateExtent: number;
  private readonly minExtent: number;

  constructor(options: LiveSeatingEditorOptions = {}) {
    this.listener = options.onLayoutChanged ?? null;
    this.keyMap = options.keyMap ?? DEFAULT_KEY_MAP;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
    this.handleRadius = options.handleRadiusPx ?? HANDLE_RADIUS_PX;
    this.minCreateExtent = options.minCreateExtentPx ?? MIN_CREATE_EXTENT_PX;
    this.minExtent = options.minSeatExtent ?? MIN_SEAT_EXTENT;
  }

  get mode(): EditorMode {
    return this.currentMode;
  }

  get enabled(): boolean {
    return this.currentMode.kind !== 'disabled';
  }

  get statusMessage(): string {
    return this.status;
  }

  get selectedSeatId(): string | null {
    return this.selectedIndex === null ? null : (this.seats[this.selectedIndex]?.seatId ?? null);
  }

  get frameSize(): { width: number; height: number } {
    return { width: this.frameWidth, height: this.frameHeight };
  }

  /** Working copy of the seats, including an uncommitted drag. */
  get drafts(): SeatDraft[] {
    return this.seats.map((seat) => ({ ...seat }));
  }

  setOnLayoutChanged(listener: LayoutListener | null): void {
    this.listener = listener;
  }

  /** Replace the working seats without emitting. */
  setLayout(layout: SeatingLayout | null): void {
    this.cancelGesture();
    this.seats = layout
      ? layout.seats.map((s) => ({ seatId: s.seatId, xMin: s.xMin, yMin: s.yMin, xMax: s.xMax, yMax: s.yMax }))
      : [];
    this.selectedIndex = this.seats.length > 0 ? 0 : null;
  }

  /** Current committed-or-not seats as a layout; null when empty. */
  layout(): SeatingLayout | null {
    return this.seats.length > 0 ? new SeatingLayout(this.seats) : null;
  }

  setFrameSize(width: number, height: number): void {
    this.frameWidth = Math.max(1, Math.trunc(width));
    this.frameHeight = Math.max(1, Math.trunc(height));
  }

  // ------------------------------------------------------------------
  // Input
  // ------------------------------------------------------------------

  /** Returns true when the key was consumed. */
  handleKeyEvent(key: string): boolean {
    const action: EditorAction | undefined = this.keyMap[key];
    return action ? this.perform(action) : false;
  }

  /** Run an editor action as if its key had been pressed. */
  perform(action: EditorAction): boolean {
    if (action === 'toggle') {
      this.toggle();
      return true;
    }
    if (!this.enabled) return false;
    this.cancelGesture();
    switch (action) {
      case 'next':
        this.selectNext();
        break;
      case 'delete':
        this.deleteSelected();
        break;
      case 'create':
        this.currentMode = { kind: 'pendingCreate' };
        this.status = 'New seat: drag to place it';
        break;
      case 'clear':
        this.clearAll();
        break;
    }
    return true;
  }

  handlePointerEvent(event: PointerInput): void {
    const point = { x: event.x, y: event.y };
    this.lastPointer = point;
    const mode = this.currentMode;
    switch (mode.kind) {
      case 'disabled':
        return;
      case 'idle':
        if (event.type === 'down') this.beginDrag(point);
        return;
      case 'moving':
      case 'resizing':
        if (event.type === 'move' || event.type === 'up') this.updateDrag(point);
        if (event.type === 'up') this.finishDrag();
        return;
      case 'pendingCreate':
        if (event.type === 'down') this.currentMode = { kind: 'creating', anchor: point, current: point };
        return;
      case 'creating':
        if (event.type === 'move') this.currentMode = { ...mode, current: point };
        if (event.type === 'up') this.finishCreate(mode.anchor, point);
        return;
    }
  }

  /** Rename the selected seat. Returns false when the id is empty or taken. */
  renameSelected(nextId: string): boolean {
    const index = this.selectedIndex;
    const seat = index === null ? undefined : this.seats[index];
    const trimmed = nextId.trim();
    if (!seat || !trimmed) return false;
    if (this.seats.some((s, i) => i !== index && s.seatId === trimmed)) {
      this.status = `Seat id '${trimmed}' is already in use`;
      return false;
    }
    const before = this.snapshot();
    seat.seatId = trimmed;
    return this.commit(before);
  }

  // ------------------------------------------------------------------
  // Rendering
  // ------------------------------------------------------------------

  render(surface: OverlaySurface): void {
    this.setFrameSize(surface.width, surface.height);
    const ctx = surface.context;
    this.seats.forEach((seat, index) => {
      const selected = this.enabled && index === this.selectedIndex;
      const color = selected ? SELECTED_COLOR : SEAT_COLOR;
      const [x1, y1, x2, y2] = this.seatPixels(seat);
      ctx.strokeStyle = color;
      ctx.lineWidth = 2;
      ctx.strokeRect(x1, y1, x2 - x1, y2 - y1);
      ctx.fillStyle = color;
      ctx.font = LABEL_FONT;
      ctx.fillText(seat.seatId, x1 + 4, y1 + 18);
      if (selected) this.drawHandles(ctx, x1, y1, x2, y2);
    });

    const lines = this.enabled ? HELP_LINES : [this.status];
    ctx.fillStyle = TEXT_COLOR;
    ctx.font = LABEL_FONT;
    lines.forEach((text, idx) => ctx.fillText(text, 10, 24 + idx * 20));

    const mode = this.currentMode;
    if (mode.kind === 'creating') {
      const { anchor, current } = mode;
      ctx.strokeStyle = PREVIEW_COLOR;
      ctx.lineWidth = 1;
      ctx.setLineDash([4, 4]);
      ctx.strokeRect(
        Math.min(anchor.x, current.x),
        Math.min(anchor.y, current.y),
        Math.abs(current.x - anchor.x),
        Math.abs(current.y - anchor.y)
      );
      ctx.setLineDash([]);
    }
  }

  private drawHandles(ctx: OverlayContext, x1: number, y1: number, x2: number, y2: number): void {
    ctx.strokeStyle = HANDLE_COLOR;
    ctx.lineWidth = 1;
    for (const [cx, cy] of [
      [x1, y1],
      [x2, y1],
      [x1, y2],
      [x2, y2],
    ] as const) {
      ctx.beginPath();
      ctx.arc(cx, cy, this.handleRadius / 2, 0, Math.PI * 2);
      ctx.stroke();
    }
  }

  // ------------------------------------------------------------------
  // Transitions
  // ------------------------------------------------------------------

  private toggle(): void {
    if (this.enabled) {
      this.cancelGesture();
      this.currentMode = { kind: 'disabled' };
      this.status = 'Edit mode finished';
    } else {
      this.currentMode = { kind: 'idle' };
      this.status = 'Edit mode started';
    }
  }

  /** Abandon a drag or pending create, restoring the seat being dragged. */
  private cancelGesture(): void {
    const mode = this.currentMode;
    if (mode.kind === 'moving' || mode.kind === 'resizing') {
      const seat = this.seats[mode.seatIndex];
      if (seat) Object.assign(seat, mode.startRect);
    }
    if (mode.kind !== 'disabled') this.currentMode = { kind: 'idle' };
  }

  private beginDrag(point: PixelPoint): void {
    const picked = this.pickSeat(point);
    if (!picked) return;
    const { index, corner } = picked;
    const seat = this.seats[index];
    if (!seat) return;
    const before = this.snapshot();
    this.selectedIndex = index;
    const startRect = copyRect(seat);
    this.currentMode = corner
      ? { kind: 'resizing', seatIndex: index, corner, startRect, before }
      : { kind: 'moving', seatIndex: index, startPx: point, startRect, before };
  }

  private updateDrag(point: PixelPoint): void {
    const mode = this.currentMode;
    if (mode.kind !== 'moving' && mode.kind !== 'resizing') return;
    const seat = this.seats[mode.seatIndex];
    if (!seat) return;
    if (mode.kind === 'moving') {
      const start = mode.startRect;
      const dx = (point.x - mode.startPx.x) / this.frameWidth;
      const dy = (point.y - mode.startPx.y) / this.frameHeight;
      const width = start.xMax - start.xMin;
      const height = start.yMax - start.yMin;
      const xMin = clamp(start.xMin + dx, 0, 1 - width);
      const yMin = clamp(start.yMin + dy, 0, 1 - height);
      Object.assign(seat, { xMin, yMin, xMax: xMin + width, yMax: yMin + height });
      return;
    }
    const nx = point.x / this.frameWidth;
    const ny = point.y / this.frameHeight;
    const { corner } = mode;
    if (corner === 'lt' || corner === 'lb') seat.xMin = clamp(nx, 0, seat.xMax - this.minExtent);
    if (corner === 'rt' || corner === 'rb') seat.xMax = clamp(nx, seat.xMin + this.minExtent, 1);
    if (corner === 'lt' || corner === 'rt') seat.yMin = clamp(ny, 0, seat.yMax - this.minExtent);
    if (corner === 'lb' || corner === 'rb') seat.yMax = clamp(ny, seat.yMin + this.minExtent, 1);
  }

  private finishDrag(): void {
    const mode = this.currentMode;
    if (mode.kind !== 'moving' && mode.kind !== 'resizing') return;
    this.currentMode = { kind: 'idle' };
    this.commit(mode.before);
  }

  private finishCreate(anchor: PixelPoint, end: PixelPoint): void {
    this.currentMode = { kind: 'idle' };
    if (Math.abs(end.x - anchor.x) < this.minCreateExtent || Math.abs(end.y - anchor.y) < this.minCreateExtent) {
      this.status = 'Seat too small; nothing added';
      return;
    }
    const before = this.snapshot();
    const xMin = clamp(Math.min(anchor.x, end.x) / this.frameWidth, 0, 1 - this.minExtent);
    const xMax = clamp(Math.max(anchor.x, end.x) / this.frameWidth, xMin + this.minExtent, 1);
    const yMin = clamp(Math.min(anchor.y, end.y) / this.frameHeight, 0, 1 - this.minExtent);
    const yMax = clamp(Math.max(anchor.y, end.y) / this.frameHeight, yMin + this.minExtent, 1);
    const seatId = this.nextSeatId();
    this.seats.push({ seatId, xMin, yMin, xMax, yMax });
    this.selectedIndex = this.seats.length - 1;
    if (this.commit(before)) {
      this.diagnostics.info(`Added seat '${seatId}' via live editor`);
      this.status = 'Seat added';
    }
  }

  private selectNext(): void {
    if (this.seats.length === 0) return;
    this.selectedIndex = this.selectedIndex === null ? 0 : (this.selectedIndex + 1) % this.seats.length;
  }

  private deleteSelected(): void {
    const index = this.selectedIndex;
    if (index === null) return;
    const before = this.snapshot();
    const [removed] = this.seats.splice(index, 1);
    this.selectedIndex = this.seats.length === 0 ? null : Math.min(index, this.seats.length - 1);
    if (this.commit(before) && removed) {
      this.diagnostics.info(`Removed seat '${removed.seatId}' from live layout`);
    }
  }

  private clearAll(): void {
    if (this.seats.length === 0) return;
    const before = this.snapshot();
    this.seats = [];
    this.selectedIndex = null;
    if (this.commit(before)) this.status = 'All seats removed';
  }

  // ------------------------------------------------------------------
  // Emission
  // ------------------------------------------------------------------

  private snapshot(): EditorSnapshot {
    return { seats: this.seats.map((seat) => ({ ...seat })), selectedIndex: this.selectedIndex };
  }

  private restore(snapshot: EditorSnapshot): void {
    this.seats = snapshot.seats.map((seat) => ({ ...seat }));
    this.selectedIndex = snapshot.selectedIndex;
  }

  /** Validate and emit the working seats; roll back to `before` on failure. */
  private commit(before: EditorSnapshot): boolean {
    let layout: SeatingLayout | null;
    try {
      this.seats
        .filter((seat) => !before.seats.some((prior) => sameRegion(prior, seat)))
        .forEach(assertValidRegion);
      layout = this.layout();
    } catch (err) {
      this.diagnostics.error(`Rejected seating edit: ${describeError(err)}`);
      this.status = err instanceof ValidationError ? err.message : 'Seating edit rejected';
      this.restore(before);
      return false;
    }
    if (!this.listener) return true;
    try {
      this.listener(layout);
    } catch (err) {
      this.diagnostics.error(`Seating layout listener failed; edit rolled back: ${describeError(err)}`);
      this.status = 'Seating edit rejected';
      this.restore(before);
      return false;
    }
    return true;
  }

  // ------------------------------------------------------------------
  // Geometry helpers
  // ------------------------------------------------------------------

  private nextSeatId(): string {
    const existing = new Set(this.seats.map((seat) => seat.seatId));
    for (let index = 1; ; index += 1) {
      const candidate = `seat-${String(index).padStart(2, '0')}`;
      if (!existing.has(candidate)) return candidate;
    }
  }

  private seatPixels(seat: NormalizedRect): [number, number, number, number] {
    return [
      Math.trunc(seat.xMin * this.frameWidth),
      Math.trunc(seat.yMin * this.frameHeight),
      Math.trunc(seat.xMax * this.frameWidth),
      Math.trunc(seat.yMax * this.frameHeight),
    ];
  }

  /** First seat (in list order) under the pointer; corners win over the body. */
  private pickSeat(point: PixelPoint): { index: number; corner: Corner | null } | null {
    const t = this.handleRadius;
    const near = (ax: number, ay: number) => Math.abs(point.x - ax) <= t && Math.abs(point.y - ay) <= t;
    for (let index = 0; index < this.seats.length; index += 1) {
      const seat = this.seats[index];
      if (!seat) continue;
      const [x1, y1, x2, y2] = this.seatPixels(seat);
      if (near(x1, y1)) return { index, corner: 'lt' };
      if (near(x2, y1)) return { index, corner: 'rt' };
      if (near(x1, y2)) return { index, corner: 'lb' };
      if (near(x2, y2)) return { index, corner: 'rb' };
      if (x1 <= point.x && point.x <= x2 && y1 <= point.y && point.y <= y2) return { index, corner: null };
    }
    return null;
  }

  /** Last pointer position seen, in frame pixels. */
  get pointer(): PixelPoint {
    return { ...this.lastPointer };
  }
}
