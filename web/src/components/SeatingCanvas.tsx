import { useEffect, useRef, type KeyboardEvent, type MouseEvent } from 'react';
import clsx from 'clsx';
import type { LiveSeatingEditor } from '../../../src/editor/liveSeatingEditor';
import type { OverlayContext, PixelPoint, PointerInput } from '../../../src/editor/types';
import type { BackgroundImage, LivePose } from '../types';

export const DEFAULT_FRAME_SIZE = { width: 1280, height: 720 };

const ROOT_MARKER_COLOR = '#ef4444';

/** The 2D context calls drawn here on top of the editor overlay. */
export interface SeatingCanvasContext extends OverlayContext {
  clearRect(x: number, y: number, w: number, h: number): void;
  drawImage(image: CanvasImageSource, dx: number, dy: number, dw: number, dh: number): void;
  fill(): void;
}

interface Props {
  editor: LiveSeatingEditor;
  /** Bumped by the parent whenever editor state changed. */
  revision: number;
  background: BackgroundImage | null;
  live: LivePose | null;
  onChange: () => void;
}

export function drawSeating(
  ctx: SeatingCanvasContext,
  size: { width: number; height: number },
  editor: LiveSeatingEditor,
  background: BackgroundImage | null,
  live: LivePose | null
) {
  const { width, height } = size;
  ctx.clearRect(0, 0, width, height);
  if (background) ctx.drawImage(background.source, 0, 0, width, height);
  editor.render({ width, height, context: ctx });

  if (live?.root) {
    ctx.fillStyle = ROOT_MARKER_COLOR;
    ctx.beginPath();
    ctx.arc(live.root.x * width, live.root.y * height, 6, 0, Math.PI * 2);
    ctx.fill();
  }
}

interface Measurable {
  width: number;
  height: number;
  getBoundingClientRect(): { left: number; top: number; width: number; height: number };
}

/** Client coordinates to canvas pixels, undoing any CSS scaling of the element. */
export function toFramePoint(canvas: Measurable, clientX: number, clientY: number): PixelPoint {
  const rect = canvas.getBoundingClientRect();
  const scaleX = rect.width > 0 ? canvas.width / rect.width : 1;
  const scaleY = rect.height > 0 ? canvas.height / rect.height : 1;
  return { x: (clientX - rect.left) * scaleX, y: (clientY - rect.top) * scaleY };
}

export function SeatingCanvas({ editor, revision, background, live, onChange }: Props) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const width = background?.width ?? DEFAULT_FRAME_SIZE.width;
  const height = background?.height ?? DEFAULT_FRAME_SIZE.height;

  useEffect(() => {
    editor.setFrameSize(width, height);
    const ctx = canvasRef.current?.getContext('2d');
    if (!ctx) return;
    drawSeating(ctx, { width, height }, editor, background, live);
  }, [editor, revision, background, live, width, height]);

  const pointer = (type: PointerInput['type']) => (e: MouseEvent<HTMLCanvasElement>) => {
    const point = toFramePoint(e.currentTarget, e.clientX, e.clientY);
    editor.handlePointerEvent({ type, ...point });
    onChange();
  };

  const handleKeyDown = (e: KeyboardEvent<HTMLCanvasElement>) => {
    if (editor.handleKeyEvent(e.key)) {
      e.preventDefault();
      onChange();
    }
  };

  return (
    <div className="card canvas-frame">
      <canvas
        ref={canvasRef}
        width={width}
        height={height}
        tabIndex={0}
        aria-label="Seating canvas"
        className={clsx('seating-canvas', editor.enabled && 'is-editing')}
        onMouseDown={pointer('down')}
        onMouseMove={pointer('move')}
        onMouseUp={pointer('up')}
        onKeyDown={handleKeyDown}
      />
    </div>
  );
}

export default SeatingCanvas;
