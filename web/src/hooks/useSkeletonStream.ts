import { useEffect, useRef, useState } from 'react';
import { z } from 'zod';
import { createDiagnostics } from '../../../src/diagnostics';
import { describeError } from '../../../src/errors';
import { decodeWireFrame } from '../../../src/frame';
import { extractNormalizedRoot } from '../../../src/seating/layout';
import type { LivePose, StreamStatus } from '../types';

const WS_MIN_BACKOFF = 500;
const WS_MAX_BACKOFF = 8000;

const diagnostics = createDiagnostics('live-stream');

const boundsSchema = z.object({ xMin: z.number(), xMax: z.number(), yMin: z.number(), yMax: z.number() });

const seatingReportSchema = z.object({
  activeSeatId: z.string().nullable(),
  confidence: z.number(),
  seats: z.array(z.object({ id: z.string(), occupied: z.boolean(), bounds: boundsSchema })),
});

/** Reduce one wire message to what the editor shows. Throws on a malformed frame. */
export function toLivePose(raw: string): LivePose {
  const frame = decodeWireFrame(JSON.parse(raw));
  const seating = seatingReportSchema.safeParse(frame.metadata.seating);
  return {
    timestamp: frame.timestamp,
    root: extractNormalizedRoot(frame.metadata),
    seating: seating.success ? seating.data : null,
  };
}

/**
 * Subscribe to a running service's WebSocket transport and keep the newest pose.
 * Reconnects with exponential backoff; a null url keeps the editor offline.
 */
export function useSkeletonStream(url: string | null) {
  const [latest, setLatest] = useState<LivePose | null>(null);
  const [status, setStatus] = useState<StreamStatus>(url ? 'connecting' : 'disabled');
  const retryRef = useRef(WS_MIN_BACKOFF);
  const wsRef = useRef<WebSocket | null>(null);
  const timeoutRef = useRef<number | null>(null);

  useEffect(() => {
    if (!url) {
      setStatus('disabled');
      return;
    }
    const wsUrl = url;
    let disposed = false;

    const scheduleReconnect = () => {
      if (disposed) return;
      setStatus('closed');
      if (timeoutRef.current) window.clearTimeout(timeoutRef.current);
      const delay = Math.min(retryRef.current, WS_MAX_BACKOFF);
      retryRef.current = Math.min(WS_MAX_BACKOFF, retryRef.current * 2);
      timeoutRef.current = window.setTimeout(connect, delay);
    };

    function connect() {
      if (disposed) return;
      setStatus('connecting');
      const ws = new WebSocket(wsUrl);
      wsRef.current = ws;
      ws.onopen = () => {
        if (disposed) return;
        setStatus('open');
        retryRef.current = WS_MIN_BACKOFF;
      };
      ws.onclose = () => scheduleReconnect();
      ws.onerror = () => scheduleReconnect();
      ws.onmessage = (evt: MessageEvent) => {
        if (disposed || typeof evt.data !== 'string') return;
        try {
          setLatest(toLivePose(evt.data));
        } catch (err) {
          diagnostics.debug(`Ignoring malformed frame: ${describeError(err)}`);
        }
      };
    }

    connect();

    return () => {
      disposed = true;
      if (timeoutRef.current) window.clearTimeout(timeoutRef.current);
      timeoutRef.current = null;
      const ws = wsRef.current;
      if (ws) {
        ws.onopen = null;
        ws.onclose = null;
        ws.onerror = null;
        ws.onmessage = null;
        ws.close();
      }
      wsRef.current = null;
    };
  }, [url]);

  return { latest, status };
}
