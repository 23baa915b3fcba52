import { parseSeatingConfig, serializeSeatingConfig, type SeatingLayout } from '../../../src/seating/layout';
import type { BackgroundImage } from '../types';

export const DEFAULT_LAYOUT_FILENAME = 'seating.json';

/**
 * WebSocket endpoint of a running seatstream service, or null for offline editing.
 * `VITE_SEATSTREAM_URL` pointing at localhost is rewritten to the page host so the
 * editor works from another machine on the network.
 */
export function resolveStreamUrl(envUrl: string | undefined = import.meta.env.VITE_SEATSTREAM_URL): string | null {
  if (!envUrl) return null;
  try {
    const parsed = new URL(envUrl);
    const badHost = parsed.hostname === 'localhost' || parsed.hostname === '0.0.0.0';
    const pageHost = typeof window === 'undefined' ? '' : window.location.hostname;
    if (badHost && pageHost && pageHost !== 'localhost') {
      parsed.hostname = pageHost;
      return parsed.toString();
    }
  } catch {
    return envUrl;
  }
  return envUrl;
}

export async function readLayoutFile(file: Blob): Promise<SeatingLayout> {
  return parseSeatingConfig(await file.text());
}

export function layoutBlob(layout: SeatingLayout): Blob {
  return new Blob([serializeSeatingConfig(layout)], { type: 'application/json' });
}

export async function loadBackgroundImage(file: File): Promise<BackgroundImage> {
  const bitmap = await createImageBitmap(file);
  return { name: file.name, source: bitmap, width: bitmap.width, height: bitmap.height };
}

/** Save the layout through the browser's download prompt. */
export function downloadLayout(layout: SeatingLayout, filename = DEFAULT_LAYOUT_FILENAME): void {
  const url = URL.createObjectURL(layoutBlob(layout));
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = filename;
  anchor.click();
  URL.revokeObjectURL(url);
}
