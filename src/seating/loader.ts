import { readFile, writeFile } from 'node:fs/promises';
import { ConfigurationError, isFileNotFound } from '../errors';
import type { Diagnostics } from '../diagnostics';
import { parseSeatingConfig, SeatingLayout, serializeSeatingConfig } from './layout';

/**
 * Load a seating layout file. A missing file disables seating (null); a present but
 * malformed one is a `ConfigurationError`.
 */
export async function loadSeatingLayout(path: string, diagnostics: Diagnostics): Promise<SeatingLayout | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isFileNotFound(err)) {
      diagnostics.warn(`Seating config ${path} was not found; seating metadata disabled`);
      return null;
    }
    throw new ConfigurationError(`Could not read seating config ${path}`, { cause: err });
  }
  const layout = parseSeatingConfig(text);
  diagnostics.info(`Loaded ${layout.seats.length} seat(s) from ${path}`);
  return layout;
}

export async function saveSeatingLayout(path: string, layout: SeatingLayout): Promise<void> {
  await writeFile(path, serializeSeatingConfig(layout), 'utf8');
}
