import { readFile } from 'node:fs/promises';
import { ConfigurationError, isFileNotFound } from './errors';
import type { Diagnostics } from './diagnostics';

/** Calibration: missing file yields `{}`, anything but a JSON object is fatal. */
export async function loadCalibration(path: string, diagnostics: Diagnostics): Promise<Record<string, unknown>> {
  diagnostics.info(`Loading calibration file from ${path}`);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isFileNotFound(err)) {
      diagnostics.warn(`Calibration file ${path} does not exist`);
      return {};
    }
    throw new ConfigurationError(`Could not read calibration file ${path}`, { cause: err });
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Calibration file ${path} is not valid JSON`, { cause: err });
  }
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigurationError(`Calibration file ${path} must contain a JSON object`);
  }
  diagnostics.debug('Calibration data loaded', { keys: Object.keys(data) });
  return { ...data };
}

/** Static metadata: never fatal. Missing or unparsable files yield `{}`. */
export async function loadMetadata(path: string, diagnostics: Diagnostics): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isFileNotFound(err)) {
      diagnostics.warn(`Metadata file ${path} was not found; ignoring`);
    } else {
      diagnostics.error(`Could not read metadata file ${path}`, { error: String(err) });
    }
    return {};
  }
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data === 'object' && data !== null && !Array.isArray(data)) return { ...data };
    diagnostics.error(`Metadata file ${path} must contain a JSON object; ignoring`);
  } catch (err) {
    diagnostics.error(`Failed to parse metadata JSON from ${path}`, { error: String(err) });
  }
  return {};
}
