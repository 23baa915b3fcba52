import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from './errors';
import { loadCalibration, loadMetadata } from './metadataFiles';
import { fakeDiagnostics } from './testing';

describe('calibration and metadata files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seatstream-meta-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('yields empty calibration with a warning when the file is missing', async () => {
    const diagnostics = fakeDiagnostics();
    await expect(loadCalibration(join(dir, 'missing.json'), diagnostics)).resolves.toEqual({});
    expect(diagnostics.warn).toHaveBeenCalledWith(`Calibration file ${join(dir, 'missing.json')} does not exist`);
  });

  it('loads a calibration object', async () => {
    const path = join(dir, 'calibration.json');
    await writeFile(path, JSON.stringify({ scale: 1.25, floorY: -0.1 }));
    await expect(loadCalibration(path, fakeDiagnostics())).resolves.toEqual({ scale: 1.25, floorY: -0.1 });
  });

  it('treats malformed calibration as a configuration error', async () => {
    const path = join(dir, 'calibration.json');
    await writeFile(path, '[1, 2]');
    await expect(loadCalibration(path, fakeDiagnostics())).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('never fails on metadata, logging instead', async () => {
    const path = join(dir, 'meta.json');
    await writeFile(path, '{ nope');
    const diagnostics = fakeDiagnostics();
    await expect(loadMetadata(path, diagnostics)).resolves.toEqual({});
    expect(diagnostics.error).toHaveBeenCalledTimes(1);
    await expect(loadMetadata(join(dir, 'none.json'), diagnostics)).resolves.toEqual({});
    expect(diagnostics.warn).toHaveBeenCalledTimes(1);
  });
});
