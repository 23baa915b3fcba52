import type { Readable } from 'node:stream';
import { CaptureController } from './capture/controller';
import { CaptureLoop } from './capture/loop';
import type { CaptureSettings } from './config';
import type { Diagnostics } from './diagnostics';
import { loadMetadata } from './metadataFiles';
import { RecordingPoseProvider } from './providers/recordingProvider';
import { StreamPoseProvider } from './providers/streamProvider';
import type { PoseProvider } from './providers/types';
import { loadSeatingLayout } from './seating/loader';
import { createTransport } from './transport';

export interface CaptureService {
  loop: CaptureLoop;
  controller: CaptureController;
}

export interface ServiceDependencies {
  diagnostics: Diagnostics;
  input?: Readable;
}

function buildProvider(settings: CaptureSettings, deps: ServiceDependencies): PoseProvider {
  const diagnostics = deps.diagnostics.child('provider');
  if (settings.provider === 'recording' && settings.recording) {
    return new RecordingPoseProvider(
      settings.recording,
      { loop: settings.loop, playbackSpeed: settings.playbackSpeed },
      diagnostics
    );
  }
  return new StreamPoseProvider(deps.input ?? process.stdin, diagnostics);
}

/**
 * Wire provider, transport, metadata and seating from resolved settings. Configuration
 * problems surface here, before anything is opened.
 */
export async function createCaptureService(
  settings: CaptureSettings,
  deps: ServiceDependencies
): Promise<CaptureService> {
  const { diagnostics } = deps;
  const transport = createTransport(settings.transport, settings.endpoint, diagnostics.child('transport'));
  const metadata = settings.metadata ? await loadMetadata(settings.metadata, diagnostics) : {};
  const seatingLayout = settings.seatingConfig
    ? await loadSeatingLayout(settings.seatingConfig, diagnostics.child('seating'))
    : null;
  const loop = new CaptureLoop({
    provider: buildProvider(settings, deps),
    transport,
    frameIntervalMs: settings.frameInterval * 1000,
    calibrationFile: settings.calibration,
    metadata,
    seatingLayout,
    diagnostics: diagnostics.child('capture'),
  });
  return { loop, controller: new CaptureController(loop, diagnostics.child('control')) };
}
