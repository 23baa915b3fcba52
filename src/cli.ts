#!/usr/bin/env -S npx tsx
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { createCaptureService } from './app';
import { DEFAULT_SETTINGS, PROVIDER_KINDS, resolveSettings, TRANSPORT_KINDS } from './config';
import { createDiagnostics } from './diagnostics';
import { describeError } from './errors';

const STOP_TIMEOUT_MS = 5000;

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

export function createProgram(): Command {
  return new Command('seatstream')
    .description('Stream skeleton frames with seat-occupancy metadata to a game engine')
    .option('--provider <kind>', `pose source (${PROVIDER_KINDS.join(' | ')})`)
    .option('--transport <kind>', `transport (${TRANSPORT_KINDS.join(' | ')})`)
    .option('--endpoint <endpoint>', `WebSocket host:port[/path] or UDP host:port (default ${DEFAULT_SETTINGS.endpoint})`)
    .option('--frame-interval <seconds>', 'seconds between frames', parseNumber)
    .option('--calibration <path>', 'optional calibration JSON file')
    .option('--metadata <path>', 'optional static metadata JSON file')
    .option('--seating-config <path>', 'optional seating configuration JSON file')
    .option('--recording <path>', 'pose recording to replay (recording provider)')
    .option('--loop', 'loop the recording')
    .option('--playback-speed <factor>', 'recording playback speed', parseNumber)
    .option('--debug', 'enable verbose debug logging');
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  program.parse(argv);
  const opts = program.opts<Record<string, unknown>>();

  const settings = resolveSettings({
    provider: opts.provider,
    transport: opts.transport,
    endpoint: opts.endpoint,
    frameInterval: opts.frameInterval,
    calibration: opts.calibration,
    metadata: opts.metadata,
    seatingConfig: opts.seatingConfig,
    recording: opts.recording,
    loop: opts.loop,
    playbackSpeed: opts.playbackSpeed,
    debug: opts.debug,
  });
  const diagnostics = createDiagnostics('seatstream', { verbose: settings.debug });
  const { loop, controller } = await createCaptureService(settings, { diagnostics });

  const requestStop = () => {
    void controller.requestStop(STOP_TIMEOUT_MS).then((outcome) => {
      if (outcome.status !== 'applied') process.exitCode = 1;
    });
  };
  process.once('SIGINT', requestStop);
  process.once('SIGTERM', requestStop);

  try {
    await loop.run();
  } finally {
    await loop.stop();
    process.off('SIGINT', requestStop);
    process.off('SIGTERM', requestStop);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
  });
}
