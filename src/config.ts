import { z } from 'zod';
import { ConfigurationError } from './errors';

export const TRANSPORT_KINDS = ['ws', 'udp'] as const;
export const PROVIDER_KINDS = ['stdin', 'recording'] as const;

/**
 * Runtime settings for the capture service. Precedence, lowest first: defaults,
 * `SEATSTREAM_*` environment variables, CLI flags.
 */
export interface CaptureSettings {
  provider: (typeof PROVIDER_KINDS)[number];
  transport: (typeof TRANSPORT_KINDS)[number];
  /** WebSocket `host:port[/path]` or UDP `host:port`. */
  endpoint: string;
  /** Seconds between frames. */
  frameInterval: number;
  calibration: string | null;
  metadata: string | null;
  seatingConfig: string | null;
  recording: string | null;
  loop: boolean;
  playbackSpeed: number;
  debug: boolean;
}

export const DEFAULT_SETTINGS: CaptureSettings = {
  provider: 'stdin',
  transport: 'ws',
  endpoint: '0.0.0.0:9000/pose',
  frameInterval: 1 / 60,
  calibration: null,
  metadata: null,
  seatingConfig: null,
  recording: null,
  loop: false,
  playbackSpeed: 1,
  debug: false,
};

const ENV_KEYS: Record<string, keyof CaptureSettings> = {
  SEATSTREAM_PROVIDER: 'provider',
  SEATSTREAM_TRANSPORT: 'transport',
  SEATSTREAM_ENDPOINT: 'endpoint',
  SEATSTREAM_FRAME_INTERVAL: 'frameInterval',
  SEATSTREAM_CALIBRATION: 'calibration',
  SEATSTREAM_METADATA: 'metadata',
  SEATSTREAM_SEATING: 'seatingConfig',
  SEATSTREAM_RECORDING: 'recording',
  SEATSTREAM_LOOP: 'loop',
  SEATSTREAM_PLAYBACK_SPEED: 'playbackSpeed',
  SEATSTREAM_DEBUG: 'debug',
};

const flag = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const lowered = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(lowered)) return false;
  return value;
}, z.boolean());

const optionalPath = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? null : value),
  z.string().nullable()
);

const settingsSchema = z
  .object({
    provider: z.enum(PROVIDER_KINDS),
    transport: z.enum(TRANSPORT_KINDS),
    endpoint: z.string().trim().min(1),
    frameInterval: z.coerce.number().finite().nonnegative(),
    calibration: optionalPath,
    metadata: optionalPath,
    seatingConfig: optionalPath,
    recording: optionalPath,
    loop: flag,
    playbackSpeed: z.coerce.number().finite().positive(),
    debug: flag,
  })
  .refine((s) => s.provider !== 'recording' || s.recording !== null, {
    message: 'The recording provider needs a recording file',
    path: ['recording'],
  });

export type SettingsInput = Partial<Record<keyof CaptureSettings, unknown>>;

export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsInput {
  const input: SettingsInput = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined) input[key] = value;
  }
  return input;
}

const SETTING_KEYS: readonly (keyof CaptureSettings)[] = [
  'provider',
  'transport',
  'endpoint',
  'frameInterval',
  'calibration',
  'metadata',
  'seatingConfig',
  'recording',
  'loop',
  'playbackSpeed',
  'debug',
];

function withoutUndefined(input: SettingsInput): SettingsInput {
  const out: SettingsInput = {};
  for (const key of SETTING_KEYS) {
    const value = input[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function resolveSettings(cli: SettingsInput, env: NodeJS.ProcessEnv = process.env): CaptureSettings {
  const merged = { ...DEFAULT_SETTINGS, ...withoutUndefined(settingsFromEnv(env)), ...withoutUndefined(cli) };
  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid settings: ${detail}`);
  }
  return parsed.data;
}
