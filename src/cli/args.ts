import {
  AncMode,
  EQUALIZER_BAND_KEYS,
  EqualizerPreset,
  MAX_AMBIENT_LEVEL,
  MAX_BAND_LEVEL,
  type EqualizerBands,
} from '../protocol/command.js';

export interface CliArgs {
  command: string | undefined;
  args: string[];
  device: string | undefined;
}

/** Split argv into the command, its arguments and `--device`/`-d`. */
export function parseArgs(argv: string[]): CliArgs {
  const rest: string[] = [];
  let device: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--device' || arg === '-d') {
      device = argv[++i];
      if (device === undefined) {
        throw new Error(`${arg} needs a value`);
      }
    } else if (arg.startsWith('--device=')) {
      device = arg.slice('--device='.length);
    } else {
      rest.push(arg);
    }
  }
  const [command, ...args] = rest;
  return { command, args, device };
}

const PRESETS = new Map<string, EqualizerPreset>(
  Object.entries(EqualizerPreset)
    .filter((entry): entry is [string, EqualizerPreset] => typeof entry[1] === 'number')
    .map(([name, preset]): [string, EqualizerPreset] => [name.toLowerCase(), preset]),
);

export const PRESET_NAMES: readonly string[] = [...PRESETS.keys()];

export function parsePreset(name: string): EqualizerPreset {
  const preset = PRESETS.get(name.toLowerCase());
  if (preset === undefined) {
    throw new Error(`Unknown preset: ${name}. Available: ${PRESET_NAMES.join(', ')}`);
  }
  return preset;
}

export function parseAncMode(name: string): AncMode {
  const mode = Object.values(AncMode).find((m) => m === name.toLowerCase());
  if (mode === undefined) {
    throw new Error(`Unknown ANC mode: ${name}. Available: ${Object.values(AncMode).join(', ')}`);
  }
  return mode;
}

function parseInteger(value: string, what: string, min: number, max: number): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`${what} must be an integer in ${min}..${max}, got "${value}"`);
  }
  return parsed;
}

export function parseAmbientLevel(value: string): number {
  return parseInteger(value, 'ambient level', 0, MAX_AMBIENT_LEVEL);
}

export function parseBoolean(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
    case 'yes':
    case '1':
      return true;
    case 'off':
    case 'false':
    case 'no':
    case '0':
      return false;
    default:
      throw new Error(`Expected on/off, got "${value}"`);
  }
}

export function parseBands(values: string[]): EqualizerBands {
  if (values.length !== EQUALIZER_BAND_KEYS.length) {
    throw new Error(`Expected ${EQUALIZER_BAND_KEYS.length} band levels (${EQUALIZER_BAND_KEYS.join(' ')}), got ${values.length}`);
  }
  const [clearBass, band400, band1000, band2500, band6300, band16000] = values.map((value, i) =>
    parseInteger(value, EQUALIZER_BAND_KEYS[i], -MAX_BAND_LEVEL, MAX_BAND_LEVEL),
  );
  return { clearBass, band400, band1000, band2500, band6300, band16000 };
}
