import { MessageType } from './constants.js';

export enum EqualizerPreset {
  Off = 0x00,
  Bright = 0x10,
  Excited = 0x11,
  Mellow = 0x12,
  Relaxed = 0x13,
  Vocal = 0x14,
  TrebleBoost = 0x15,
  BassBoost = 0x16,
  Speech = 0x17,
  Manual = 0xa0,
  Custom1 = 0xa1,
  Custom2 = 0xa2,
}

const EQUALIZER_PRESETS = new Map<number, EqualizerPreset>(
  Object.values(EqualizerPreset)
    .filter((value): value is EqualizerPreset => typeof value === 'number')
    .map((preset): [number, EqualizerPreset] => [preset, preset]),
);

export function equalizerPresetFromByte(byte: number): EqualizerPreset | undefined {
  return EQUALIZER_PRESETS.get(byte);
}

export enum AncMode {
  Off = 'off',
  ActiveNoiseCanceling = 'anc',
  AmbientSound = 'ambient',
}

export enum BatteryType {
  Headphones = 0x01,
  Case = 0x0a,
}

export function batteryTypeFromByte(byte: number): BatteryType | undefined {
  switch (byte) {
    // some firmware revisions report the earbuds as 0x09
    case 0x01:
    case 0x09:
      return BatteryType.Headphones;
    case 0x0a:
      return BatteryType.Case;
    default:
      return undefined;
  }
}

/** Levels of the six equalizer bands, each in [-10, 10]. */
export interface EqualizerBands {
  clearBass: number;
  band400: number;
  band1000: number;
  band2500: number;
  band6300: number;
  band16000: number;
}

export const EQUALIZER_BAND_KEYS = [
  'clearBass',
  'band400',
  'band1000',
  'band2500',
  'band6300',
  'band16000',
] as const satisfies ReadonlyArray<keyof EqualizerBands>;

export const MAX_AMBIENT_LEVEL = 20;
export const MAX_BAND_LEVEL = 10;

export type Command =
  | { kind: 'Init' }
  | { kind: 'Ack' }
  | {
    kind: 'AncSet';
    draggingAmbientSlider: boolean;
    mode: AncMode;
    voiceFiltering: boolean;
    ambientLevel: number;
  }
  | { kind: 'GetAncStatus' }
  | { kind: 'ChangeEqualizerPreset'; preset: EqualizerPreset }
  | { kind: 'ChangeEqualizerSetting'; bands: EqualizerBands; preset?: EqualizerPreset }
  | { kind: 'GetBatteryStatus'; batteryType: BatteryType }
  | { kind: 'GetEqualizerSettings' }
  | { kind: 'GetCodec' }
  | { kind: 'SoundPressureMeasure'; on: boolean }
  | { kind: 'GetSoundPressure' };

export type CommandKind = Command['kind'];

// Opcodes
const EQUALIZER_SET = 0x58;
const EQUALIZER_GET = 0x56;
const ANC_SET = 0x68;
const ANC_STATUS_GET = 0x66;
const SUPPORTS_AMBIENT_SOUND_CONTROL_2 = 0x17;
const BATTERY_STATUS_GET = 0x22;
const CODEC_GET = 0x12;
// Command2 namespace
const SOUND_PRESSURE_SET = 0x58;
const SOUND_PRESSURE_GET = 0x5a;
const SOUND_PRESSURE_INQUIRED_TYPE = 0x03;

function assertAmbientLevel(level: number): void {
  if (!Number.isInteger(level) || level < 0 || level > MAX_AMBIENT_LEVEL) {
    throw new RangeError(`ambient sound level must be an integer in 0..${MAX_AMBIENT_LEVEL}, got ${level}`);
  }
}

function assertBandLevel(name: string, level: number): void {
  if (!Number.isInteger(level) || Math.abs(level) > MAX_BAND_LEVEL) {
    throw new RangeError(`equalizer ${name} must be an integer in -${MAX_BAND_LEVEL}..${MAX_BAND_LEVEL}, got ${level}`);
  }
}

/**
 * Encode the body (opcode + parameters) of a command, without any framing.
 * Out-of-range levels are caller bugs and throw a RangeError.
 */
export function encodeCommand(command: Command): Buffer {
  switch (command.kind) {
    case 'Init':
      return Buffer.from([0x00, 0x00]);

    case 'Ack':
      return Buffer.alloc(0);

    case 'AncSet': {
      assertAmbientLevel(command.ambientLevel);
      return Buffer.from([
        ANC_SET,
        SUPPORTS_AMBIENT_SOUND_CONTROL_2,
        command.draggingAmbientSlider ? 0 : 1,
        command.mode === AncMode.Off ? 0 : 1,
        command.mode === AncMode.AmbientSound ? 1 : 0,
        command.voiceFiltering ? 1 : 0,
        command.ambientLevel,
      ]);
    }

    case 'GetAncStatus':
      return Buffer.from([ANC_STATUS_GET, SUPPORTS_AMBIENT_SOUND_CONTROL_2]);

    case 'ChangeEqualizerPreset':
      return Buffer.from([EQUALIZER_SET, 0x00, command.preset, 0x00]);

    case 'ChangeEqualizerSetting': {
      const levels = EQUALIZER_BAND_KEYS.map((key) => {
        assertBandLevel(key, command.bands[key]);
        return command.bands[key] + MAX_BAND_LEVEL;
      });
      return Buffer.from([
        EQUALIZER_SET,
        0x00,
        command.preset ?? EqualizerPreset.Manual,
        levels.length,
        ...levels,
      ]);
    }

    case 'GetBatteryStatus':
      return Buffer.from([BATTERY_STATUS_GET, command.batteryType]);

    case 'GetEqualizerSettings':
      return Buffer.from([EQUALIZER_GET, 0x00]);

    case 'GetCodec':
      return Buffer.from([CODEC_GET, 0x02]);

    case 'SoundPressureMeasure':
      // mirrors the 0x59 reply layout, where byte 3 == 0 means "on"
      return Buffer.from([SOUND_PRESSURE_SET, SOUND_PRESSURE_INQUIRED_TYPE, 0x01, command.on ? 0x00 : 0x01]);

    case 'GetSoundPressure':
      return Buffer.from([SOUND_PRESSURE_GET, SOUND_PRESSURE_INQUIRED_TYPE]);

    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
    }
  }
}

/** Which message type namespace a command is sent in. */
export function commandMessageType(command: Command): MessageType {
  switch (command.kind) {
    case 'Ack':
      return MessageType.Ack;
    case 'SoundPressureMeasure':
    case 'GetSoundPressure':
      return MessageType.Command2;
    default:
      return MessageType.Command1;
  }
}

export function describeCommand(command: Command): string {
  switch (command.kind) {
    case 'AncSet':
      return `AncSet(${command.mode}, level=${command.ambientLevel}, voice=${command.voiceFiltering})`;
    case 'ChangeEqualizerPreset':
      return `ChangeEqualizerPreset(${EqualizerPreset[command.preset]})`;
    case 'ChangeEqualizerSetting':
      return `ChangeEqualizerSetting(${EQUALIZER_BAND_KEYS.map((k) => command.bands[k]).join(',')})`;
    case 'GetBatteryStatus':
      return `GetBatteryStatus(${BatteryType[command.batteryType]})`;
    case 'SoundPressureMeasure':
      return `SoundPressureMeasure(${command.on ? 'on' : 'off'})`;
    default:
      return command.kind;
  }
}
