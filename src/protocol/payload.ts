import { MessageType } from './constants.js';
import {
  AncMode,
  BatteryType,
  EQUALIZER_BAND_KEYS,
  EqualizerPreset,
  MAX_BAND_LEVEL,
  batteryTypeFromByte,
  equalizerPresetFromByte,
  type EqualizerBands,
} from './command.js';

export enum PayloadType {
  InitReply = 'InitReply',
  BatteryLevel = 'BatteryLevel',
  BatteryLevelNotify = 'BatteryLevelNotify',
  Equalizer = 'Equalizer',
  EqualizerNotify = 'EqualizerNotify',
  AncStatus = 'AncStatus',
  AncStatusNotify = 'AncStatusNotify',
  CodecGet = 'CodecGet',
  CodecNotify = 'CodecNotify',
  SoundPressureMeasureReply = 'SoundPressureMeasureReply',
  PressureGet = 'PressureGet',
}

// The same tag byte means different things in the two command namespaces.
const PAYLOAD_TYPES: Readonly<Record<MessageType, ReadonlyMap<number, PayloadType>>> = {
  [MessageType.Ack]: new Map<number, PayloadType>(),
  [MessageType.Command1]: new Map([
    [0x01, PayloadType.InitReply],
    [0x13, PayloadType.CodecGet],
    [0x15, PayloadType.CodecNotify],
    [0x23, PayloadType.BatteryLevel],
    [0x25, PayloadType.BatteryLevelNotify],
    [0x57, PayloadType.Equalizer],
    [0x59, PayloadType.EqualizerNotify],
    [0x67, PayloadType.AncStatus],
    [0x69, PayloadType.AncStatusNotify],
  ]),
  [MessageType.Command2]: new Map([
    // seen as 3e 0e 00 00 00 00 04 59 03 01 00 6f 3c
    [0x59, PayloadType.SoundPressureMeasureReply],
    // seen as 3e 0e 01 00 00 00 04 5b 03 42 03 b6 3c
    [0x5b, PayloadType.PressureGet],
  ]),
};

export function payloadTypeFromByte(messageType: MessageType, byte: number): PayloadType | undefined {
  return PAYLOAD_TYPES[messageType].get(byte);
}

const MIN_PAYLOAD_SIZE: Record<PayloadType, number> = {
  [PayloadType.InitReply]: 1,
  [PayloadType.BatteryLevel]: 5,
  [PayloadType.BatteryLevelNotify]: 5,
  [PayloadType.Equalizer]: 10,
  [PayloadType.EqualizerNotify]: 10,
  [PayloadType.AncStatus]: 7,
  [PayloadType.AncStatusNotify]: 7,
  [PayloadType.CodecGet]: 3,
  [PayloadType.CodecNotify]: 3,
  [PayloadType.SoundPressureMeasureReply]: 4,
  [PayloadType.PressureGet]: 3,
};

export function minPayloadSize(payloadType: PayloadType): number {
  return MIN_PAYLOAD_SIZE[payloadType];
}

export enum Codec {
  Unknown = 0x00,
  Sbc = 0x01,
  Aac = 0x02,
  Ldac = 0x10,
  Aptx = 0x20,
  AptxHd = 0x21,
}

const CODEC_NAMES: ReadonlyMap<number, string> = new Map<number, string>([
  [Codec.Unknown, 'unknown'],
  [Codec.Sbc, 'SBC'],
  [Codec.Aac, 'AAC'],
  [Codec.Ldac, 'LDAC'],
  [Codec.Aptx, 'APTX'],
  [Codec.AptxHd, 'APTX HD'],
]);

const CODECS = new Map<number, Codec>(
  Object.values(Codec)
    .filter((value): value is Codec => typeof value === 'number')
    .map((codec): [number, Codec] => [codec, codec]),
);

export function codecFromByte(byte: number): Codec | undefined {
  return CODECS.get(byte);
}

export function codecName(codec: Codec): string {
  return CODEC_NAMES.get(codec) ?? 'unknown';
}

export type BatteryLevel =
  | { kind: 'Case'; level: number }
  | { kind: 'Headphones'; left: number; right: number };

export type Payload =
  | { kind: 'InitReply' }
  | { kind: 'BatteryLevel'; battery: BatteryLevel }
  | { kind: 'Equalizer'; preset: EqualizerPreset; bands: EqualizerBands }
  | { kind: 'AncStatus'; mode: AncMode; voicePassthrough: boolean; ambientLevel: number }
  | { kind: 'Codec'; codec: Codec }
  | { kind: 'SoundPressureMeasureReply'; isOn: boolean }
  | { kind: 'SoundPressure'; db: number };

export type PayloadErrorDetail =
  | { code: 'Empty' }
  | { code: 'UnknownPayloadType'; kind: number }
  | { code: 'UnknownBatteryType'; battery: number }
  | { code: 'UnknownEqualizerPreset'; preset: number }
  | { code: 'UnknownCodec'; codec: number }
  | { code: 'PayloadTooSmall'; payloadType: PayloadType };

function hex(byte: number): string {
  return `0x${byte.toString(16)}`;
}

function describePayloadError(detail: PayloadErrorDetail): string {
  switch (detail.code) {
    case 'Empty': return 'The given payload is empty';
    case 'UnknownPayloadType': return `Unknown payload type: ${hex(detail.kind)}`;
    case 'UnknownBatteryType': return `Unknown battery type: ${hex(detail.battery)}`;
    case 'UnknownEqualizerPreset': return `Unknown equalizer preset: ${hex(detail.preset)}`;
    case 'UnknownCodec': return `Unknown codec: ${hex(detail.codec)}`;
    case 'PayloadTooSmall': return `Payload is too small for payload of type ${detail.payloadType}`;
  }
}

export class PayloadError extends Error {
  constructor(readonly detail: PayloadErrorDetail) {
    super(describePayloadError(detail));
    this.name = 'PayloadError';
  }
}

function toInt8(byte: number): number {
  return (byte << 24) >> 24;
}

/**
 * Decode the payload of a Command1/Command2 frame.
 * Throws a {@link PayloadError} for anything that cannot be fully decoded.
 */
export function parsePayload(payload: Uint8Array, messageType: MessageType): Payload {
  if (payload.length === 0) {
    throw new PayloadError({ code: 'Empty' });
  }

  const payloadType = payloadTypeFromByte(messageType, payload[0]);
  if (payloadType === undefined) {
    throw new PayloadError({ code: 'UnknownPayloadType', kind: payload[0] });
  }
  if (payload.length < minPayloadSize(payloadType)) {
    throw new PayloadError({ code: 'PayloadTooSmall', payloadType });
  }

  switch (payloadType) {
    case PayloadType.InitReply:
      return { kind: 'InitReply' };

    case PayloadType.BatteryLevel:
    case PayloadType.BatteryLevelNotify: {
      const batteryType = batteryTypeFromByte(payload[1]);
      if (batteryType === undefined) {
        throw new PayloadError({ code: 'UnknownBatteryType', battery: payload[1] });
      }
      const battery: BatteryLevel = batteryType === BatteryType.Case
        ? { kind: 'Case', level: payload[2] }
        : { kind: 'Headphones', left: payload[2], right: payload[4] };
      return { kind: 'BatteryLevel', battery };
    }

    case PayloadType.Equalizer:
    case PayloadType.EqualizerNotify: {
      const preset = equalizerPresetFromByte(payload[2]);
      if (preset === undefined) {
        throw new PayloadError({ code: 'UnknownEqualizerPreset', preset: payload[2] });
      }
      const [clearBass, band400, band1000, band2500, band6300, band16000] = EQUALIZER_BAND_KEYS.map(
        (_, i) => toInt8(payload[4 + i]) - MAX_BAND_LEVEL,
      );
      return {
        kind: 'Equalizer',
        preset,
        bands: { clearBass, band400, band1000, band2500, band6300, band16000 },
      };
    }

    case PayloadType.AncStatus:
    case PayloadType.AncStatusNotify: {
      let mode: AncMode;
      if (payload[3] === 0) {
        mode = AncMode.Off;
      } else if (payload[4] === 0) {
        mode = AncMode.ActiveNoiseCanceling;
      } else {
        mode = AncMode.AmbientSound;
      }
      return {
        kind: 'AncStatus',
        mode,
        voicePassthrough: payload[5] === 1,
        ambientLevel: payload[6],
      };
    }

    case PayloadType.CodecGet:
    case PayloadType.CodecNotify: {
      const codec = codecFromByte(payload[2]);
      if (codec === undefined) {
        throw new PayloadError({ code: 'UnknownCodec', codec: payload[2] });
      }
      return { kind: 'Codec', codec };
    }

    // on:  59 03 01 00
    // off: 59 03 01 01
    case PayloadType.SoundPressureMeasureReply:
      return { kind: 'SoundPressureMeasureReply', isOn: payload[3] === 0 };

    // The reading sits between two 0x03 bytes whose meaning is not known.
    case PayloadType.PressureGet:
      return { kind: 'SoundPressure', db: payload[2] };
  }
}
