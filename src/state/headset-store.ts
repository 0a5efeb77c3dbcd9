import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  AncMode,
  BatteryType,
  type Command,
  type EqualizerBands,
  type EqualizerPreset,
} from '../protocol/command.js';
import type { Codec, Payload } from '../protocol/payload.js';

export interface EqualizerState {
  preset: EqualizerPreset;
  bands: EqualizerBands;
}

export interface AncState {
  mode: AncMode;
  voicePassthrough: boolean;
  ambientLevel: number;
}

export interface HeadsetData {
  /** true once the headset answered Init */
  connected: boolean;
  leftBattery: number | undefined;
  rightBattery: number | undefined;
  caseBattery: number | undefined;
  equalizer: EqualizerState | undefined;
  anc: AncState | undefined;
  codec: Codec | undefined;
  soundPressureDb: number | undefined;
  soundPressureMeasuring: boolean;
  /** epoch ms of the last battery query */
  lastBatteryPoll: number | undefined;
}

export interface HeadsetState extends HeadsetData {
  applyPayload(payload: Payload): void;
  setConnected(connected: boolean): void;
  markBatteryPoll(at: number): void;
  reset(): void;
}

export type HeadsetStore = StoreApi<HeadsetState>;

export const INITIAL_HEADSET_DATA: Readonly<HeadsetData> = Object.freeze({
  connected: false,
  leftBattery: undefined,
  rightBattery: undefined,
  caseBattery: undefined,
  equalizer: undefined,
  anc: undefined,
  codec: undefined,
  soundPressureDb: undefined,
  soundPressureMeasuring: false,
  lastBatteryPoll: undefined,
});

function reducePayload(payload: Payload): Partial<HeadsetData> {
  switch (payload.kind) {
    case 'InitReply':
      return { connected: true };
    case 'BatteryLevel':
      return payload.battery.kind === 'Case'
        ? { caseBattery: payload.battery.level }
        : { leftBattery: payload.battery.left, rightBattery: payload.battery.right };
    case 'Equalizer':
      return { equalizer: { preset: payload.preset, bands: { ...payload.bands } } };
    case 'AncStatus':
      return {
        anc: {
          mode: payload.mode,
          voicePassthrough: payload.voicePassthrough,
          ambientLevel: payload.ambientLevel,
        },
      };
    case 'Codec':
      return { codec: payload.codec };
    case 'SoundPressureMeasureReply':
      return payload.isOn
        ? { soundPressureMeasuring: true }
        : { soundPressureMeasuring: false, soundPressureDb: undefined };
    case 'SoundPressure':
      return { soundPressureDb: payload.db };
  }
}

export function createHeadsetStore(): HeadsetStore {
  return createStore<HeadsetState>()((set) => ({
    ...INITIAL_HEADSET_DATA,
    applyPayload: (payload) => set(reducePayload(payload)),
    setConnected: (connected) => set({ connected }),
    markBatteryPoll: (at) => set({ lastBatteryPoll: at }),
    reset: () => set({ ...INITIAL_HEADSET_DATA }),
  }));
}

export function batteryQueries(): Command[] {
  return [
    { kind: 'GetBatteryStatus', batteryType: BatteryType.Headphones },
    { kind: 'GetBatteryStatus', batteryType: BatteryType.Case },
  ];
}

/** Commands to send in reaction to a payload. */
export function followUpCommands(payload: Payload): Command[] {
  switch (payload.kind) {
    case 'InitReply':
      return [
        ...batteryQueries(),
        { kind: 'GetEqualizerSettings' },
        { kind: 'GetAncStatus' },
        { kind: 'GetCodec' },
      ];
    case 'SoundPressureMeasureReply':
      return payload.isOn ? [{ kind: 'GetSoundPressure' }] : [];
    default:
      return [];
  }
}
