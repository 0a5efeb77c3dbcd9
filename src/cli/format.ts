import { EQUALIZER_BAND_KEYS, EqualizerPreset, type EqualizerBands } from '../protocol/command.js';
import { codecName, type Payload } from '../protocol/payload.js';
import type { HeadsetData } from '../state/headset-store.js';

function formatLevel(level: number | undefined): string {
  return level === undefined ? '?' : `${level}%`;
}

function onOff(value: boolean): string {
  return value ? 'on' : 'off';
}

export function formatBands(bands: EqualizerBands): string {
  return EQUALIZER_BAND_KEYS.map((key) => `${key}=${bands[key]}`).join(' ');
}

export function formatPayload(payload: Payload): string {
  switch (payload.kind) {
    case 'InitReply':
      return 'init reply';
    case 'BatteryLevel':
      return payload.battery.kind === 'Case'
        ? `battery: case ${payload.battery.level}%`
        : `battery: left ${payload.battery.left}%, right ${payload.battery.right}%`;
    case 'Equalizer':
      return `equalizer: ${EqualizerPreset[payload.preset]} ${formatBands(payload.bands)}`;
    case 'AncStatus':
      return `anc: ${payload.mode}, ambient level ${payload.ambientLevel}, voice ${onOff(payload.voicePassthrough)}`;
    case 'Codec':
      return `codec: ${codecName(payload.codec)}`;
    case 'SoundPressureMeasureReply':
      return `sound pressure measuring ${onOff(payload.isOn)}`;
    case 'SoundPressure':
      return `sound pressure: ${payload.db} dB`;
  }
}

export function formatState(state: HeadsetData): string {
  const lines = [
    `Battery:    left ${formatLevel(state.leftBattery)}, right ${formatLevel(state.rightBattery)}, case ${formatLevel(state.caseBattery)}`,
  ];
  if (state.equalizer) {
    lines.push(`Equalizer:  ${EqualizerPreset[state.equalizer.preset]} (${formatBands(state.equalizer.bands)})`);
  }
  if (state.anc) {
    lines.push(`ANC:        ${state.anc.mode}, ambient level ${state.anc.ambientLevel}, voice ${onOff(state.anc.voicePassthrough)}`);
  }
  if (state.codec !== undefined) {
    lines.push(`Codec:      ${codecName(state.codec)}`);
  }
  if (state.soundPressureDb !== undefined) {
    lines.push(`Pressure:   ${state.soundPressureDb} dB`);
  }
  return lines.join('\n');
}
