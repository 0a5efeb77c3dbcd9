import { describe, it, expect } from 'vitest';
import { AncMode, EqualizerPreset } from '../../protocol/command.js';
import { Codec } from '../../protocol/payload.js';
import { INITIAL_HEADSET_DATA } from '../../state/headset-store.js';
import { formatPayload, formatState } from '../format.js';

const BANDS = { clearBass: -10, band400: -5, band1000: 0, band2500: 3, band6300: 7, band16000: 10 };

describe('formatPayload', () => {
  it('describes each payload on one line', () => {
    expect(formatPayload({ kind: 'BatteryLevel', battery: { kind: 'Headphones', left: 85, right: 0 } }))
      .toBe('battery: left 85%, right 0%');
    expect(formatPayload({ kind: 'BatteryLevel', battery: { kind: 'Case', level: 40 } }))
      .toBe('battery: case 40%');
    expect(formatPayload({ kind: 'Equalizer', preset: EqualizerPreset.Bright, bands: BANDS }))
      .toBe('equalizer: Bright clearBass=-10 band400=-5 band1000=0 band2500=3 band6300=7 band16000=10');
    expect(formatPayload({ kind: 'AncStatus', mode: AncMode.AmbientSound, voicePassthrough: true, ambientLevel: 15 }))
      .toBe('anc: ambient, ambient level 15, voice on');
    expect(formatPayload({ kind: 'Codec', codec: Codec.Ldac })).toBe('codec: LDAC');
    expect(formatPayload({ kind: 'SoundPressure', db: 66 })).toBe('sound pressure: 66 dB');
  });
});

describe('formatState', () => {
  it('shows unknown battery levels', () => {
    expect(formatState(INITIAL_HEADSET_DATA)).toBe('Battery:    left ?, right ?, case ?');
  });

  it('lists what the headset reported', () => {
    expect(formatState({
      ...INITIAL_HEADSET_DATA,
      leftBattery: 80,
      rightBattery: 70,
      caseBattery: 50,
      codec: Codec.Aac,
      anc: { mode: AncMode.Off, voicePassthrough: false, ambientLevel: 0 },
    })).toBe([
      'Battery:    left 80%, right 70%, case 50%',
      'ANC:        off, ambient level 0, voice off',
      'Codec:      AAC',
    ].join('\n'));
  });
});
