import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every setting', () => {
    expect(loadConfig({
      HEADSET_DEVICE: '/dev/rfcomm0',
      HEADSET_DEBUG: '1',
      HEADSET_INIT_TIMEOUT_MS: '500',
      HEADSET_INIT_RETRIES: '0',
      HEADSET_BATTERY_POLL_MS: '30000',
      HEADSET_PRESSURE_POLL_MS: '250',
    })).toEqual({
      device: '/dev/rfcomm0',
      debug: true,
      initTimeoutMs: 500,
      initRetries: 0,
      batteryPollMs: 30000,
      pressurePollMs: 250,
    });
  });

  it('falls back on values that are not non-negative integers', () => {
    const config = loadConfig({
      HEADSET_DEVICE: '',
      HEADSET_DEBUG: 'yes',
      HEADSET_INIT_TIMEOUT_MS: 'soon',
      HEADSET_INIT_RETRIES: '-1',
      HEADSET_PRESSURE_POLL_MS: '1.5',
    });
    expect(config.device).toBeUndefined();
    expect(config.debug).toBe(false);
    expect(config.initTimeoutMs).toBe(1500);
    expect(config.initRetries).toBe(3);
    expect(config.pressurePollMs).toBe(1000);
  });
});
