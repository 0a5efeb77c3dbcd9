/**
 * Runtime configuration, read from the environment.
 */

export interface HeadsetConfig {
  /** RFCOMM/serial device path or tcp://host:port */
  device: string | undefined;
  debug: boolean;
  initTimeoutMs: number;
  initRetries: number;
  batteryPollMs: number;
  pressurePollMs: number;
}

export const DEFAULT_CONFIG: Readonly<HeadsetConfig> = Object.freeze({
  device: undefined,
  debug: false,
  initTimeoutMs: 1500,
  initRetries: 3,
  batteryPollMs: 60_000,
  pressurePollMs: 1000,
});

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<HeadsetConfig> {
  return Object.freeze({
    device: env.HEADSET_DEVICE || DEFAULT_CONFIG.device,
    debug: env.HEADSET_DEBUG === '1',
    initTimeoutMs: readInt(env.HEADSET_INIT_TIMEOUT_MS, DEFAULT_CONFIG.initTimeoutMs),
    initRetries: readInt(env.HEADSET_INIT_RETRIES, DEFAULT_CONFIG.initRetries),
    batteryPollMs: readInt(env.HEADSET_BATTERY_POLL_MS, DEFAULT_CONFIG.batteryPollMs),
    pressurePollMs: readInt(env.HEADSET_PRESSURE_POLL_MS, DEFAULT_CONFIG.pressurePollMs),
  });
}
