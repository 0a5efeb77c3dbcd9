#!/usr/bin/env node
import { loadConfig, type HeadsetConfig } from '../config.js';
import { Headset } from '../headset.js';
import { AncMode, EQUALIZER_BAND_KEYS } from '../protocol/command.js';
import type { Payload } from '../protocol/payload.js';
import type { HeadsetState } from '../state/headset-store.js';
import { openTransport } from '../transport.js';
import { createLogger } from '../util/logger.js';
import {
  PRESET_NAMES,
  parseAmbientLevel,
  parseAncMode,
  parseArgs,
  parseBands,
  parseBoolean,
  parsePreset,
} from './args.js';
import { formatPayload, formatState } from './format.js';

const STATUS_TIMEOUT_MS = 5000;
const REPLY_TIMEOUT_MS = 3000;

function usage(): void {
  console.log('Usage: headset <command> [args] [--device <path|tcp://host:port>]');
  console.log('');
  console.log('Commands:');
  console.log('  status                         Show battery, equalizer, ANC and codec');
  console.log('  monitor                        Print everything the headset reports');
  console.log(`  anc <${Object.values(AncMode).join('|')}> [level] [voice on|off]`);
  console.log(`  eq <preset>                    One of: ${PRESET_NAMES.join(', ')}`);
  console.log(`  bands <${EQUALIZER_BAND_KEYS.join(' ')}>   Each -10..10`);
  console.log('  pressure                       Stream sound pressure until Ctrl+C');
  console.log('');
  console.log('The device defaults to $HEADSET_DEVICE. Set HEADSET_DEBUG=1 for protocol traces.');
}

/** Resolve once `predicate` holds for the store, or with false after `timeoutMs`. */
function waitForState(
  headset: Headset,
  predicate: (state: HeadsetState) => boolean,
  timeoutMs: number,
): Promise<boolean> {
  return new Promise((resolve) => {
    if (predicate(headset.state)) {
      resolve(true);
      return;
    }
    const onChange = (state: HeadsetState): void => {
      if (predicate(state)) {
        clearTimeout(timer);
        headset.off('change', onChange);
        resolve(true);
      }
    };
    const timer = setTimeout(() => {
      headset.off('change', onChange);
      resolve(false);
    }, timeoutMs);
    headset.on('change', onChange);
  });
}

function untilInterrupted(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
  });
}

async function withHeadset(
  config: Readonly<HeadsetConfig>,
  action: (headset: Headset) => Promise<void>,
): Promise<void> {
  if (!config.device) {
    throw new Error('No device given. Pass --device or set HEADSET_DEVICE.');
  }
  console.log(`Connecting to ${config.device}...`);
  const transport = await openTransport(config.device);
  const headset = new Headset(transport, {
    ...config,
    logger: createLogger('headset', { debug: config.debug }),
  });
  const done = headset.run();

  try {
    const connected = waitForState(headset, (state) => state.connected, config.initTimeoutMs * (config.initRetries + 1) + REPLY_TIMEOUT_MS);
    await Promise.race([connected, done]);
    if (!headset.state.connected) {
      throw new Error('Headset did not answer');
    }
    await Promise.race([action(headset), done]);
  } finally {
    headset.close();
    await done;
    transport.destroy();
  }
}

async function cmdStatus(headset: Headset): Promise<void> {
  const complete = await waitForState(
    headset,
    (state) =>
      state.leftBattery !== undefined &&
      state.caseBattery !== undefined &&
      state.equalizer !== undefined &&
      state.anc !== undefined &&
      state.codec !== undefined,
    STATUS_TIMEOUT_MS,
  );
  if (!complete) {
    console.log('Some values were not reported in time.');
  }
  console.log(formatState(headset.state));
}

async function cmdMonitor(headset: Headset): Promise<void> {
  headset.on('payload', (payload: Payload) => console.log(formatPayload(payload)));
  console.log('Monitoring. Press Ctrl+C to stop.');
  await untilInterrupted();
}

async function cmdAnc(headset: Headset, args: string[]): Promise<void> {
  const [modeArg, levelArg, voiceArg] = args;
  if (modeArg === undefined) {
    throw new Error(`Usage: headset anc <${Object.values(AncMode).join('|')}> [level] [voice on|off]`);
  }
  const mode = parseAncMode(modeArg);
  const ambientLevel = levelArg === undefined ? undefined : parseAmbientLevel(levelArg);
  const voiceFiltering = voiceArg === undefined ? undefined : parseBoolean(voiceArg);

  // the current level is needed as the default
  await waitForState(headset, (state) => state.anc !== undefined, REPLY_TIMEOUT_MS);
  headset.setAnc(mode, { ambientLevel, voiceFiltering });
  await waitForState(headset, (state) => state.anc?.mode === mode, REPLY_TIMEOUT_MS);
  console.log(formatState(headset.state));
}

async function cmdEq(headset: Headset, args: string[]): Promise<void> {
  const [name] = args;
  if (name === undefined) {
    throw new Error(`Usage: headset eq <preset>. Available: ${PRESET_NAMES.join(', ')}`);
  }
  const preset = parsePreset(name);
  headset.setEqualizerPreset(preset);
  headset.send({ kind: 'GetEqualizerSettings' });
  await waitForState(headset, (state) => state.equalizer?.preset === preset, REPLY_TIMEOUT_MS);
  console.log(formatState(headset.state));
}

async function cmdBands(headset: Headset, args: string[]): Promise<void> {
  const bands = parseBands(args);
  headset.setEqualizerBands(bands);
  headset.send({ kind: 'GetEqualizerSettings' });
  await waitForState(
    headset,
    (state) => EQUALIZER_BAND_KEYS.every((key) => state.equalizer?.bands[key] === bands[key]),
    REPLY_TIMEOUT_MS,
  );
  console.log(formatState(headset.state));
}

async function cmdPressure(headset: Headset): Promise<void> {
  headset.on('payload', (payload: Payload) => {
    if (payload.kind === 'SoundPressure') {
      console.log(`${payload.db} dB`);
    }
  });
  headset.startSoundPressure();
  console.log('Measuring sound pressure. Press Ctrl+C to stop.');
  await untilInterrupted();
  headset.stopSoundPressure();
  await waitForState(headset, (state) => !state.soundPressureMeasuring, REPLY_TIMEOUT_MS);
}

async function main(): Promise<void> {
  const { command, args, device } = parseArgs(process.argv.slice(2));
  const env = loadConfig();
  const config: Readonly<HeadsetConfig> = { ...env, device: device ?? env.device };

  switch (command) {
    case 'status':
      await withHeadset(config, cmdStatus);
      break;
    case 'monitor':
      await withHeadset(config, cmdMonitor);
      break;
    case 'anc':
      await withHeadset(config, (headset) => cmdAnc(headset, args));
      break;
    case 'eq':
      await withHeadset(config, (headset) => cmdEq(headset, args));
      break;
    case 'bands':
      await withHeadset(config, (headset) => cmdBands(headset, args));
      break;
    case 'pressure':
      await withHeadset(config, cmdPressure);
      break;
    case undefined:
    case 'help':
    case '--help':
      usage();
      break;
    default:
      console.log(`Unknown command: ${command}`);
      usage();
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
