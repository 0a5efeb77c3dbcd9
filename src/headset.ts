import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';
import { DEFAULT_CONFIG } from './config.js';
import {
  AncMode,
  MAX_AMBIENT_LEVEL,
  type Command,
  type EqualizerBands,
  type EqualizerPreset,
} from './protocol/command.js';
import type { Payload } from './protocol/payload.js';
import { HeadsetSession, type SessionOptions } from './session.js';
import {
  batteryQueries,
  createHeadsetStore,
  followUpCommands,
  type HeadsetState,
  type HeadsetStore,
} from './state/headset-store.js';

export interface HeadsetOptions extends SessionOptions {
  batteryPollMs?: number;
  pressurePollMs?: number;
  store?: HeadsetStore;
}

export interface AncOptions {
  /** defaults to the level last reported by the headset, capped at MAX_AMBIENT_LEVEL */
  ambientLevel?: number;
  voiceFiltering?: boolean;
  /** true while the user is still moving the level slider */
  draggingAmbientSlider?: boolean;
}

/**
 * High-level controller: runs a session, keeps the store up to date, sends the
 * usual follow-up queries and polls battery and sound pressure.
 *
 * Events: `payload` (Payload), `change` (state, previous), `close`, `error` (Error).
 */
export class Headset extends EventEmitter {
  readonly store: HeadsetStore;
  private readonly session: HeadsetSession;
  private readonly batteryPollMs: number;
  private readonly pressurePollMs: number;
  private batteryTimer?: ReturnType<typeof setInterval>;
  private pressureTimer?: ReturnType<typeof setInterval>;
  private running = false;

  constructor(transport: Duplex, options: HeadsetOptions = {}) {
    super();
    this.session = new HeadsetSession(transport, options);
    this.store = options.store ?? createHeadsetStore();
    this.batteryPollMs = options.batteryPollMs ?? DEFAULT_CONFIG.batteryPollMs;
    this.pressurePollMs = options.pressurePollMs ?? DEFAULT_CONFIG.pressurePollMs;
  }

  get state(): HeadsetState {
    return this.store.getState();
  }

  /** Resolves when the connection ends; rejects with the SessionError that ended it. */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Headset is already running');
    }
    this.running = true;
    const unsubscribe = this.store.subscribe((state, previous) => {
      this.emit('change', state, previous);
    });

    try {
      await Promise.all([this.session.run(), this.consume()]);
    } catch (err) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
      throw err;
    } finally {
      this.stopBatteryPolling();
      this.stopPressurePolling();
      this.store.getState().setConnected(false);
      unsubscribe();
      this.emit('close');
    }
  }

  close(): void {
    this.session.stop();
  }

  /** Queue a raw command. Returns false once the connection has ended. */
  send(command: Command): boolean {
    return this.session.send(command);
  }

  setAnc(mode: AncMode, options: AncOptions = {}): boolean {
    const current = this.state.anc;
    return this.send({
      kind: 'AncSet',
      mode,
      ambientLevel: options.ambientLevel ?? Math.min(current?.ambientLevel ?? MAX_AMBIENT_LEVEL, MAX_AMBIENT_LEVEL),
      voiceFiltering: options.voiceFiltering ?? current?.voicePassthrough ?? false,
      draggingAmbientSlider: options.draggingAmbientSlider ?? false,
    });
  }

  setEqualizerPreset(preset: EqualizerPreset): boolean {
    return this.send({ kind: 'ChangeEqualizerPreset', preset });
  }

  setEqualizerBands(bands: EqualizerBands, preset?: EqualizerPreset): boolean {
    return this.send({ kind: 'ChangeEqualizerSetting', bands, preset });
  }

  startSoundPressure(): boolean {
    return this.send({ kind: 'SoundPressureMeasure', on: true });
  }

  stopSoundPressure(): boolean {
    this.stopPressurePolling();
    return this.send({ kind: 'SoundPressureMeasure', on: false });
  }

  refreshBattery(): boolean {
    this.store.getState().markBatteryPoll(Date.now());
    return batteryQueries().every((command) => this.send(command));
  }

  private async consume(): Promise<void> {
    try {
      for await (const payload of this.session.payloads) {
        this.handlePayload(payload);
      }
    } catch (err) {
      this.session.stop();
      throw err;
    }
  }

  private handlePayload(payload: Payload): void {
    this.store.getState().applyPayload(payload);
    this.emit('payload', payload);

    for (const command of followUpCommands(payload)) {
      this.send(command);
    }

    switch (payload.kind) {
      case 'InitReply':
        this.store.getState().markBatteryPoll(Date.now());
        this.startBatteryPolling();
        break;
      case 'SoundPressureMeasureReply':
        if (payload.isOn) {
          this.startPressurePolling();
        } else {
          this.stopPressurePolling();
        }
        break;
      default:
        break;
    }
  }

  private startBatteryPolling(): void {
    this.stopBatteryPolling();
    this.batteryTimer = setInterval(() => {
      this.refreshBattery();
    }, this.batteryPollMs);
  }

  private stopBatteryPolling(): void {
    if (this.batteryTimer) {
      clearInterval(this.batteryTimer);
      this.batteryTimer = undefined;
    }
  }

  private startPressurePolling(): void {
    this.stopPressurePolling();
    this.pressureTimer = setInterval(() => {
      this.send({ kind: 'GetSoundPressure' });
    }, this.pressurePollMs);
  }

  private stopPressurePolling(): void {
    if (this.pressureTimer) {
      clearInterval(this.pressureTimer);
      this.pressureTimer = undefined;
    }
  }
}
