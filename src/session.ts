import type { Duplex } from 'node:stream';
import { DEFAULT_CONFIG } from './config.js';
import { MessageType } from './protocol/constants.js';
import { type Command, describeCommand, encodeCommand } from './protocol/command.js';
import { buildCommand, formatBytes } from './protocol/framing.js';
import {
  FrameParser,
  describeParserError,
  describeRejectedFrame,
  type AcceptedFrame,
} from './protocol/frame-parser.js';
import { PayloadError, parsePayload, type Payload } from './protocol/payload.js';
import { Channel } from './util/channel.js';
import { createLogger, type Logger } from './util/logger.js';

export type SessionErrorCode =
  | 'HandshakeTimeout'
  | 'MalformedFrame'
  | 'TransportClosed'
  | 'TransportError';

/** Connection-level failure. The only way forward is to reconnect. */
export class SessionError extends Error {
  constructor(
    readonly code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SessionError';
  }
}

export interface SessionOptions {
  /** How long to wait for the headset to answer Init before sending it again. */
  initTimeoutMs?: number;
  /** How many times Init is re-sent before giving up. */
  initRetries?: number;
  logger?: Logger;
}

type SessionEvent =
  | { kind: 'stop' }
  | { kind: 'data'; chunk: Buffer }
  | { kind: 'end' }
  /** a command was queued */
  | { kind: 'command' };

function sleep(ms: number): { promise: Promise<'timeout'>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Drives one connection to a headset: Init handshake, then a loop that parses
 * incoming frames, acknowledges commands, forwards decoded payloads and sends
 * queued commands one at a time, each waiting for the headset's Ack.
 */
export class HeadsetSession {
  // Everything the loop waits on arrives here, so each wait is one receive().
  private readonly events = new Channel<SessionEvent>();

  /** Commands to send to the headset. */
  readonly commands = new Channel<Command>(() => this.events.send({ kind: 'command' }));
  /** Payloads decoded from the headset. Closing it ends the session. */
  readonly payloads = new Channel<Payload>();

  private readonly parser = new FrameParser();
  private readonly initTimeoutMs: number;
  private readonly initRetries: number;
  private readonly log: Logger;
  private stopRequested = false;
  private running = false;
  private transportError: Error | undefined;

  // Shared by every frame of the session; only Acks from the headset move it.
  private seqNumber = 0;
  // The Init is unacknowledged until the first Ack arrives.
  private waitingForAck = true;

  constructor(
    private readonly transport: Duplex,
    options: SessionOptions = {},
  ) {
    this.initTimeoutMs = options.initTimeoutMs ?? DEFAULT_CONFIG.initTimeoutMs;
    this.initRetries = options.initRetries ?? DEFAULT_CONFIG.initRetries;
    this.log = options.logger ?? createLogger('headset');
  }

  get sequenceNumber(): number {
    return this.seqNumber;
  }

  get awaitingAck(): boolean {
    return this.waitingForAck;
  }

  /**
   * Queue a command. It is encoded right away so out-of-range values throw
   * here rather than inside the running session.
   */
  send(command: Command): boolean {
    encodeCommand(command);
    return this.commands.send(command);
  }

  /** Ask the session to end. Commands that were not sent yet are dropped. */
  stop(): void {
    this.stopRequested = true;
    this.events.send({ kind: 'stop' });
  }

  /**
   * Run until stop() is called or the payload channel is closed. Rejects with a
   * SessionError when the connection cannot continue.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Session is already running');
    }
    this.running = true;

    const onData = (data: Buffer): void => {
      this.events.send({ kind: 'data', chunk: Buffer.from(data) });
    };
    const onEnd = (): void => {
      this.events.send({ kind: 'end' });
    };
    const onError = (err: Error): void => {
      this.transportError = err;
      this.events.send({ kind: 'end' });
    };
    this.transport.on('data', onData);
    this.transport.on('end', onEnd);
    this.transport.on('close', onEnd);
    this.transport.on('error', onError);

    try {
      const first = await this.handshake();
      if (first) {
        await this.eventLoop(first);
      }
    } finally {
      this.transport.off('data', onData);
      this.transport.off('end', onEnd);
      this.transport.off('close', onEnd);
      this.transport.off('error', onError);
      this.events.close();
      this.commands.close();
      this.payloads.close();
      this.log.debug('session finished');
    }
  }

  /** Send Init until the headset answers. Resolves with the first chunk read, or undefined when stopped. */
  private async handshake(): Promise<Buffer | undefined> {
    const init = buildCommand({ kind: 'Init' }, this.seqNumber);
    this.log.debug(`init command: ${formatBytes(init)}`);
    await this.write(init);

    let next = this.events.receive();
    let retries = this.initRetries;
    for (;;) {
      if (this.stopRequested) return undefined;

      const timeout = sleep(this.initTimeoutMs);
      const event = await Promise.race([next, timeout.promise]);
      timeout.cancel();

      if (event === 'timeout') {
        if (retries === 0) {
          throw new SessionError('HandshakeTimeout', 'max retries failed; try connecting again');
        }
        this.log.debug('init failed; retrying...');
        await this.write(init);
        retries--;
        continue;
      }

      if (event === undefined) return undefined;
      switch (event.kind) {
        case 'stop':
          return undefined;
        case 'data':
          return event.chunk;
        case 'end':
          throw this.transportFailure();
        case 'command':
          next = this.events.receive();
          break;
      }
    }
  }

  private async eventLoop(firstChunk: Buffer): Promise<void> {
    if (!(await this.handleChunk(firstChunk))) return;

    for (;;) {
      if (this.stopRequested) {
        this.log.debug('event loop received stop');
        return;
      }

      // Pending input goes first; a command is sent only when nothing else is queued.
      let event = this.events.poll();
      if (event === undefined) {
        const command = this.waitingForAck ? undefined : this.commands.poll();
        if (command) {
          await this.sendCommand(command);
          continue;
        }
        event = await this.events.receive();
        if (event === undefined) return;
      }

      switch (event.kind) {
        case 'stop':
          this.log.debug('event loop received stop');
          return;
        case 'data':
          if (!(await this.handleChunk(event.chunk))) return;
          break;
        case 'end':
          throw this.transportFailure();
        case 'command':
          break;
      }
    }
  }

  /** Feed a chunk to the parser until it is used up. Returns false when the payload consumer is gone. */
  private async handleChunk(chunk: Buffer): Promise<boolean> {
    let offset = 0;
    while (offset < chunk.length) {
      const result = this.parser.parse(chunk.subarray(offset));
      switch (result.status) {
        case 'incomplete':
          return true;

        case 'error':
          this.log.warn(`frame parser returned an error: ${describeParserError(result.error)}, consumed: ${result.consumed}`);
          throw new SessionError(
            'MalformedFrame',
            'FrameParser failed. It is likely that the headphone sent a malformed request. Reconnect.',
          );

        case 'rejected':
          offset += result.consumed;
          this.log.warn(`${describeRejectedFrame(result.reason)}; ignoring`);
          break;

        case 'ready':
          offset += result.consumed;
          if (!(await this.handleFrame(result.message))) return false;
          break;
      }
    }
    return true;
  }

  private async handleFrame(message: AcceptedFrame): Promise<boolean> {
    this.log.debug(
      `msg: type=${MessageType[message.type]} seq=${message.seqNumber} payload=${formatBytes(message.payload)}`,
    );

    if (message.type === MessageType.Ack) {
      this.seqNumber = message.seqNumber;
      this.waitingForAck = false;
      return true;
    }

    let payload: Payload | undefined;
    try {
      payload = parsePayload(message.payload, message.type);
    } catch (err) {
      if (!(err instanceof PayloadError)) throw err;
      this.log.warn(`bad payload: ${err.message}`);
    }

    const ack = buildCommand({ kind: 'Ack' }, message.seqNumber);
    this.log.debug(`responding: ${formatBytes(ack)}`);
    await this.write(ack);

    if (payload === undefined) return true;
    return this.payloads.send(payload);
  }

  private async sendCommand(command: Command): Promise<void> {
    const bytes = buildCommand(command, this.seqNumber);
    this.log.debug(`sending: ${describeCommand(command)}, raw: ${formatBytes(bytes)}`);
    await this.write(bytes);
    this.waitingForAck = true;
  }

  private transportFailure(): SessionError {
    if (this.transportError) {
      return new SessionError(
        'TransportError',
        `transport failed: ${this.transportError.message}`,
        { cause: this.transportError },
      );
    }
    return new SessionError('TransportClosed', 'connection closed by the headset');
  }

  private write(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.transport.write(data, (err) => {
        if (err) {
          reject(new SessionError('TransportError', `write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}
