import { Duplex } from 'node:stream';
import { formatBytes } from '../protocol/framing.js';

/** In-process stand-in for the headset's end of the link. */
export class FakeTransport extends Duplex {
  readonly written: Buffer[] = [];

  _read(): void {
    // bytes are pushed by reply()
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(Buffer.from(chunk));
    callback();
  }

  /** Send bytes to the session, given as hex with optional spaces. */
  reply(...frames: string[]): void {
    this.push(Buffer.from(frames.join('').replace(/ /g, ''), 'hex'));
  }

  get sent(): string[] {
    return this.written.map((chunk) => formatBytes(chunk));
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
