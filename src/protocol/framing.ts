/**
 * Headset frame encoder and structural decoder.
 *
 * Message format:
 * - MESSAGE_HEADER
 * - Message type ({@link MessageType})
 * - Sequence number, taken from the last Ack the headset sent
 * - Payload length, 4-byte big-endian
 * - N bytes of payload (the first one being the payload type)
 * - Checksum, 1-byte sum of everything between header and checksum
 * - MESSAGE_TRAILER
 *
 * Everything between header and trailer is escaped: a header, trailer or
 * escape byte is sent as ESCAPE_BYTE followed by the byte AND-ed with ESCAPE_MASK.
 */

import {
  ESCAPE_BYTE,
  ESCAPE_MASK,
  FRAME_PREFIX_SIZE,
  FRAME_SUFFIX_SIZE,
  MESSAGE_HEADER,
  MESSAGE_TRAILER,
  MIN_FRAME_SIZE,
  MessageType,
  messageTypeFromByte,
} from './constants.js';
import { checksum } from './checksum.js';
import { type Command, commandMessageType, encodeCommand } from './command.js';

export type ChecksumResult =
  | { ok: true; value: number }
  | { ok: false; expected: number; got: number };

/** Structural view of one complete, unescaped frame. */
export interface FrameMessage {
  /** undefined when the type byte is not a known {@link MessageType} */
  type: MessageType | undefined;
  typeByte: number;
  seqNumber: number;
  payload: Buffer;
  checksum: ChecksumResult;
}

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

export function needsEscape(byte: number): boolean {
  return byte === MESSAGE_HEADER || byte === MESSAGE_TRAILER || byte === ESCAPE_BYTE;
}

export function escapeBytes(bytes: Uint8Array): Buffer {
  const out: number[] = [];
  for (const byte of bytes) {
    if (needsEscape(byte)) {
      out.push(ESCAPE_BYTE, byte & ESCAPE_MASK);
    } else {
      out.push(byte);
    }
  }
  return Buffer.from(out);
}

/** Sequence number carried by an Ack for a frame that had `seqNumber`. */
export function ackSequence(seqNumber: number): number {
  return (1 - seqNumber) & 0xff;
}

/**
 * Build the wire bytes for a command. Acks are given the sequence number of
 * the frame they acknowledge; every other command takes the session's current one.
 */
export function buildCommand(command: Command, seqNumber: number): Buffer {
  const body = encodeCommand(command);
  const type = commandMessageType(command);
  const seq = command.kind === 'Ack' ? ackSequence(seqNumber) : seqNumber & 0xff;

  const core = Buffer.alloc(FRAME_PREFIX_SIZE - 1 + body.length + 1);
  core[0] = type;
  core[1] = seq;
  core.writeUInt32BE(body.length, 2);
  body.copy(core, 6);
  core[core.length - 1] = checksum(core.subarray(0, core.length - 1));

  return Buffer.concat([
    Buffer.from([MESSAGE_HEADER]),
    escapeBytes(core),
    Buffer.from([MESSAGE_TRAILER]),
  ]);
}

/**
 * Split a complete unescaped frame (as returned by the FrameParser) into its fields.
 * The returned payload is a view into `frame`.
 */
export function decodeFrame(frame: Buffer): FrameMessage {
  if (frame.length < MIN_FRAME_SIZE) {
    throw new FrameError(`Frame too short: expected at least ${MIN_FRAME_SIZE} bytes, got ${frame.length}`);
  }

  const typeByte = frame[1];
  const got = frame[frame.length - FRAME_SUFFIX_SIZE];
  const expected = checksum(frame.subarray(1, frame.length - FRAME_SUFFIX_SIZE));

  return {
    type: messageTypeFromByte(typeByte),
    typeByte,
    seqNumber: frame[2],
    payload: frame.subarray(FRAME_PREFIX_SIZE, frame.length - FRAME_SUFFIX_SIZE),
    checksum: got === expected ? { ok: true, value: got } : { ok: false, expected, got },
  };
}

export function formatBytes(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex').replace(/(..)(?!$)/g, '$1 ');
}
