import {
  ESCAPE_BYTE,
  ESCAPE_MASK,
  FRAME_PREFIX_SIZE,
  FRAME_SUFFIX_SIZE,
  MESSAGE_HEADER,
  type MessageType,
  messageTypeFromByte,
} from './constants.js';
import { checksum } from './checksum.js';

export type FrameParserErrorCode = 'NoMessageHeader';

/** A frame with a known type and a matching checksum. `payload` is a view into the frame copy. */
export interface AcceptedFrame {
  type: MessageType;
  seqNumber: number;
  payload: Buffer;
  checksum: number;
}

/** Why a complete frame was dropped. */
export type RejectedFrame =
  | { code: 'UnknownMessageType'; typeByte: number }
  | { code: 'BadChecksum'; expected: number; got: number };

export type FrameParserResult =
  /** A whole frame was read and passed type and checksum checks. `frame` is unescaped and owned. */
  | { status: 'ready'; frame: Buffer; message: AcceptedFrame; consumed: number }
  /** A whole frame was read but cannot be used; nothing was copied. */
  | { status: 'rejected'; reason: RejectedFrame; consumed: number }
  /** `bytesNeeded` is undefined until the length field has been read. */
  | { status: 'incomplete'; bytesNeeded: number | undefined }
  | { status: 'error'; error: FrameParserErrorCode; consumed: number };

const ERROR_MESSAGES: Record<FrameParserErrorCode, string> = {
  NoMessageHeader: 'The given bytes do not start with the MESSAGE_HEADER value.',
};

export function describeParserError(code: FrameParserErrorCode): string {
  return ERROR_MESSAGES[code];
}

export function describeRejectedFrame(reason: RejectedFrame): string {
  switch (reason.code) {
    case 'UnknownMessageType':
      return `unknown message type: 0x${reason.typeByte.toString(16)}`;
    case 'BadChecksum':
      return `bad checksum, got: 0x${reason.got.toString(16)}, expected: 0x${reason.expected.toString(16)}`;
  }
}

/**
 * Streaming frame parser. Bytes can be fed in chunks of any size; the parser
 * keeps its state between calls and stops at the end of the first complete frame.
 */
export class FrameParser {
  private buf: number[] = [];
  private msgLen: number | undefined;
  private needEscape = false;

  parse(bytes: Uint8Array): FrameParserResult {
    if (this.done()) {
      this.reset();
    }

    for (let idx = 0; idx < bytes.length; idx++) {
      const error = this.parseByte(bytes[idx]);
      if (error) {
        return { status: 'error', error, consumed: idx + 1 };
      }
      if (this.done()) {
        return this.complete(idx + 1);
      }
    }

    return { status: 'incomplete', bytesNeeded: this.bytesNeeded() };
  }

  /** Drop any partially read frame. */
  reset(): void {
    this.buf = [];
    this.msgLen = undefined;
    this.needEscape = false;
  }

  private done(): boolean {
    return this.bytesNeeded() === 0;
  }

  private bytesNeeded(): number | undefined {
    if (this.msgLen === undefined) return undefined;
    return FRAME_PREFIX_SIZE + this.msgLen + FRAME_SUFFIX_SIZE - this.buf.length;
  }

  // Only accepted frames are copied out of the scratch array.
  private complete(consumed: number): FrameParserResult {
    const buf = this.buf;
    const typeByte = buf[1];
    const type = messageTypeFromByte(typeByte);
    if (type === undefined) {
      return { status: 'rejected', reason: { code: 'UnknownMessageType', typeByte }, consumed };
    }
    const got = buf[buf.length - FRAME_SUFFIX_SIZE];
    const expected = checksum(buf, 1, buf.length - FRAME_SUFFIX_SIZE);
    if (got !== expected) {
      return { status: 'rejected', reason: { code: 'BadChecksum', expected, got }, consumed };
    }

    const frame = Buffer.from(buf);
    const message: AcceptedFrame = {
      type,
      seqNumber: frame[2],
      payload: frame.subarray(FRAME_PREFIX_SIZE, frame.length - FRAME_SUFFIX_SIZE),
      checksum: got,
    };
    return { status: 'ready', frame, message, consumed };
  }

  private parseByte(input: number): FrameParserErrorCode | undefined {
    let byte = input;
    if (this.needEscape) {
      byte |= ~ESCAPE_MASK & 0xff;
      this.needEscape = false;
    } else if (byte === ESCAPE_BYTE) {
      this.needEscape = true;
      return undefined;
    }

    if (this.buf.length === 0) {
      if (byte !== MESSAGE_HEADER) {
        return 'NoMessageHeader';
      }
      this.buf.push(byte);
      return undefined;
    }

    // type, seq, then the 4 length bytes, then payload + checksum + trailer
    this.buf.push(byte);
    if (this.buf.length === FRAME_PREFIX_SIZE) {
      this.msgLen = Buffer.from(this.buf.slice(3, FRAME_PREFIX_SIZE)).readUInt32BE(0);
    }
    return undefined;
  }
}
